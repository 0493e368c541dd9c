import express from 'express';
import type { Request, Response } from 'express';
import cors from 'cors';
import type { FareComparator } from '../services/FareComparator';
import type { ResolvedPlace } from '../services/PlaceGeocoder';
import type { RideRequest } from '../types/Ride';
import { ComparisonCancelledError, GeocodingError, InvalidRequestError } from '../utils/errors';
import { logger } from '../utils/logger';
import { createRideRequest, assertValidRideRequest, parseVehicleNeed } from '../utils/rideRequest';
import { formatComparisonText } from './formatComparison';

export interface PlaceResolver {
  resolve(place: string): Promise<ResolvedPlace>;
}

export interface ServerDependencies {
  comparator: FareComparator;
  /** Needed only by the text endpoints, which take place names */
  geocoder?: PlaceResolver;
}

export function createServer({ comparator, geocoder }: ServerDependencies) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  // Configured providers
  app.get('/api/providers', (_req: Request, res: Response) => {
    res.json({
      success: true,
      providers: comparator.getRegistry().describe(),
    });
  });

  // Compare fares between coordinates
  app.post('/api/compare', async (req: Request, res: Response) => {
    const signal = abortOnDisconnect(res);

    try {
      const request = rideRequestFromBody(req.body);
      const result = await comparator.compare(request, { signal });
      res.json({
        success: true,
        result,
      });
    } catch (error) {
      if (error instanceof InvalidRequestError) {
        return res.status(400).json({
          success: false,
          error: error.message,
          issues: error.issues,
        });
      }
      if (error instanceof ComparisonCancelledError) {
        logger.info('Client disconnected before comparison finished');
        return;
      }
      logger.error({ error }, 'Error comparing fares');
      res.status(500).json({
        success: false,
        error: 'Failed to compare fares',
      });
    }
  });

  // Plain-text comparison between place names
  const compareText = async (input: Record<string, unknown>, res: Response) => {
    const signal = abortOnDisconnect(res);
    const pickup = typeof input.pickup === 'string' ? input.pickup.trim() : '';
    const dropoff = typeof input.dropoff === 'string' ? input.dropoff.trim() : '';
    const need = typeof input.vehicle_need === 'string' ? input.vehicle_need : undefined;

    if (!pickup || !dropoff) {
      return res.status(400).type('text/plain').send('Please enter both pickup and dropoff.');
    }

    const vehicleClass = parseVehicleNeed(need);
    if (!vehicleClass) {
      return res.status(400).type('text/plain').send(`Unrecognized vehicle need '${need}'.`);
    }

    if (!geocoder) {
      return res.status(501).type('text/plain').send('Place lookup is not configured.');
    }

    try {
      const from = await geocoder.resolve(pickup);
      const to = await geocoder.resolve(dropoff);
      const request = createRideRequest({ pickup: from, dropoff: to, vehicleClass });
      const result = await comparator.compare(request, { signal });

      res.type('text/plain').send(formatComparisonText(result, { pickup, dropoff }));
    } catch (error) {
      if (error instanceof GeocodingError) {
        return res.status(422).type('text/plain').send(error.message);
      }
      if (error instanceof InvalidRequestError) {
        return res.status(400).type('text/plain').send(error.message);
      }
      if (error instanceof ComparisonCancelledError) {
        logger.info('Client disconnected before comparison finished');
        return;
      }
      logger.error({ error }, 'Error producing text comparison');
      res.status(500).type('text/plain').send('Failed to compare fares.');
    }
  };

  app.get('/api/compare/text', (req: Request, res: Response) => compareText(req.query, res));
  app.post('/api/compare/text', (req: Request, res: Response) => compareText(asRecord(req.body), res));

  return app;
}

/**
 * Abort signal fired when the client goes away before the response is sent
 */
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null ? { ...value } : {};
}

/**
 * Accepts `{ latitude, longitude }` or `{ lat, lng }`, numbers or numeric strings
 */
function coordinatesFromBody(value: unknown): unknown {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  const latitude = 'latitude' in value ? value.latitude : 'lat' in value ? value.lat : undefined;
  const longitude = 'longitude' in value ? value.longitude : 'lng' in value ? value.lng : undefined;
  return {
    latitude: toNumber(latitude),
    longitude: toNumber(longitude),
  };
}

function toNumber(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }
  return value;
}

function rideRequestFromBody(body: unknown): RideRequest {
  const input = asRecord(body);
  const candidate = {
    pickup: coordinatesFromBody(input.pickup),
    dropoff: coordinatesFromBody(input.dropoff),
    vehicleClass: input.vehicleClass ?? 'standard',
  };
  assertValidRideRequest(candidate);
  return createRideRequest(candidate);
}
