import { describe, it, expect, beforeEach, vi } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createServer } from '../server';
import type { PlaceResolver } from '../server';
import { FareComparator } from '../../services/FareComparator';
import { ProviderRegistry } from '../../services/ProviderRegistry';
import type { ResolvedPlace } from '../../services/PlaceGeocoder';
import { GeocodingError } from '../../utils/errors';
import { FLAT_PRICING, USD_POLICY, failingAdapter, quotingAdapter } from '../../test/fakeProviders';

// In-memory geocoder
class FakePlaceResolver implements PlaceResolver {
  private readonly places: Record<string, ResolvedPlace> = {
    'city hall': { query: 'City Hall', latitude: 40.7128, longitude: -74.006 },
    'times square': { query: 'Times Square', latitude: 40.7589, longitude: -73.9851 },
  };

  async resolve(place: string): Promise<ResolvedPlace> {
    const found = this.places[place.trim().toLowerCase()];
    if (!found) {
      throw new GeocodingError(place);
    }
    return found;
  }
}

describe('API Server', () => {
  let comparator: FareComparator;
  let app: Express;

  beforeEach(() => {
    const registry = new ProviderRegistry([
      quotingAdapter('alpha', 18.5, { priority: 1 }),
      failingAdapter('beta', 'access_denied', { simulation: FLAT_PRICING }),
    ]);
    comparator = new FareComparator(registry, { policy: USD_POLICY, deadlineMs: 1000 });
    app = createServer({ comparator, geocoder: new FakePlaceResolver() });
  });

  describe('GET /health', () => {
    it('should return health status', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('ok');
      expect(response.body.timestamp).toBeDefined();
    });
  });

  describe('GET /api/providers', () => {
    it('should describe the configured providers', async () => {
      const response = await request(app).get('/api/providers');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        providers: [
          { name: 'alpha', mode: 'live', priority: 1, timeoutMs: 1000, canSimulate: false },
          { name: 'beta', mode: 'live', priority: 0, timeoutMs: 1000, canSimulate: true },
        ],
      });
    });
  });

  describe('POST /api/compare', () => {
    it('should compare fares between coordinates', async () => {
      const response = await request(app)
        .post('/api/compare')
        .send({
          pickup: { latitude: 40.7128, longitude: -74.006 },
          dropoff: { latitude: 40.7589, longitude: -73.9851 },
          vehicleClass: 'standard',
        });

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.result.status).toBe('selected');
      expect(response.body.result.winner).toMatchObject({ provider: 'beta', source: 'simulated', amount: '10.00' });
      expect(response.body.result.estimates).toHaveLength(2);
    });

    it('should accept lat/lng pairs, numeric strings and a missing class', async () => {
      const response = await request(app)
        .post('/api/compare')
        .send({
          pickup: { lat: '40.7128', lng: '-74.006' },
          dropoff: { lat: 40.7589, lng: -73.9851 },
        });

      expect(response.status).toBe(200);
      expect(response.body.result.request).toEqual({
        pickup: { latitude: 40.7128, longitude: -74.006 },
        dropoff: { latitude: 40.7589, longitude: -73.9851 },
        vehicleClass: 'standard',
      });
    });

    it('should reject an invalid request with every issue', async () => {
      const response = await request(app)
        .post('/api/compare')
        .send({
          pickup: { latitude: 100, longitude: 0 },
          dropoff: { latitude: 0, longitude: 0 },
          vehicleClass: 'boat',
        });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        error:
          "Invalid ride request: pickup latitude 100 is outside [-90, 90]; unrecognized vehicle class 'boat' (expected one of standard, premium, shared, xl)",
        issues: [
          'pickup latitude 100 is outside [-90, 90]',
          "unrecognized vehicle class 'boat' (expected one of standard, premium, shared, xl)",
        ],
      });
    });

    it('should return 500 when the comparison fails unexpectedly', async () => {
      vi.spyOn(comparator, 'compare').mockRejectedValue(new Error('boom'));

      const response = await request(app)
        .post('/api/compare')
        .send({
          pickup: { latitude: 40.7128, longitude: -74.006 },
          dropoff: { latitude: 40.7589, longitude: -73.9851 },
        });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ success: false, error: 'Failed to compare fares' });
    });
  });

  describe('/api/compare/text', () => {
    it('should compare between place names', async () => {
      const response = await request(app)
        .get('/api/compare/text')
        .query({ pickup: 'City Hall', dropoff: 'Times Square', vehicle_need: 'cheapest' });

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toMatch(/^text\/plain/);
      const lines = response.text.split('\n');
      expect(lines.slice(0, 5)).toEqual([
        'RIDE COMPARISON',
        '===============',
        'Pickup:  City Hall',
        'Dropoff: Times Square',
        'Class:   standard',
      ]);
      expect(lines[lines.length - 1]).toBe('Cheapest: BETA at 10.00 USD (simulated approximation)');
    });

    it('should map the vehicle need to a class', async () => {
      const response = await request(app)
        .post('/api/compare/text')
        .send({ pickup: 'City Hall', dropoff: 'Times Square', vehicle_need: 'Black' });

      expect(response.status).toBe(200);
      const lines = response.text.split('\n');
      expect(lines[4]).toBe('Class:   premium');
      expect(lines[lines.length - 1]).toBe('Cheapest: ALPHA at 18.50 USD');
    });

    it('should require both places', async () => {
      const response = await request(app).get('/api/compare/text').query({ pickup: 'City Hall' });

      expect(response.status).toBe(400);
      expect(response.text).toBe('Please enter both pickup and dropoff.');
    });

    it('should reject an unknown vehicle need', async () => {
      const response = await request(app)
        .get('/api/compare/text')
        .query({ pickup: 'City Hall', dropoff: 'Times Square', vehicle_need: 'helicopter' });

      expect(response.status).toBe(400);
      expect(response.text).toBe("Unrecognized vehicle need 'helicopter'.");
    });

    it('should report a place that cannot be found', async () => {
      const response = await request(app)
        .get('/api/compare/text')
        .query({ pickup: 'City Hall', dropoff: 'Atlantis' });

      expect(response.status).toBe(422);
      expect(response.text).toBe("Could not geocode: 'Atlantis'");
    });

    it('should answer 501 without a geocoder', async () => {
      const bare = createServer({ comparator });

      const response = await request(bare)
        .get('/api/compare/text')
        .query({ pickup: 'City Hall', dropoff: 'Times Square' });

      expect(response.status).toBe(501);
      expect(response.text).toBe('Place lookup is not configured.');
    });
  });
});
