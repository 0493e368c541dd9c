/**
 * PlaceGeocoder - Resolve place names to coordinates
 *
 * Sits in front of the comparison pipeline for callers that only have
 * addresses. Caches results and rate-limits requests (Nominatim allows 1/s).
 */

import NodeGeocoder from 'node-geocoder';
import type { Entry, Geocoder } from 'node-geocoder';
import type { GeocoderProvider } from '../config';
import type { Coordinates } from '../types/Ride';
import { GeocodingError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger({ component: 'PlaceGeocoder' });

// =============================================================================
// Types
// =============================================================================

export interface ResolvedPlace extends Coordinates {
  /** Text that was geocoded */
  query: string;
  formattedAddress?: string;
}

export interface PlaceGeocoderOptions {
  /** Geocoding provider (default: openstreetmap) */
  provider?: GeocoderProvider;
  /** API key for paid providers */
  apiKey?: string;
  /** Cache TTL in milliseconds (default: 1 hour) */
  cacheTTL?: number;
  /** Rate limit delay in ms (default: 1100 for Nominatim) */
  rateLimitDelay?: number;
  /** Entries kept before the oldest is evicted (default: 1000) */
  maxCacheSize?: number;
}

interface CacheEntry {
  result: ResolvedPlace | null;
  timestamp: number;
}

// =============================================================================
// PlaceGeocoder Class
// =============================================================================

export class PlaceGeocoder {
  private readonly geocoder: Geocoder;
  private readonly cache: Map<string, CacheEntry> = new Map();
  private readonly options: Required<PlaceGeocoderOptions>;
  private lastRequestTime = 0;
  private readonly pendingRequests: Map<string, Promise<ResolvedPlace | null>> = new Map();

  // Queue shared by all callers so the rate limit holds globally
  private readonly requestQueue: Array<() => void> = [];
  private isProcessingQueue = false;

  constructor(options: PlaceGeocoderOptions = {}) {
    this.options = {
      provider: options.provider ?? 'openstreetmap',
      apiKey: options.apiKey ?? '',
      cacheTTL: options.cacheTTL ?? 3600000, // 1 hour
      rateLimitDelay: options.rateLimitDelay ?? 1100,
      maxCacheSize: options.maxCacheSize ?? 1000,
    };

    if (this.options.provider === 'google' && this.options.apiKey) {
      this.geocoder = NodeGeocoder({
        provider: 'google',
        apiKey: this.options.apiKey,
      });
    } else if (this.options.provider === 'mapbox' && this.options.apiKey) {
      this.geocoder = NodeGeocoder({
        provider: 'mapbox',
        apiKey: this.options.apiKey,
      });
    } else {
      // OpenStreetMap needs no API key
      this.geocoder = NodeGeocoder({
        provider: 'openstreetmap',
      });
    }

    logger.info({ provider: this.options.provider }, 'PlaceGeocoder initialized');
  }

  /**
   * Resolve a place name
   * @throws GeocodingError when the place is blank or cannot be found
   */
  async resolve(place: string): Promise<ResolvedPlace> {
    const query = place.trim();
    if (query.length === 0) {
      throw new GeocodingError(place, 'Place name is empty');
    }

    const result = await this.lookup(query);
    if (!result) {
      throw new GeocodingError(query);
    }
    return result;
  }

  private async lookup(query: string): Promise<ResolvedPlace | null> {
    const cacheKey = query.toLowerCase();

    const cached = this.cache.get(cacheKey);
    if (cached) {
      if (Date.now() - cached.timestamp < this.options.cacheTTL) {
        logger.debug({ query, cached: true }, 'Cache hit');
        return cached.result;
      }
      this.cache.delete(cacheKey);
    }

    // Share an identical request already on its way
    const pending = this.pendingRequests.get(cacheKey);
    if (pending) {
      return pending;
    }

    const requestPromise = this.doGeocode(query, cacheKey);
    this.pendingRequests.set(cacheKey, requestPromise);

    try {
      return await requestPromise;
    } finally {
      this.pendingRequests.delete(cacheKey);
    }
  }

  private async doGeocode(query: string, cacheKey: string): Promise<ResolvedPlace | null> {
    await this.waitForRateLimit();

    let results: Entry[];
    try {
      results = await this.geocoder.geocode(query);
    } catch (error) {
      // Not cached: the next call may succeed
      logger.warn({ query, error }, 'Geocoding failed');
      throw new GeocodingError(query, `Geocoding service error for '${query}'`);
    }

    const best = results.find((entry) => entry.latitude !== undefined && entry.longitude !== undefined);
    const place = best ? this.transformResult(query, best) : null;

    if (!place) {
      logger.debug({ query }, 'No geocoding results');
    } else {
      logger.debug({ query, place }, 'Geocoded successfully');
    }

    this.remember(cacheKey, place);
    return place;
  }

  /**
   * Store a result, evicting the oldest entries past maxCacheSize
   */
  private remember(cacheKey: string, result: ResolvedPlace | null): void {
    this.cache.delete(cacheKey);
    this.cache.set(cacheKey, { result, timestamp: Date.now() });

    for (const key of this.cache.keys()) {
      if (this.cache.size <= this.options.maxCacheSize) {
        break;
      }
      this.cache.delete(key);
    }
  }

  private waitForRateLimit(): Promise<void> {
    return new Promise((resolve) => {
      this.requestQueue.push(resolve);
      void this.processQueue();
    });
  }

  private async processQueue(): Promise<void> {
    if (this.isProcessingQueue) return;
    this.isProcessingQueue = true;

    while (this.requestQueue.length > 0) {
      const timeSinceLastRequest = Date.now() - this.lastRequestTime;

      if (timeSinceLastRequest < this.options.rateLimitDelay) {
        await this.sleep(this.options.rateLimitDelay - timeSinceLastRequest);
      }

      this.lastRequestTime = Date.now();
      const resolve = this.requestQueue.shift();
      if (resolve) {
        resolve();
      }
    }

    this.isProcessingQueue = false;
  }

  private transformResult(query: string, entry: Entry): ResolvedPlace | null {
    const { latitude, longitude } = entry;
    if (latitude === undefined || longitude === undefined) {
      return null;
    }
    return {
      query,
      latitude,
      longitude,
      formattedAddress: entry.formattedAddress,
    };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  clearCache(): void {
    this.cache.clear();
    logger.info('Cache cleared');
  }

  getCacheSize(): number {
    return this.cache.size;
  }
}
