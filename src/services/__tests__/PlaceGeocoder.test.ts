import { describe, it, expect, vi, beforeEach } from 'vitest';
import NodeGeocoder from 'node-geocoder';
import { PlaceGeocoder } from '../PlaceGeocoder';
import { GeocodingError } from '../../utils/errors';

const { mockGeocode } = vi.hoisted(() => ({ mockGeocode: vi.fn() }));

// Mock node-geocoder
vi.mock('node-geocoder', () => ({
  default: vi.fn(() => ({
    geocode: mockGeocode,
  })),
}));

describe('PlaceGeocoder', () => {
  let geocoder: PlaceGeocoder;

  const cityHall = { latitude: 40.7128, longitude: -74.006, formattedAddress: 'City Hall, New York, NY' };

  beforeEach(() => {
    vi.clearAllMocks();
    mockGeocode.mockResolvedValue([]);
    geocoder = new PlaceGeocoder({ rateLimitDelay: 0 }); // Disable rate limiting for tests
  });

  describe('constructor', () => {
    it('should default to OpenStreetMap', () => {
      expect(NodeGeocoder).toHaveBeenCalledWith({ provider: 'openstreetmap' });
    });

    it('should use a paid provider when given an API key', () => {
      new PlaceGeocoder({ provider: 'google', apiKey: 'test-key' });

      expect(NodeGeocoder).toHaveBeenLastCalledWith({ provider: 'google', apiKey: 'test-key' });
    });

    it('should fall back to OpenStreetMap when a paid provider has no key', () => {
      new PlaceGeocoder({ provider: 'mapbox' });

      expect(NodeGeocoder).toHaveBeenLastCalledWith({ provider: 'openstreetmap' });
    });
  });

  describe('resolve', () => {
    it('should resolve a place to coordinates', async () => {
      mockGeocode.mockResolvedValue([cityHall]);

      const place = await geocoder.resolve('  City Hall ');

      expect(place).toEqual({
        query: 'City Hall',
        latitude: 40.7128,
        longitude: -74.006,
        formattedAddress: 'City Hall, New York, NY',
      });
      expect(mockGeocode).toHaveBeenCalledWith('City Hall');
    });

    it('should skip results without coordinates', async () => {
      mockGeocode.mockResolvedValue([{ formattedAddress: 'Somewhere vague' }, cityHall]);

      const place = await geocoder.resolve('City Hall');

      expect(place.latitude).toBe(40.7128);
    });

    it('should reject a blank place without calling the service', async () => {
      await expect(geocoder.resolve('   ')).rejects.toThrow('Place name is empty');
      expect(mockGeocode).not.toHaveBeenCalled();
    });

    it('should reject a place with no results', async () => {
      await expect(geocoder.resolve('Atlantis')).rejects.toThrow(new GeocodingError('Atlantis'));
    });

    it('should wrap service errors and not cache them', async () => {
      mockGeocode.mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce([cityHall]);

      await expect(geocoder.resolve('City Hall')).rejects.toThrow("Geocoding service error for 'City Hall'");
      await expect(geocoder.resolve('City Hall')).resolves.toMatchObject({ latitude: 40.7128 });
      expect(mockGeocode).toHaveBeenCalledTimes(2);
    });
  });

  describe('caching', () => {
    it('should answer repeated places from the cache, ignoring case', async () => {
      mockGeocode.mockResolvedValue([cityHall]);

      await geocoder.resolve('City Hall');
      await geocoder.resolve('city hall');

      expect(mockGeocode).toHaveBeenCalledTimes(1);
      expect(geocoder.getCacheSize()).toBe(1);
    });

    it('should cache places that were not found', async () => {
      await expect(geocoder.resolve('Atlantis')).rejects.toBeInstanceOf(GeocodingError);
      await expect(geocoder.resolve('Atlantis')).rejects.toBeInstanceOf(GeocodingError);

      expect(mockGeocode).toHaveBeenCalledTimes(1);
    });

    it('should share one lookup between concurrent callers', async () => {
      mockGeocode.mockResolvedValue([cityHall]);

      const [first, second] = await Promise.all([geocoder.resolve('City Hall'), geocoder.resolve('City Hall')]);

      expect(first).toEqual(second);
      expect(mockGeocode).toHaveBeenCalledTimes(1);
    });

    it('should drop an expired entry when it is looked up again', async () => {
      vi.useFakeTimers();
      try {
        const shortLived = new PlaceGeocoder({ rateLimitDelay: 0, cacheTTL: 1000 });
        mockGeocode.mockResolvedValueOnce([cityHall]).mockRejectedValueOnce(new Error('socket hang up'));
        await shortLived.resolve('City Hall');
        expect(shortLived.getCacheSize()).toBe(1);

        vi.advanceTimersByTime(1500);
        await expect(shortLived.resolve('City Hall')).rejects.toBeInstanceOf(GeocodingError);

        expect(shortLived.getCacheSize()).toBe(0);
        expect(mockGeocode).toHaveBeenCalledTimes(2);
      } finally {
        vi.useRealTimers();
      }
    });

    it('should evict the oldest entry past the size limit', async () => {
      const small = new PlaceGeocoder({ rateLimitDelay: 0, maxCacheSize: 2 });
      mockGeocode.mockResolvedValue([cityHall]);

      await small.resolve('City Hall');
      await small.resolve('Times Square');
      await small.resolve('Penn Station');
      expect(small.getCacheSize()).toBe(2);

      await small.resolve('Times Square');
      expect(mockGeocode).toHaveBeenCalledTimes(3);

      await small.resolve('City Hall');
      expect(mockGeocode).toHaveBeenCalledTimes(4);
      expect(small.getCacheSize()).toBe(2);
    });

    it('should clear the cache', async () => {
      mockGeocode.mockResolvedValue([cityHall]);
      await geocoder.resolve('City Hall');

      geocoder.clearCache();
      await geocoder.resolve('City Hall');

      expect(geocoder.getCacheSize()).toBe(1);
      expect(mockGeocode).toHaveBeenCalledTimes(2);
    });
  });
});
