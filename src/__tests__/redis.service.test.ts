/**
 * =============================================================================
 * REDIS SERVICE (IN-MEMORY MODE) - Unit Tests
 * =============================================================================
 *
 * The in-memory client backs every test in this project, so its
 * compare-and-swap, set and geo commands must behave like Redis.
 * =============================================================================
 */

import { RedisService, haversineMeters } from '../shared/services/redis.service';
import { TEST_REDIS_OPTIONS } from './helpers/dispatch-harness';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('RedisService (in-memory)', () => {
  let redis: RedisService;

  beforeEach(async () => {
    redis = new RedisService(TEST_REDIS_OPTIONS);
    await redis.initialize();
  });

  afterEach(async () => {
    await redis.shutdown();
  });

  it('runs in memory mode when Redis is disabled', async () => {
    expect(redis.isRedisEnabled()).toBe(false);
    expect(redis.isConnected()).toBe(true);
    expect((await redis.healthCheck()).status).toBe('healthy');
  });

  describe('setIfAbsent / deleteIfEquals', () => {
    it('only the first writer wins', async () => {
      expect(await redis.setIfAbsent('slot', 'trip-1', 60)).toBe(true);
      expect(await redis.setIfAbsent('slot', 'trip-2', 60)).toBe(false);
      expect(await redis.get('slot')).toBe('trip-1');
    });

    it('concurrent claims produce exactly one winner', async () => {
      const results = await Promise.all(
        ['a', 'b', 'c', 'd'].map(v => redis.setIfAbsent('slot', v, 60))
      );
      expect(results).toEqual([true, false, false, false]);
    });

    it('deletes only when the value matches', async () => {
      await redis.set('slot', 'trip-1');

      expect(await redis.deleteIfEquals('slot', 'trip-2')).toBe(false);
      expect(await redis.get('slot')).toBe('trip-1');

      expect(await redis.deleteIfEquals('slot', 'trip-1')).toBe(true);
      expect(await redis.get('slot')).toBeNull();
    });
  });

  describe('expiry', () => {
    it('drops keys after their TTL', async () => {
      const now = Date.now();
      const clock = jest.spyOn(Date, 'now').mockReturnValue(now);

      await redis.set('short', 'v', 1);
      expect(await redis.exists('short')).toBe(true);

      clock.mockReturnValue(now + 1001);
      expect(await redis.exists('short')).toBe(false);
      expect(await redis.setIfAbsent('short', 'again', 1)).toBe(true);

      clock.mockRestore();
    });
  });

  describe('sets', () => {
    it('adds, checks and lists members', async () => {
      expect(await redis.sAdd('notified', 'driver-1', 'driver-2')).toBe(2);
      expect(await redis.sAdd('notified', 'driver-2')).toBe(0);
      expect(await redis.sIsMember('notified', 'driver-1')).toBe(true);
      expect((await redis.sMembers('notified')).sort()).toEqual(['driver-1', 'driver-2']);
      expect(await redis.sIsMember('notified', 'driver-3')).toBe(false);
    });
  });

  describe('geo', () => {
    // One degree of latitude is ~111.2 km, so 0.01 deg is ~1.11 km
    beforeEach(async () => {
      await redis.geoAdd('drivers', 77.0, 12.02, 'far');
      await redis.geoAdd('drivers', 77.0, 12.005, 'near');
      await redis.geoAdd('drivers', 77.0, 12.01, 'middle');
    });

    it('returns members within the radius, nearest first', async () => {
      const found = await redis.geoRadius('drivers', 77.0, 12.0, 1.5, 'km');
      expect(found.map(m => m.member)).toEqual(['near', 'middle']);
      expect(found[0].distance).toBeCloseTo(0.556, 2);
    });

    it('honours the count limit', async () => {
      const found = await redis.geoRadius('drivers', 77.0, 12.0, 5, 'km', 2);
      expect(found.map(m => m.member)).toEqual(['near', 'middle']);
    });

    it('forgets removed members', async () => {
      await redis.geoRemove('drivers', 'near');
      const found = await redis.geoRadius('drivers', 77.0, 12.0, 5, 'km');
      expect(found.map(m => m.member)).toEqual(['middle', 'far']);
    });
  });

  describe('pub/sub', () => {
    it('delivers to subscribers of the channel only', async () => {
      const received: string[] = [];
      await redis.subscribe('events:trip.created', m => received.push(m));

      expect(await redis.publish('events:trip.created', 'hello')).toBe(1);
      expect(await redis.publish('events:trip.expired', 'ignored')).toBe(0);
      expect(received).toEqual(['hello']);
    });
  });

  it('haversineMeters matches a known short distance', () => {
    expect(haversineMeters(12.0, 77.0, 12.01, 77.0)).toBeCloseTo(1111.95, 0);
  });
});
