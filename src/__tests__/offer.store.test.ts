/**
 * =============================================================================
 * OFFER STORE - Unit Tests
 * =============================================================================
 *
 * Driver/trip offer slots and the per-trip exclusion sets.
 * =============================================================================
 */

import { OfferStatus } from '../core/constants';
import { Offer } from '../modules/matching/matching.types';
import { OfferStore } from '../modules/matching/offer.store';
import { RedisService } from '../shared/services/redis.service';
import { TEST_REDIS_OPTIONS } from './helpers/dispatch-harness';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

// =============================================================================
// TEST CONSTANTS
// =============================================================================

function offer(offerId: string, tripId: string, driverId: string): Offer {
  return {
    offerId,
    tripId,
    driverId,
    status: OfferStatus.PENDING,
    distanceKm: 0.8,
    createdAt: '2026-01-01T10:00:00.000Z',
    expiresAt: '2026-01-01T10:00:30.000Z'
  };
}

describe('OfferStore', () => {
  let redis: RedisService;
  let store: OfferStore;

  beforeEach(() => {
    redis = new RedisService(TEST_REDIS_OPTIONS);
    store = new OfferStore(redis, { offerTimeoutMs: 30000, exclusionTtlSeconds: 3600 });
  });

  afterEach(async () => {
    await redis.shutdown();
  });

  describe('driver slot', () => {
    it('a second claim fails and leaves the first offer in place', async () => {
      const first = offer('offer-1', 'trip-1', 'driver-1');
      const second = offer('offer-2', 'trip-2', 'driver-1');

      expect(await store.claimDriver(first)).toBe(true);
      await store.recordTripOffer(first);

      expect(await store.claimDriver(second)).toBe(false);
      expect(await redis.get('offer:driver:driver-1')).toBe('trip-1|offer-1');
      expect(await store.getDriverOffer('driver-1')).toEqual(first);
    });

    it('release by a non-holder is a no-op', async () => {
      const held = offer('offer-1', 'trip-1', 'driver-1');
      await store.claimDriver(held);

      expect(await store.releaseDriver(offer('offer-9', 'trip-9', 'driver-1'))).toBe(false);
      expect(await redis.get('offer:driver:driver-1')).toBe('trip-1|offer-1');

      expect(await store.releaseDriver(held)).toBe(true);
      expect(await store.getDriverOffer('driver-1')).toBeNull();
    });

    it('driver slot outlives the offer timeout by a grace period', async () => {
      const now = Date.now();
      const clock = jest.spyOn(Date, 'now').mockReturnValue(now);
      await store.claimDriver(offer('offer-1', 'trip-1', 'driver-1'));

      // 30s timeout + 5s grace
      clock.mockReturnValue(now + 34000);
      expect(await redis.exists('offer:driver:driver-1')).toBe(true);
      clock.mockReturnValue(now + 35001);
      expect(await redis.exists('offer:driver:driver-1')).toBe(false);

      clock.mockRestore();
    });
  });

  describe('trip slot', () => {
    it('only the matching offer id clears it', async () => {
      const current = offer('offer-2', 'trip-1', 'driver-2');
      await store.recordTripOffer(current);

      expect(await store.releaseTrip(offer('offer-1', 'trip-1', 'driver-1'))).toBe(false);
      expect(await store.getTripOffer('trip-1')).toEqual(current);

      expect(await store.releaseTrip(current)).toBe(true);
      expect(await store.getTripOffer('trip-1')).toBeNull();
    });

    it('getDriverOffer ignores a slot pointing at a replaced trip offer', async () => {
      await store.claimDriver(offer('offer-1', 'trip-1', 'driver-1'));
      await store.recordTripOffer(offer('offer-2', 'trip-1', 'driver-2'));

      expect(await store.getDriverOffer('driver-1')).toBeNull();
    });
  });

  describe('exclusion sets', () => {
    it('excludes notified and rejected drivers per trip', async () => {
      await store.markNotified('trip-1', 'driver-1');
      await store.markRejected('trip-1', 'driver-2');
      await store.markNotified('trip-2', 'driver-3');

      expect(Array.from(await store.getExcluded('trip-1')).sort()).toEqual(['driver-1', 'driver-2']);
      expect(await store.isRejected('trip-1', 'driver-2')).toBe(true);
      expect(await store.isRejected('trip-1', 'driver-1')).toBe(false);
    });

    it('is empty for a trip with no history', async () => {
      expect((await store.getExcluded('trip-unknown')).size).toBe(0);
    });
  });
});
