/**
 * =============================================================================
 * MATCHING ENGINE - Integration Tests
 * =============================================================================
 *
 * Runs the real search loop against the in-memory stack with a scripted geo
 * source. Offer timeouts and backoff are a few milliseconds.
 * =============================================================================
 */

import { CancelActor, EventType, OfferStatus, SYSTEM_ERROR_REASON, TripStatus } from '../core/constants';
import { Offer } from '../modules/matching/matching.types';
import {
  DispatchHarness,
  cancelByRider,
  createDispatchHarness,
  waitFor
} from './helpers/dispatch-harness';

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

const DRIVER_A = 'driver-a';
const DRIVER_B = 'driver-b';

describe('MatchingEngine', () => {
  let h: DispatchHarness;

  afterEach(async () => {
    await h.shutdown();
  });

  /**
   * Resolves with the pending offer once it is addressed to driverId
   */
  function offerFor(tripId: string, driverId: string): Promise<Offer> {
    return waitFor(async () => {
      const offer = await h.engine.getActiveOffer(tripId);
      return offer && offer.driverId === driverId ? offer : null;
    });
  }

  // ===========================================================================
  // NO DRIVERS
  // ===========================================================================

  describe('when no driver is found', () => {
    beforeEach(() => {
      h = createDispatchHarness();
    });

    it('widens the radius, then expires the trip exactly once', async () => {
      const trip = await h.matchingTrip();

      const result = await h.engine.run(trip.id, new AbortController().signal);

      expect(result).toEqual({ tripId: trip.id, outcome: 'expired', driverId: null, offersMade: 0 });
      expect(h.geo.radiiQueried).toEqual([1, 2, 3]);
      expect((await h.repository.get(trip.id))?.status).toBe(TripStatus.EXPIRED);
      expect(h.broker.ofType(EventType.TRIP_EXPIRED)).toHaveLength(1);
      expect(h.broker.ofType(EventType.OFFER_CREATED)).toHaveLength(0);
    });

    it('treats a failing geo index as an empty result', async () => {
      h.geo.failure = new Error('GEORADIUS timed out');
      const trip = await h.matchingTrip();

      const result = await h.engine.run(trip.id, new AbortController().signal);

      expect(result.outcome).toBe('expired');
      expect(h.geo.radiiQueried).toEqual([1, 2, 3]);
    });

    it('stops after maxRetries even when the radius could still grow', async () => {
      await h.shutdown();
      h = createDispatchHarness({ maxRadiusKm: 10, maxRetries: 2 });
      const trip = await h.matchingTrip();

      const result = await h.engine.run(trip.id, new AbortController().signal);

      expect(result.outcome).toBe('expired');
      expect(h.geo.radiiQueried).toEqual([1, 2]);
    });
  });

  // ===========================================================================
  // OFFERS
  // ===========================================================================

  describe('offers', () => {
    beforeEach(() => {
      h = createDispatchHarness({ offerTimeoutMs: 200 });
      h.geo.drivers = [
        { driverId: DRIVER_B, distanceKm: 0.8 },
        { driverId: DRIVER_A, distanceKm: 0.5 }
      ];
    });

    it('offers to the nearest driver first', async () => {
      const trip = await h.matchingTrip();
      const run = h.engine.run(trip.id, new AbortController().signal);

      const offer = await offerFor(trip.id, DRIVER_A);
      expect(offer.status).toBe(OfferStatus.PENDING);
      expect(offer.distanceKm).toBe(0.5);
      expect(await h.engine.getDriverOffer(DRIVER_A)).toEqual(offer);

      expect(await h.engine.respond(trip.id, DRIVER_A, true)).toBe(true);

      expect(await run).toEqual({ tripId: trip.id, outcome: 'accepted', driverId: DRIVER_A, offersMade: 1 });
    });

    it('moves on when A times out and B accepts', async () => {
      const trip = await h.matchingTrip();
      const run = h.engine.run(trip.id, new AbortController().signal);

      await offerFor(trip.id, DRIVER_B);
      expect(await h.engine.respond(trip.id, DRIVER_B, true)).toBe(true);

      expect(await run).toEqual({ tripId: trip.id, outcome: 'accepted', driverId: DRIVER_B, offersMade: 2 });

      const stored = await h.repository.get(trip.id);
      expect(stored?.status).toBe(TripStatus.ACCEPTED);
      expect(stored?.driverId).toBe(DRIVER_B);
      expect(h.broker.ofType(EventType.TRIP_ACCEPTED)).toHaveLength(1);
      expect(h.broker.ofType(EventType.OFFER_EXPIRED).map(e => e.payload.driverId)).toEqual([DRIVER_A]);
      expect(h.broker.ofType(EventType.OFFER_ACCEPTED).map(e => e.payload.driverId)).toEqual([DRIVER_B]);
      expect(await h.offers.isRejected(trip.id, DRIVER_A)).toBe(true);
    });

    it('moves on immediately when A rejects', async () => {
      const trip = await h.matchingTrip();
      const run = h.engine.run(trip.id, new AbortController().signal);

      await offerFor(trip.id, DRIVER_A);
      expect(await h.engine.respond(trip.id, DRIVER_A, false)).toBe(true);
      await offerFor(trip.id, DRIVER_B);
      expect(await h.engine.respond(trip.id, DRIVER_B, true)).toBe(true);

      expect((await run).driverId).toBe(DRIVER_B);
      expect(h.broker.ofType(EventType.OFFER_REJECTED).map(e => e.payload.driverId)).toEqual([DRIVER_A]);
      expect(h.broker.ofType(EventType.OFFER_EXPIRED)).toHaveLength(0);
    });

    it('never offers the same trip to a driver twice', async () => {
      h.geo.drivers = [{ driverId: DRIVER_A, distanceKm: 0.5 }];
      const trip = await h.matchingTrip();

      const result = await h.engine.run(trip.id, new AbortController().signal);

      expect(result).toEqual({ tripId: trip.id, outcome: 'expired', driverId: null, offersMade: 1 });
      expect(h.broker.ofType(EventType.OFFER_CREATED).map(e => e.payload.driverId)).toEqual([DRIVER_A]);
    });

    it('offer.created carries the pickup and the offer fields', async () => {
      const trip = await h.matchingTrip();
      const run = h.engine.run(trip.id, new AbortController().signal);

      const offer = await offerFor(trip.id, DRIVER_A);
      await h.engine.respond(trip.id, DRIVER_A, true);
      await run;

      expect(h.broker.ofType(EventType.OFFER_CREATED)[0].payload).toEqual({
        offerId: offer.offerId,
        tripId: trip.id,
        driverId: DRIVER_A,
        status: 'pending',
        distanceKm: 0.5,
        expiresAt: offer.expiresAt,
        pickup: { latitude: 12.9716, longitude: 77.5946 }
      });
    });

    it('skips a driver who holds another trip\'s offer without touching it', async () => {
      const otherOffer: Offer = {
        offerId: 'offer-other',
        tripId: 'trip-other',
        driverId: DRIVER_A,
        status: OfferStatus.PENDING,
        distanceKm: 2,
        createdAt: new Date().toISOString(),
        expiresAt: new Date(Date.now() + 30000).toISOString()
      };
      await h.offers.claimDriver(otherOffer);
      await h.offers.recordTripOffer(otherOffer);

      const trip = await h.matchingTrip();
      const run = h.engine.run(trip.id, new AbortController().signal);

      await offerFor(trip.id, DRIVER_B);
      await h.engine.respond(trip.id, DRIVER_B, true);

      expect(await run).toEqual({ tripId: trip.id, outcome: 'accepted', driverId: DRIVER_B, offersMade: 1 });
      expect(await h.engine.getDriverOffer(DRIVER_A)).toEqual(otherOffer);
    });

    it('releases both slots once the offer settles', async () => {
      const trip = await h.matchingTrip();
      const run = h.engine.run(trip.id, new AbortController().signal);

      await offerFor(trip.id, DRIVER_A);
      await h.engine.respond(trip.id, DRIVER_A, true);
      await run;

      expect(await h.engine.getActiveOffer(trip.id)).toBeNull();
      expect(await h.engine.getDriverOffer(DRIVER_A)).toBeNull();
      expect(h.waiter.size).toBe(0);
    });

    it('keeps searching when the accepting driver already took another trip', async () => {
      const first = await h.matchingTrip('rider-1');
      const taken = await h.tripService.accept(first.id, DRIVER_A);
      expect(taken.success).toBe(true);

      const trip = await h.matchingTrip('rider-2');
      const run = h.engine.run(trip.id, new AbortController().signal);

      await offerFor(trip.id, DRIVER_A);
      expect(await h.engine.respond(trip.id, DRIVER_A, true)).toBe(true);
      await offerFor(trip.id, DRIVER_B);
      expect(await h.engine.respond(trip.id, DRIVER_B, true)).toBe(true);

      expect(await run).toEqual({ tripId: trip.id, outcome: 'accepted', driverId: DRIVER_B, offersMade: 2 });

      const stored = await h.repository.get(trip.id);
      expect(stored?.status).toBe(TripStatus.ACCEPTED);
      expect(stored?.driverId).toBe(DRIVER_B);
      expect(await h.offers.isRejected(trip.id, DRIVER_A)).toBe(true);
      expect(h.broker.ofType(EventType.OFFER_ACCEPTED).map(e => e.payload.driverId)).toEqual([DRIVER_B]);
    });
  });

  // ===========================================================================
  // RESPONSES
  // ===========================================================================

  describe('respond', () => {
    beforeEach(() => {
      h = createDispatchHarness({ offerTimeoutMs: 5000 });
      h.geo.drivers = [{ driverId: DRIVER_A, distanceKm: 0.5 }];
    });

    it('returns false when the trip has no pending offer', async () => {
      const trip = await h.matchingTrip();

      expect(await h.engine.respond(trip.id, DRIVER_A, true)).toBe(false);
    });

    it('ignores a response from a driver the offer is not addressed to', async () => {
      const controller = new AbortController();
      const trip = await h.matchingTrip();
      const run = h.engine.run(trip.id, controller.signal);

      await offerFor(trip.id, DRIVER_A);
      expect(await h.engine.respond(trip.id, DRIVER_B, true)).toBe(false);
      expect(await h.engine.respond(trip.id, DRIVER_A, true, 'offer-stale')).toBe(false);

      controller.abort();
      expect((await run).outcome).toBe('cancelled');
    });

    it('a second answer to the same offer is a no-op', async () => {
      const trip = await h.matchingTrip();
      const run = h.engine.run(trip.id, new AbortController().signal);

      const offer = await offerFor(trip.id, DRIVER_A);
      expect(await h.engine.respond(trip.id, DRIVER_A, true, offer.offerId)).toBe(true);
      expect(await h.engine.respond(trip.id, DRIVER_A, false, offer.offerId)).toBe(false);

      expect((await run).outcome).toBe('accepted');
    });
  });

  // ===========================================================================
  // CANCELLATION AND FAILURES
  // ===========================================================================

  describe('cancellation', () => {
    beforeEach(() => {
      h = createDispatchHarness({ offerTimeoutMs: 5000 });
      h.geo.drivers = [{ driverId: DRIVER_A, distanceKm: 0.5 }];
    });

    it('abort during the offer wait frees the driver and publishes nothing more', async () => {
      const controller = new AbortController();
      const trip = await h.matchingTrip();
      const run = h.engine.run(trip.id, controller.signal);

      await offerFor(trip.id, DRIVER_A);
      await cancelByRider(h.tripService, trip.id);
      const offerEventsBefore = h.broker.published.filter(e => e.eventType.startsWith('offer.')).length;

      controller.abort();

      expect(await run).toEqual({ tripId: trip.id, outcome: 'cancelled', driverId: null, offersMade: 1 });
      expect(await h.engine.getDriverOffer(DRIVER_A)).toBeNull();
      expect(await h.engine.getActiveOffer(trip.id)).toBeNull();
      expect(h.broker.published.filter(e => e.eventType.startsWith('offer.')).length).toBe(offerEventsBefore);
      expect(h.broker.ofType(EventType.TRIP_EXPIRED)).toHaveLength(0);
    });

    it('abort during backoff ends the task without expiring the trip', async () => {
      await h.shutdown();
      h = createDispatchHarness({ retryBackoffMs: 5000 });
      const controller = new AbortController();
      const trip = await h.matchingTrip();
      const run = h.engine.run(trip.id, controller.signal);

      await waitFor(async () => (h.geo.radiiQueried.length > 0 ? true : null));
      controller.abort();

      expect((await run).outcome).toBe('cancelled');
      expect((await h.repository.get(trip.id))?.status).toBe(TripStatus.MATCHING);
    });

    it('abort during the candidate search sends no offer', async () => {
      h.geo.delayMs = 100;
      const controller = new AbortController();
      const trip = await h.matchingTrip();
      const run = h.engine.run(trip.id, controller.signal);

      await waitFor(async () => (h.geo.radiiQueried.length > 0 ? true : null));
      await cancelByRider(h.tripService, trip.id);
      controller.abort();

      expect(await run).toEqual({ tripId: trip.id, outcome: 'cancelled', driverId: null, offersMade: 0 });
      expect(h.broker.ofType(EventType.OFFER_CREATED)).toHaveLength(0);
      expect(await h.engine.getDriverOffer(DRIVER_A)).toBeNull();
      expect(await h.engine.getActiveOffer(trip.id)).toBeNull();
    });

    it('expires after bounded searches when every offer attempt fails', async () => {
      await h.shutdown();
      h = createDispatchHarness();
      h.geo.drivers = [{ driverId: DRIVER_A, distanceKm: 0.5 }];
      jest.spyOn(h.offers, 'claimDriver').mockRejectedValue(new Error('store down'));
      const trip = await h.matchingTrip();

      const result = await h.engine.run(trip.id, new AbortController().signal);

      expect(result).toEqual({ tripId: trip.id, outcome: 'expired', driverId: null, offersMade: 0 });
      expect(h.geo.radiiQueried).toEqual([1, 1, 1]);
      expect((await h.repository.get(trip.id))?.status).toBe(TripStatus.EXPIRED);
      expect(h.broker.ofType(EventType.OFFER_CREATED)).toHaveLength(0);
    });

    it('returns superseded when the trip is no longer MATCHING', async () => {
      const trip = await h.matchingTrip();
      await cancelByRider(h.tripService, trip.id);

      const result = await h.engine.run(trip.id, new AbortController().signal);

      expect(result).toEqual({ tripId: trip.id, outcome: 'superseded', driverId: null, offersMade: 0 });
      expect(h.geo.radiiQueried).toEqual([]);
    });

    it('cancels the trip as a system error when the repository stays down', async () => {
      const trip = await h.matchingTrip();
      const get = jest.spyOn(h.tripService, 'get').mockRejectedValue(new Error('connection refused'));

      const result = await h.engine.run(trip.id, new AbortController().signal);

      expect(result.outcome).toBe('failed');
      expect(get).toHaveBeenCalledTimes(2);
      const stored = await h.repository.get(trip.id);
      expect(stored?.status).toBe(TripStatus.CANCELLED);
      expect(stored?.cancelledBy).toBe(CancelActor.SYSTEM);
      expect(stored?.cancellationReason).toBe(SYSTEM_ERROR_REASON);
    });
  });
});
