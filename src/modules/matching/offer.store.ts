/**
 * =============================================================================
 * MATCHING MODULE - OFFER STORE
 * =============================================================================
 *
 * Active-offer slots and per-trip exclusion sets, kept in Redis with TTLs
 * (in-memory fallback when Redis is disabled).
 *
 * REDIS KEYS:
 * - offer:trip:{tripId}         JSON Offer     the trip's single PENDING offer
 * - offer:driver:{driverId}     "{tripId}|{offerId}"  the driver's single PENDING offer
 * - dispatch:notified:{tripId}  SET of driverIds already sent an offer
 * - dispatch:rejected:{tripId}  SET of driverIds that rejected / timed out
 *
 * The driver slot is claimed with SET NX: a second claim for an occupied
 * driver fails and leaves the first offer untouched. Releases are
 * compare-and-delete, so a task can only clear the slot it owns.
 * Slot TTLs outlive the offer timeout slightly, so a crashed process never
 * leaves a driver blocked for long.
 * =============================================================================
 */

import { RedisService } from '../../shared/services/redis.service';
import { Offer } from './matching.types';

const SLOT_GRACE_SECONDS = 5;

const REDIS_KEYS = {
  TRIP_SLOT: (tripId: string) => `offer:trip:${tripId}`,
  DRIVER_SLOT: (driverId: string) => `offer:driver:${driverId}`,
  NOTIFIED: (tripId: string) => `dispatch:notified:${tripId}`,
  REJECTED: (tripId: string) => `dispatch:rejected:${tripId}`
};

export interface OfferStoreOptions {
  offerTimeoutMs: number;
  exclusionTtlSeconds: number;
}

export class OfferStore {
  constructor(private redis: RedisService, private options: OfferStoreOptions) { }

  private get slotTtlSeconds(): number {
    return Math.ceil(this.options.offerTimeoutMs / 1000) + SLOT_GRACE_SECONDS;
  }

  private static driverSlotValue(offer: Offer): string {
    return `${offer.tripId}|${offer.offerId}`;
  }

  // ===========================================================================
  // SLOTS
  // ===========================================================================

  /**
   * Atomically take the driver's slot. False when the driver already holds
   * a different pending offer.
   */
  async claimDriver(offer: Offer): Promise<boolean> {
    return this.redis.setIfAbsent(REDIS_KEYS.DRIVER_SLOT(offer.driverId), OfferStore.driverSlotValue(offer), this.slotTtlSeconds);
  }

  async recordTripOffer(offer: Offer): Promise<void> {
    await this.redis.setJSON(REDIS_KEYS.TRIP_SLOT(offer.tripId), offer, this.slotTtlSeconds);
  }

  async getTripOffer(tripId: string): Promise<Offer | null> {
    return this.redis.getJSON<Offer>(REDIS_KEYS.TRIP_SLOT(tripId));
  }

  /**
   * The pending offer a driver currently holds, if any
   */
  async getDriverOffer(driverId: string): Promise<Offer | null> {
    const slot = await this.redis.get(REDIS_KEYS.DRIVER_SLOT(driverId));
    if (!slot) return null;

    const [tripId, offerId] = slot.split('|');
    const offer = await this.getTripOffer(tripId);
    return offer && offer.offerId === offerId ? offer : null;
  }

  async releaseDriver(offer: Offer): Promise<boolean> {
    return this.redis.deleteIfEquals(REDIS_KEYS.DRIVER_SLOT(offer.driverId), OfferStore.driverSlotValue(offer));
  }

  async releaseTrip(offer: Offer): Promise<boolean> {
    const current = await this.getTripOffer(offer.tripId);
    if (!current || current.offerId !== offer.offerId) {
      return false;
    }
    // Only this trip's own task writes its trip slot
    return this.redis.del(REDIS_KEYS.TRIP_SLOT(offer.tripId));
  }

  // ===========================================================================
  // EXCLUSION SETS
  // ===========================================================================

  async markNotified(tripId: string, driverId: string): Promise<void> {
    await this.redis.sAdd(REDIS_KEYS.NOTIFIED(tripId), driverId);
    await this.redis.expire(REDIS_KEYS.NOTIFIED(tripId), this.options.exclusionTtlSeconds);
  }

  async markRejected(tripId: string, driverId: string): Promise<void> {
    await this.redis.sAdd(REDIS_KEYS.REJECTED(tripId), driverId);
    await this.redis.expire(REDIS_KEYS.REJECTED(tripId), this.options.exclusionTtlSeconds);
  }

  /**
   * Union of the notified and rejected sets
   */
  async getExcluded(tripId: string): Promise<Set<string>> {
    const [notified, rejected] = await Promise.all([
      this.redis.sMembers(REDIS_KEYS.NOTIFIED(tripId)),
      this.redis.sMembers(REDIS_KEYS.REJECTED(tripId))
    ]);
    return new Set([...notified, ...rejected]);
  }

  async isRejected(tripId: string, driverId: string): Promise<boolean> {
    return this.redis.sIsMember(REDIS_KEYS.REJECTED(tripId), driverId);
  }
}
