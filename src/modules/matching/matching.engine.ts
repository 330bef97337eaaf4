/**
 * =============================================================================
 * MATCHING MODULE - ENGINE
 * =============================================================================
 *
 * Drives one trip from MATCHING to ACCEPTED (or EXPIRED).
 *
 * SEARCH LOOP:
 *   radius = minRadiusKm, retries = 0
 *   while radius <= maxRadiusKm && retries < maxRetries:
 *     candidates = geo.nearby(pickup, radius, maxCandidates)   (error -> [])
 *     eligible   = candidates - notified - rejected
 *     none  -> radius += radiusStepKm, retries++, back off, continue
 *     else  -> offer to eligible[0] and wait
 *              accepted -> TripService.accept, offer.accepted, done
 *                          refused while the trip is still MATCHING
 *                          (driver busy elsewhere) -> driver rejected, continue
 *              otherwise -> next iteration, radius/retries untouched
 *   exhausted -> TripService.expire
 *
 * OFFER PROTOCOL:
 *   claim driver slot (SET NX) -> busy? mark notified, skip
 *   record trip slot -> offer.created -> mark notified -> wait
 *   every outcome releases both slots before the task moves on
 *
 * CANCELLATION:
 *   The AbortSignal wakes the offer wait and the backoff sleep immediately,
 *   and is checked again after the geo query and before the driver slot is
 *   claimed or offer.created is published. A cancelled task releases its
 *   slots and publishes nothing further.
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import { CancelActor, EventType, EventTypeName, OfferStatus, SYSTEM_ERROR_REASON, TripStatus } from '../../core/constants';
import { errorMessage } from '../../core/errors/AppError';
import { DispatchConfig } from '../../config/environment';
import { createDomainEvent } from '../../shared/events/domain-event';
import { EventBus } from '../../shared/events/event-bus.service';
import { AbortedError, sleep, withRetry } from '../../shared/resilience/retry';
import { logger } from '../../shared/services/logger.service';
import { IGeoCandidateSource, DriverCandidate } from '../geo/geo-candidate.source';
import { TripService } from '../trip/trip.service';
import { TransitionResult, Trip } from '../trip/trip.types';
import { MatchOutcome, MatchResult, Offer, OfferOutcome } from './matching.types';
import { OfferResponseWaiter } from './offer-response.waiter';
import { OfferStore } from './offer.store';

export type MatchingEngineConfig = Pick<
  DispatchConfig,
  | 'minRadiusKm'
  | 'maxRadiusKm'
  | 'radiusStepKm'
  | 'maxRetries'
  | 'maxCandidates'
  | 'offerTimeoutMs'
  | 'retryBackoffMs'
  | 'repositoryRetries'
  | 'repositoryRetryDelayMs'
>;

/**
 * Raised when the trip repository stays down for the whole retry budget
 */
class RepositoryExhaustedError extends Error {
  constructor(operation: string, cause: unknown) {
    super(`${operation} failed after retries: ${errorMessage(cause)}`);
    this.name = 'RepositoryExhaustedError';
  }
}

export class MatchingEngine {
  constructor(
    private tripService: TripService,
    private geo: IGeoCandidateSource,
    private offers: OfferStore,
    private waiter: OfferResponseWaiter,
    private eventBus: EventBus,
    private config: MatchingEngineConfig
  ) { }

  // ===========================================================================
  // TASK ENTRY POINT
  // ===========================================================================

  /**
   * Run the search for one trip until it is accepted, expires or the signal
   * aborts. Never rejects for domain outcomes.
   */
  async run(tripId: string, signal: AbortSignal): Promise<MatchResult> {
    let offersMade = 0;
    const result = (outcome: MatchOutcome, driverId: string | null = null): MatchResult =>
      ({ tripId, outcome, driverId, offersMade });

    try {
      const trip = await this.repositoryCall('load trip', () => this.tripService.get(tripId), signal);
      if (!trip || trip.status !== TripStatus.MATCHING) {
        logger.info(`[Matching] ${tripId} is not MATCHING (${trip?.status ?? 'missing'}), nothing to do`, { tripId });
        return result('superseded');
      }

      let radius = this.config.minRadiusKm;
      let retries = 0;

      logger.info(`[Matching] Started for ${tripId}`, { tripId });

      while (radius <= this.config.maxRadiusKm && retries < this.config.maxRetries) {
        if (signal.aborted) return result('cancelled');

        const eligible = await this.findEligible(trip, radius);
        if (signal.aborted) return result('cancelled');

        if (eligible.length === 0) {
          radius += this.config.radiusStepKm;
          retries++;
          logger.debug(`[Matching] ${tripId}: no eligible drivers, widening to ${radius}km (retry ${retries}/${this.config.maxRetries})`, { tripId });

          if (radius <= this.config.maxRadiusKm && retries < this.config.maxRetries) {
            await sleep(this.config.retryBackoffMs, signal);
          }
          continue;
        }

        const candidate = eligible[0];
        let attempt: { outcome: OfferOutcome; offer: Offer };
        try {
          attempt = await this.offerTrip(trip, candidate, signal);
        } catch (error) {
          if (error instanceof AbortedError || signal.aborted) throw error;
          // A failed offer attempt counts against the retry budget
          logger.warn(`[Matching] ${tripId}: offer to ${candidate.driverId} failed`, {
            tripId,
            driverId: candidate.driverId,
            error: errorMessage(error)
          });
          retries++;
          continue;
        }

        const { outcome, offer } = attempt;

        if (outcome === 'busy') continue;
        offersMade++;

        if (outcome === OfferStatus.CANCELLED) {
          return result('cancelled');
        }

        if (outcome === OfferStatus.ACCEPTED) {
          const final = await this.finalizeAccept(trip, offer, signal);
          if (final !== null) {
            return result(final, offer.driverId);
          }
        }
      }

      if (signal.aborted) return result('cancelled');

      return result(await this.finalizeExpire(trip, signal));
    } catch (error) {
      if (error instanceof AbortedError || signal.aborted) {
        logger.info(`[Matching] ${tripId} cancelled`, { tripId });
        return result('cancelled');
      }
      if (error instanceof RepositoryExhaustedError) {
        await this.escalate(tripId, error);
        return result('failed');
      }
      throw error;
    }
  }

  // ===========================================================================
  // DRIVER-FACING
  // ===========================================================================

  /**
   * Driver answer. Returns false (no-op) when the trip has no pending offer
   * for this driver, or when offerId names an older offer.
   */
  async respond(tripId: string, driverId: string, accepted: boolean, offerId?: string): Promise<boolean> {
    const active = await this.offers.getTripOffer(tripId);

    if (!active || active.driverId !== driverId || (offerId !== undefined && active.offerId !== offerId)) {
      logger.debug(`[Matching] Ignoring stale response from ${driverId} for ${tripId}`, { tripId, driverId, offerId });
      return false;
    }

    const woke = this.waiter.resolve(active.offerId, accepted);
    if (woke) {
      logger.info(`[Matching] ${driverId} ${accepted ? 'accepted' : 'rejected'} offer ${active.offerId}`, { tripId, driverId });
    }
    return woke;
  }

  async getActiveOffer(tripId: string): Promise<Offer | null> {
    return this.offers.getTripOffer(tripId);
  }

  async getDriverOffer(driverId: string): Promise<Offer | null> {
    return this.offers.getDriverOffer(driverId);
  }

  // ===========================================================================
  // SEARCH
  // ===========================================================================

  /**
   * Geo query minus the exclusion sets. Infrastructure errors are logged
   * and count as an empty iteration.
   */
  private async findEligible(trip: Trip, radiusKm: number): Promise<DriverCandidate[]> {
    try {
      const candidates = await this.geo.nearby(
        trip.pickup.latitude,
        trip.pickup.longitude,
        radiusKm,
        this.config.maxCandidates
      );
      if (candidates.length === 0) return [];

      const excluded = await this.offers.getExcluded(trip.id);
      return candidates.filter(c => !excluded.has(c.driverId));
    } catch (error) {
      logger.warn(`[Matching] ${trip.id}: candidate search failed at ${radiusKm}km, treating as empty`, {
        tripId: trip.id,
        error: errorMessage(error)
      });
      return [];
    }
  }

  // ===========================================================================
  // OFFER PROTOCOL
  // ===========================================================================

  private async offerTrip(
    trip: Trip,
    candidate: DriverCandidate,
    signal: AbortSignal
  ): Promise<{ outcome: OfferOutcome; offer: Offer }> {
    const now = Date.now();
    const offer: Offer = {
      offerId: uuidv4(),
      tripId: trip.id,
      driverId: candidate.driverId,
      status: OfferStatus.PENDING,
      distanceKm: candidate.distanceKm,
      createdAt: new Date(now).toISOString(),
      expiresAt: new Date(now + this.config.offerTimeoutMs).toISOString()
    };

    if (signal.aborted) throw new AbortedError();

    const claimed = await this.offers.claimDriver(offer);
    if (!claimed) {
      logger.debug(`[Matching] ${candidate.driverId} already holds an offer, skipping`, { tripId: trip.id });
      await this.offers.markNotified(trip.id, candidate.driverId);
      return { outcome: 'busy', offer };
    }

    let outcome: OfferStatus.ACCEPTED | OfferStatus.REJECTED | OfferStatus.EXPIRED | OfferStatus.CANCELLED;
    try {
      await this.offers.recordTripOffer(offer);
      if (signal.aborted) throw new AbortedError();
      await this.publish(EventType.OFFER_CREATED, offer, {
        pickup: { latitude: trip.pickup.latitude, longitude: trip.pickup.longitude }
      });
      await this.offers.markNotified(trip.id, candidate.driverId);

      logger.info(`[Matching] Offer ${offer.offerId} sent to ${offer.driverId} (${offer.distanceKm.toFixed(2)}km)`, {
        tripId: trip.id,
        driverId: offer.driverId
      });

      outcome = await this.waiter.wait(offer.offerId, this.config.offerTimeoutMs, signal);
    } catch (error) {
      await this.releaseSlots(offer);
      throw error;
    }

    await this.releaseSlots(offer);

    if (outcome === OfferStatus.REJECTED || outcome === OfferStatus.EXPIRED) {
      await this.offers.markRejected(trip.id, offer.driverId);
      await this.publish(
        outcome === OfferStatus.REJECTED ? EventType.OFFER_REJECTED : EventType.OFFER_EXPIRED,
        { ...offer, status: outcome }
      );
      logger.info(`[Matching] Offer ${offer.offerId} ${outcome}`, { tripId: trip.id, driverId: offer.driverId });
    }

    return { outcome, offer: { ...offer, status: outcome } };
  }

  /**
   * Best effort; slot TTLs clean up whatever this cannot
   */
  private async releaseSlots(offer: Offer): Promise<void> {
    try {
      await this.offers.releaseDriver(offer);
      await this.offers.releaseTrip(offer);
    } catch (error) {
      logger.error(`[Matching] Failed to release slots for offer ${offer.offerId}`, {
        tripId: offer.tripId,
        driverId: offer.driverId,
        error: errorMessage(error)
      });
    }
  }

  // ===========================================================================
  // TERMINATION
  // ===========================================================================

  /**
   * null when the driver could not take the trip but the trip is still
   * MATCHING: the driver is excluded and the search goes on.
   */
  private async finalizeAccept(trip: Trip, offer: Offer, signal: AbortSignal): Promise<MatchOutcome | null> {
    if (signal.aborted) return 'cancelled';

    const accepted = await this.repositoryCall('accept', () => this.tripService.accept(trip.id, offer.driverId), signal);
    if (!accepted.success) {
      logger.warn(`[Matching] ${trip.id}: accept by ${offer.driverId} refused: ${accepted.error.message}`, {
        tripId: trip.id,
        driverId: offer.driverId,
        code: accepted.error.code
      });

      const current = await this.repositoryCall('reload trip', () => this.tripService.get(trip.id), signal);
      if (current?.status !== TripStatus.MATCHING) {
        return 'superseded';
      }
      await this.offers.markRejected(trip.id, offer.driverId);
      return null;
    }

    await this.publish(EventType.OFFER_ACCEPTED, offer);
    logger.info(`[Matching] ${trip.id} matched with ${offer.driverId}`, { tripId: trip.id, driverId: offer.driverId });
    return 'accepted';
  }

  private async finalizeExpire(trip: Trip, signal: AbortSignal): Promise<MatchOutcome> {
    const expired = await this.repositoryCall('expire', () => this.tripService.expire(trip.id), signal);
    if (!expired.success) {
      logger.warn(`[Matching] ${trip.id}: expire refused: ${expired.error.message}`, { tripId: trip.id });
      return 'superseded';
    }

    logger.info(`[Matching] ${trip.id} expired, no driver found`, { tripId: trip.id });
    return 'expired';
  }

  /**
   * Repository stayed down: cancel the trip as a system error
   */
  private async escalate(tripId: string, cause: RepositoryExhaustedError): Promise<void> {
    logger.error(`[Matching] ${tripId}: ${cause.message}, cancelling trip`, { tripId });
    try {
      const cancelled: TransitionResult = await this.tripService.cancel(tripId, CancelActor.SYSTEM, SYSTEM_ERROR_REASON);
      if (!cancelled.success) {
        logger.error(`[Matching] ${tripId}: system cancel refused: ${cancelled.error.message}`, { tripId });
      }
    } catch (error) {
      logger.error(`[Matching] ${tripId}: system cancel failed`, { tripId, error: errorMessage(error) });
    }
  }

  private async repositoryCall<T>(operation: string, fn: () => Promise<T>, signal: AbortSignal): Promise<T> {
    try {
      return await withRetry(fn, {
        maxAttempts: this.config.repositoryRetries,
        baseDelayMs: this.config.repositoryRetryDelayMs,
        signal,
        operation: `trip ${operation}`,
        shouldRetry: (error) => !(error instanceof AbortedError)
      });
    } catch (error) {
      if (error instanceof AbortedError) throw error;
      throw new RepositoryExhaustedError(operation, error);
    }
  }

  private async publish(eventType: EventTypeName, offer: Offer, extra: Record<string, unknown> = {}): Promise<void> {
    await this.eventBus.publish(createDomainEvent(eventType, {
      offerId: offer.offerId,
      tripId: offer.tripId,
      driverId: offer.driverId,
      status: offer.status,
      distanceKm: offer.distanceKm,
      expiresAt: offer.expiresAt,
      ...extra
    }));
  }
}
