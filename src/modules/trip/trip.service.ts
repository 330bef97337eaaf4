/**
 * =============================================================================
 * TRIP MODULE - SERVICE
 * =============================================================================
 *
 * Owns every trip status change. Each operation follows the same path:
 *
 *   1. Load current row (repository, never the cache)
 *   2. Validate the move against the transition table
 *   3. Conditional update: status = next WHERE status = current
 *   4. Invalidate the read cache
 *   5. Record history + publish the domain event (best effort)
 *
 * Rejections (not found, invalid move, business rule, lost race) are returned
 * as `{ success: false, error }`. Only infrastructure failures throw.
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import {
  CancelActor,
  ErrorCode,
  EventType,
  EventTypeName,
  TERMINAL_TRIP_STATUSES,
  TripStatus
} from '../../core/constants';
import {
  AppError,
  BusinessRuleViolationError,
  TripNotFoundError,
  TripStatusConflictError,
  ValidationError,
  errorMessage
} from '../../core/errors/AppError';
import { createDomainEvent } from '../../shared/events/domain-event';
import { EventBus } from '../../shared/events/event-bus.service';
import { CacheService } from '../../shared/services/cache.service';
import { logger } from '../../shared/services/logger.service';
import { ITripRepository, UniqueConstraintError } from './trip.repository';
import { validateTransition } from './trip-state-machine';
import {
  CreateTripRequest,
  RatingBy,
  TransitionResult,
  Trip,
  TripHistoryEntry,
  TripListFilter,
  TripUpdateFields
} from './trip.types';

export interface TripServiceOptions {
  cacheTtlSeconds: number;
}

interface TransitionPlan {
  to: TripStatus;
  eventType: EventTypeName;
  fields?: TripUpdateFields;
  /** Extra precondition run after the table check */
  guard?: (trip: Trip) => Promise<AppError | null>;
}

function fail(error: AppError): TransitionResult {
  return { success: false, error };
}

export class TripService {
  constructor(
    private repository: ITripRepository,
    private eventBus: EventBus,
    private cache: CacheService,
    private options: TripServiceOptions
  ) { }

  // ===========================================================================
  // READS
  // ===========================================================================

  /**
   * Read-through cache. Only non-terminal trips are cached; terminal rows
   * never change again and are rarely read.
   */
  async get(tripId: string): Promise<Trip | null> {
    const key = CacheService.tripKey(tripId);
    const cached = await this.cache.get<Trip>(key);
    if (cached) {
      return cached;
    }

    const trip = await this.repository.get(tripId);
    if (trip && !TERMINAL_TRIP_STATUSES.includes(trip.status)) {
      await this.cache.set(key, trip, this.options.cacheTtlSeconds);
    }
    return trip;
  }

  async list(filter: TripListFilter): Promise<Trip[]> {
    return this.repository.list(filter);
  }

  async getHistory(tripId: string): Promise<TripHistoryEntry[]> {
    return this.repository.getHistory(tripId);
  }

  // ===========================================================================
  // CREATE
  // ===========================================================================

  async create(request: CreateTripRequest): Promise<TransitionResult> {
    const active = await this.repository.findActiveByRider(request.riderId);
    if (active) {
      return fail(this.riderBusy(request.riderId, active.id));
    }

    const now = new Date().toISOString();
    const trip: Trip = {
      id: uuidv4(),
      riderId: request.riderId,
      driverId: null,
      pickup: request.pickup,
      dropoff: request.dropoff,
      status: TripStatus.PENDING,
      fareEstimate: request.fareEstimate,
      finalFare: null,
      surgeMultiplier: request.surgeMultiplier ?? 1,
      distanceKm: request.distanceKm ?? null,
      notes: request.notes ?? null,
      createdAt: now,
      updatedAt: now,
      matchingStartedAt: null,
      acceptedAt: null,
      arrivedAt: null,
      startedAt: null,
      completedAt: null,
      cancelledAt: null,
      expiredAt: null,
      cancelledBy: null,
      cancellationReason: null,
      riderRating: null,
      driverRating: null
    };

    let created: Trip;
    try {
      created = await this.repository.create(trip);
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        // Lost a race with a concurrent create for the same rider
        return fail(this.riderBusy(request.riderId, null));
      }
      throw error;
    }

    logger.info(`[Trip] Created ${created.id}`, { tripId: created.id, riderId: created.riderId });

    await this.afterWrite(created, null, EventType.TRIP_CREATED, {
      pickup: created.pickup,
      dropoff: created.dropoff,
      fareEstimate: created.fareEstimate,
      surgeMultiplier: created.surgeMultiplier
    });

    return { success: true, trip: created };
  }

  // ===========================================================================
  // TRANSITIONS
  // ===========================================================================

  async startMatching(tripId: string): Promise<TransitionResult> {
    return this.transition(tripId, () => ({
      to: TripStatus.MATCHING,
      eventType: EventType.TRIP_MATCHING_REQUESTED,
      fields: { matchingStartedAt: new Date().toISOString() }
    }), (trip) => ({
      pickup: { latitude: trip.pickup.latitude, longitude: trip.pickup.longitude }
    }));
  }

  async accept(tripId: string, driverId: string): Promise<TransitionResult> {
    return this.transition(tripId, () => ({
      to: TripStatus.ACCEPTED,
      eventType: EventType.TRIP_ACCEPTED,
      fields: { driverId, acceptedAt: new Date().toISOString() },
      guard: async () => {
        const busy = await this.repository.findActiveByDriver(driverId);
        return busy ? this.driverBusy(driverId, busy.id) : null;
      }
    }));
  }

  async driverArrived(tripId: string): Promise<TransitionResult> {
    return this.transition(tripId, () => ({
      to: TripStatus.DRIVER_ARRIVED,
      eventType: EventType.TRIP_DRIVER_ARRIVED,
      fields: { arrivedAt: new Date().toISOString() }
    }));
  }

  async startRide(tripId: string): Promise<TransitionResult> {
    return this.transition(tripId, () => ({
      to: TripStatus.IN_PROGRESS,
      eventType: EventType.TRIP_STARTED,
      fields: { startedAt: new Date().toISOString() }
    }));
  }

  async complete(tripId: string, finalFare: number): Promise<TransitionResult> {
    return this.transition(tripId, () => ({
      to: TripStatus.COMPLETED,
      eventType: EventType.TRIP_COMPLETED,
      fields: { finalFare, completedAt: new Date().toISOString() }
    }), () => ({ finalFare }));
  }

  /**
   * Cancelling an already cancelled trip returns it unchanged, no event
   */
  async cancel(tripId: string, actor: CancelActor, reason: string): Promise<TransitionResult> {
    const current = await this.repository.get(tripId);
    if (current?.status === TripStatus.CANCELLED) {
      logger.debug(`[Trip] ${tripId} already cancelled`, { tripId });
      return { success: true, trip: current };
    }

    return this.transition(tripId, () => ({
      to: TripStatus.CANCELLED,
      eventType: EventType.TRIP_CANCELLED,
      fields: {
        cancelledAt: new Date().toISOString(),
        cancelledBy: actor,
        cancellationReason: reason
      }
    }), () => ({ actor, reason }), current);
  }

  async expire(tripId: string): Promise<TransitionResult> {
    return this.transition(tripId, () => ({
      to: TripStatus.EXPIRED,
      eventType: EventType.TRIP_EXPIRED,
      fields: { expiredAt: new Date().toISOString() }
    }));
  }

  // ===========================================================================
  // RATING
  // ===========================================================================

  /**
   * One rating per side on a COMPLETED trip; no status change
   */
  async rate(tripId: string, by: RatingBy, rating: number): Promise<TransitionResult> {
    if (!Number.isInteger(rating) || rating < 1 || rating > 5) {
      return fail(new ValidationError('Rating must be an integer from 1 to 5', [], ErrorCode.INVALID_RATING, { rating }));
    }

    const trip = await this.repository.get(tripId);
    if (!trip) {
      return fail(new TripNotFoundError(tripId));
    }
    if (trip.status !== TripStatus.COMPLETED) {
      return fail(new ValidationError('Only completed trips can be rated', [], ErrorCode.INVALID_RATING, {
        tripId,
        status: trip.status
      }));
    }

    // The rider rates the driver and vice versa
    const field = by === 'rider' ? 'driverRating' : 'riderRating';
    const fields: TripUpdateFields = by === 'rider' ? { driverRating: rating } : { riderRating: rating };
    if (trip[field] !== null) {
      return fail(new BusinessRuleViolationError(`Trip already rated by ${by}`, ErrorCode.TRIP_ALREADY_RATED, { tripId, by }));
    }

    const updated = await this.repository.updateFields(tripId, TripStatus.COMPLETED, fields);
    if (!updated) {
      return fail(new TripStatusConflictError(tripId, TripStatus.COMPLETED));
    }

    await this.afterWrite(updated, TripStatus.COMPLETED, EventType.TRIP_RATED, { by, rating });
    return { success: true, trip: updated };
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async transition(
    tripId: string,
    build: () => TransitionPlan,
    payload: (trip: Trip) => Record<string, unknown> = () => ({}),
    preloaded?: Trip | null
  ): Promise<TransitionResult> {
    const current = preloaded !== undefined ? preloaded : await this.repository.get(tripId);
    if (!current) {
      return fail(new TripNotFoundError(tripId));
    }

    const plan = build();
    const invalid = validateTransition(current.status, plan.to);
    if (invalid) {
      logger.debug(`[Trip] Rejected ${current.status} -> ${plan.to}`, { tripId });
      return fail(invalid);
    }

    if (plan.guard) {
      const violation = await plan.guard(current);
      if (violation) {
        return fail(violation);
      }
    }

    let updated: Trip | null;
    try {
      updated = await this.repository.conditionalUpdateStatus(tripId, current.status, plan.to, plan.fields);
    } catch (error) {
      if (error instanceof UniqueConstraintError && error.constraint === 'driver_active_trip') {
        return fail(this.driverBusy(String(error.details?.driverId), null));
      }
      throw error;
    }

    if (!updated) {
      logger.warn(`[Trip] Conditional update lost race on ${tripId}`, { tripId, expected: current.status, next: plan.to });
      return fail(new TripStatusConflictError(tripId, current.status));
    }

    logger.info(`[Trip] ${tripId}: ${current.status} -> ${updated.status}`, { tripId, driverId: updated.driverId });

    await this.afterWrite(updated, current.status, plan.eventType, payload(updated));
    return { success: true, trip: updated };
  }

  /**
   * Cache invalidation, audit and event publication. None of these can undo
   * the write that already happened, so failures are logged only.
   */
  private async afterWrite(
    trip: Trip,
    fromStatus: TripStatus | null,
    eventType: EventTypeName,
    extra: Record<string, unknown>
  ): Promise<void> {
    await this.cache.delete(CacheService.tripKey(trip.id));

    const payload: Record<string, unknown> = {
      tripId: trip.id,
      riderId: trip.riderId,
      driverId: trip.driverId,
      fromStatus,
      toStatus: trip.status,
      ...extra
    };

    try {
      await this.repository.recordHistory({
        tripId: trip.id,
        eventType,
        fromStatus,
        toStatus: trip.status,
        at: new Date().toISOString(),
        details: extra
      });
    } catch (error) {
      logger.error(`[Trip] Failed to record history for ${trip.id}`, { tripId: trip.id, error: errorMessage(error) });
    }

    await this.eventBus.publish(createDomainEvent(eventType, payload));
  }

  private riderBusy(riderId: string, activeTripId: string | null): BusinessRuleViolationError {
    return new BusinessRuleViolationError('Rider already has an active trip', ErrorCode.RIDER_HAS_ACTIVE_TRIP, {
      riderId,
      ...(activeTripId ? { activeTripId } : {})
    });
  }

  private driverBusy(driverId: string, activeTripId: string | null): BusinessRuleViolationError {
    return new BusinessRuleViolationError('Driver already has an active trip', ErrorCode.DRIVER_HAS_ACTIVE_TRIP, {
      driverId,
      ...(activeTripId ? { activeTripId } : {})
    });
  }
}
