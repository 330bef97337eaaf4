/**
 * =============================================================================
 * TRIP MODULE - REPOSITORY
 * =============================================================================
 *
 * Persistence contract for trip records plus the in-memory implementation
 * used in development and tests.
 *
 * ATOMICITY:
 * Every status change goes through conditionalUpdateStatus(), the equivalent of
 *
 *   UPDATE trips SET status = $next, <allow-listed fields>
 *   WHERE id = $id AND status = $expected
 *   RETURNING *
 *
 * Zero rows -> null. Two callers racing on the same expected status: exactly
 * one gets the row back.
 *
 * UNIQUENESS (partial unique indexes in SQL):
 * - one trip per rider in RIDER_ACTIVE_STATUSES
 * - one trip per driver in DRIVER_ACTIVE_STATUSES
 * A write that would break either throws UniqueConstraintError.
 * =============================================================================
 */

import {
  DRIVER_ACTIVE_STATUSES,
  ErrorCode,
  RIDER_ACTIVE_STATUSES,
  TripStatus
} from '../../core/constants';
import { ConflictError } from '../../core/errors/AppError';
import {
  TRIP_UPDATABLE_FIELDS,
  Trip,
  TripHistoryEntry,
  TripListFilter,
  TripUpdatableField,
  TripUpdateFields
} from './trip.types';

export type TripConstraint = 'rider_active_trip' | 'driver_active_trip';

export class UniqueConstraintError extends ConflictError {
  constructor(public readonly constraint: TripConstraint, details: Record<string, unknown>) {
    super(
      `Unique constraint violated: ${constraint}`,
      constraint === 'rider_active_trip' ? ErrorCode.RIDER_HAS_ACTIVE_TRIP : ErrorCode.DRIVER_HAS_ACTIVE_TRIP,
      details
    );
  }
}

// =============================================================================
// CONTRACT
// =============================================================================

export interface ITripRepository {
  get(tripId: string): Promise<Trip | null>;
  create(trip: Trip): Promise<Trip>;
  /**
   * Set status=next (plus allow-listed fields) where status=expected.
   * Returns the updated trip, or null when no row matched.
   */
  conditionalUpdateStatus(
    tripId: string,
    expected: TripStatus,
    next: TripStatus,
    fields?: TripUpdateFields
  ): Promise<Trip | null>;
  /**
   * Write allow-listed fields without a status change, guarded by status
   */
  updateFields(tripId: string, expected: TripStatus, fields: TripUpdateFields): Promise<Trip | null>;
  findActiveByRider(riderId: string): Promise<Trip | null>;
  findActiveByDriver(driverId: string): Promise<Trip | null>;
  list(filter: TripListFilter): Promise<Trip[]>;
  recordHistory(entry: TripHistoryEntry): Promise<void>;
  getHistory(tripId: string): Promise<TripHistoryEntry[]>;
}

// =============================================================================
// FIELD ALLOW-LIST
// =============================================================================

function copyField<K extends TripUpdatableField>(target: TripUpdateFields, source: TripUpdateFields, key: K): void {
  if (source[key] !== undefined) {
    target[key] = source[key];
  }
}

/**
 * Keep only allow-listed keys; anything else a caller smuggles in is dropped
 */
export function pickUpdatableFields(fields: TripUpdateFields): TripUpdateFields {
  const picked: TripUpdateFields = {};
  for (const key of TRIP_UPDATABLE_FIELDS) {
    copyField(picked, fields, key);
  }
  return picked;
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION
// =============================================================================

/**
 * Each mutating method checks and writes without awaiting in between, so
 * the check-and-set is atomic on the event loop.
 */
export class InMemoryTripRepository implements ITripRepository {
  private trips = new Map<string, Trip>();
  private history = new Map<string, TripHistoryEntry[]>();

  async get(tripId: string): Promise<Trip | null> {
    const trip = this.trips.get(tripId);
    return trip ? structuredClone(trip) : null;
  }

  async create(trip: Trip): Promise<Trip> {
    if (this.trips.has(trip.id)) {
      throw new ConflictError(`Trip already exists: ${trip.id}`);
    }
    if (RIDER_ACTIVE_STATUSES.includes(trip.status) && this.activeFor('riderId', trip.riderId, RIDER_ACTIVE_STATUSES)) {
      throw new UniqueConstraintError('rider_active_trip', { riderId: trip.riderId });
    }

    this.trips.set(trip.id, structuredClone(trip));
    return structuredClone(trip);
  }

  async conditionalUpdateStatus(
    tripId: string,
    expected: TripStatus,
    next: TripStatus,
    fields: TripUpdateFields = {}
  ): Promise<Trip | null> {
    const current = this.trips.get(tripId);
    if (!current || current.status !== expected) {
      return null;
    }

    const updated: Trip = {
      ...current,
      ...pickUpdatableFields(fields),
      status: next,
      updatedAt: new Date().toISOString()
    };

    if (updated.driverId && DRIVER_ACTIVE_STATUSES.includes(next)) {
      const other = this.activeFor('driverId', updated.driverId, DRIVER_ACTIVE_STATUSES);
      if (other && other.id !== tripId) {
        throw new UniqueConstraintError('driver_active_trip', { driverId: updated.driverId, tripId: other.id });
      }
    }

    this.trips.set(tripId, updated);
    return structuredClone(updated);
  }

  async updateFields(tripId: string, expected: TripStatus, fields: TripUpdateFields): Promise<Trip | null> {
    const current = this.trips.get(tripId);
    if (!current || current.status !== expected) {
      return null;
    }

    const updated: Trip = {
      ...current,
      ...pickUpdatableFields(fields),
      updatedAt: new Date().toISOString()
    };
    this.trips.set(tripId, updated);
    return structuredClone(updated);
  }

  async findActiveByRider(riderId: string): Promise<Trip | null> {
    const trip = this.activeFor('riderId', riderId, RIDER_ACTIVE_STATUSES);
    return trip ? structuredClone(trip) : null;
  }

  async findActiveByDriver(driverId: string): Promise<Trip | null> {
    const trip = this.activeFor('driverId', driverId, DRIVER_ACTIVE_STATUSES);
    return trip ? structuredClone(trip) : null;
  }

  async list(filter: TripListFilter): Promise<Trip[]> {
    return Array.from(this.trips.values())
      .filter(t => !filter.riderId || t.riderId === filter.riderId)
      .filter(t => !filter.driverId || t.driverId === filter.driverId)
      .filter(t => !filter.status || t.status === filter.status)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(filter.offset, filter.offset + filter.limit)
      .map(t => structuredClone(t));
  }

  async recordHistory(entry: TripHistoryEntry): Promise<void> {
    const entries = this.history.get(entry.tripId) ?? [];
    entries.push(structuredClone(entry));
    this.history.set(entry.tripId, entries);
  }

  async getHistory(tripId: string): Promise<TripHistoryEntry[]> {
    return structuredClone(this.history.get(tripId) ?? []);
  }

  private activeFor(field: 'riderId' | 'driverId', id: string, statuses: readonly TripStatus[]): Trip | undefined {
    for (const trip of this.trips.values()) {
      if (trip[field] === id && statuses.includes(trip.status)) {
        return trip;
      }
    }
    return undefined;
  }
}
