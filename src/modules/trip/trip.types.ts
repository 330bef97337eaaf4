/**
 * =============================================================================
 * TRIP MODULE - TYPES
 * =============================================================================
 */

import { CancelActor, TripStatus } from '../../core/constants';
import { AppError } from '../../core/errors/AppError';

export interface Location {
  latitude: number;
  longitude: number;
  address?: string;
}

/**
 * One ride request and its full lifecycle record.
 *
 * Timestamps are ISO-8601 strings. `driverRating` is the score the rider
 * gave the driver; `riderRating` the score the driver gave the rider.
 */
export interface Trip {
  id: string;
  riderId: string;
  driverId: string | null;
  pickup: Location;
  dropoff: Location;
  status: TripStatus;

  fareEstimate: number;
  finalFare: number | null;
  surgeMultiplier: number;
  distanceKm: number | null;
  notes: string | null;

  createdAt: string;
  updatedAt: string;
  matchingStartedAt: string | null;
  acceptedAt: string | null;
  arrivedAt: string | null;
  startedAt: string | null;
  completedAt: string | null;
  cancelledAt: string | null;
  expiredAt: string | null;

  cancelledBy: CancelActor | null;
  cancellationReason: string | null;

  riderRating: number | null;
  driverRating: number | null;
}

/**
 * Fields a status transition or rating may write besides `status`.
 * Anything else on Trip is immutable after creation.
 */
export const TRIP_UPDATABLE_FIELDS = [
  'driverId',
  'finalFare',
  'matchingStartedAt',
  'acceptedAt',
  'arrivedAt',
  'startedAt',
  'completedAt',
  'cancelledAt',
  'expiredAt',
  'cancelledBy',
  'cancellationReason',
  'riderRating',
  'driverRating'
] as const;

export type TripUpdatableField = typeof TRIP_UPDATABLE_FIELDS[number];

export type TripUpdateFields = Partial<Pick<Trip, TripUpdatableField>>;

export interface CreateTripRequest {
  riderId: string;
  pickup: Location;
  dropoff: Location;
  /** From the pricing service, opaque here */
  fareEstimate: number;
  surgeMultiplier?: number;
  distanceKm?: number;
  notes?: string;
}

export interface TripListFilter {
  riderId?: string;
  driverId?: string;
  status?: TripStatus;
  limit: number;
  offset: number;
}

/**
 * Audit entry written on every successful transition
 */
export interface TripHistoryEntry {
  tripId: string;
  eventType: string;
  fromStatus: TripStatus | null;
  toStatus: TripStatus;
  at: string;
  details: Record<string, unknown>;
}

export type RatingBy = 'rider' | 'driver';

/**
 * Outcome of every TripService operation. Validation and business-rule
 * rejections come back here; they are never thrown.
 */
export type TransitionResult =
  | { success: true; trip: Trip }
  | { success: false; error: AppError };
