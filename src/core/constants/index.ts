/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place. The transition table
 * lives next to the statuses it constrains.
 * =============================================================================
 */

// =============================================================================
// TRIP STATUS
// =============================================================================

/**
 * Trip lifecycle states
 */
export enum TripStatus {
  PENDING = 'pending',               // Created by rider, matching not started
  MATCHING = 'matching',             // Searching for a driver
  ACCEPTED = 'accepted',             // Driver accepted the offer
  DRIVER_ARRIVED = 'driver_arrived', // Driver waiting at pickup
  IN_PROGRESS = 'in_progress',       // Rider on board
  COMPLETED = 'completed',           // Ride finished
  CANCELLED = 'cancelled',           // Cancelled by rider, driver or system
  EXPIRED = 'expired'                // No driver found
}

/**
 * Allowed status transitions
 */
export const TRIP_STATUS_TRANSITIONS: Record<TripStatus, readonly TripStatus[]> = {
  [TripStatus.PENDING]: [TripStatus.MATCHING, TripStatus.CANCELLED],
  [TripStatus.MATCHING]: [TripStatus.ACCEPTED, TripStatus.CANCELLED, TripStatus.EXPIRED],
  [TripStatus.ACCEPTED]: [TripStatus.DRIVER_ARRIVED, TripStatus.CANCELLED],
  [TripStatus.DRIVER_ARRIVED]: [TripStatus.IN_PROGRESS, TripStatus.CANCELLED],
  [TripStatus.IN_PROGRESS]: [TripStatus.COMPLETED, TripStatus.CANCELLED],
  [TripStatus.COMPLETED]: [],
  [TripStatus.CANCELLED]: [],
  [TripStatus.EXPIRED]: []
};

export const TERMINAL_TRIP_STATUSES: readonly TripStatus[] = [
  TripStatus.COMPLETED,
  TripStatus.CANCELLED,
  TripStatus.EXPIRED
];

/**
 * A rider may hold at most one trip in these statuses
 */
export const RIDER_ACTIVE_STATUSES: readonly TripStatus[] = [
  TripStatus.PENDING,
  TripStatus.MATCHING,
  TripStatus.ACCEPTED,
  TripStatus.DRIVER_ARRIVED,
  TripStatus.IN_PROGRESS
];

/**
 * A driver may hold at most one trip in these statuses
 */
export const DRIVER_ACTIVE_STATUSES: readonly TripStatus[] = [
  TripStatus.ACCEPTED,
  TripStatus.DRIVER_ARRIVED,
  TripStatus.IN_PROGRESS
];

/**
 * Who cancelled a trip
 */
export enum CancelActor {
  RIDER = 'rider',
  DRIVER = 'driver',
  SYSTEM = 'system'
}

export const SYSTEM_ERROR_REASON = 'system_error';

// =============================================================================
// OFFER STATUS
// =============================================================================

/**
 * Offer (trip proposed to one driver) states
 */
export enum OfferStatus {
  PENDING = 'pending',
  ACCEPTED = 'accepted',
  REJECTED = 'rejected',
  EXPIRED = 'expired',
  CANCELLED = 'cancelled'   // Trip cancelled while waiting
}

// =============================================================================
// DOMAIN EVENT TYPES
// =============================================================================

/**
 * Event catalogue (routing key = event type)
 */
export const EventType = {
  TRIP_CREATED: 'trip.created',
  TRIP_MATCHING_REQUESTED: 'trip.matching_requested',
  TRIP_ACCEPTED: 'trip.accepted',
  TRIP_DRIVER_ARRIVED: 'trip.driver_arrived',
  TRIP_STARTED: 'trip.started',
  TRIP_COMPLETED: 'trip.completed',
  TRIP_CANCELLED: 'trip.cancelled',
  TRIP_EXPIRED: 'trip.expired',
  TRIP_RATED: 'trip.rated',

  OFFER_CREATED: 'offer.created',
  OFFER_ACCEPTED: 'offer.accepted',
  OFFER_REJECTED: 'offer.rejected',
  OFFER_EXPIRED: 'offer.expired'
} as const;

export type EventTypeName = typeof EventType[keyof typeof EventType];

// =============================================================================
// HTTP STATUS CODES (for consistency)
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE: 422,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES (Hierarchical Structure)
// =============================================================================
/**
 * Application-specific error codes
 *
 * - 2xxx: Validation errors
 * - 3xxx: Trip business rules
 * - 5xxx: Dispatch / offer rules
 * - 9xxx: System/Infrastructure errors
 */
export enum ErrorCode {
  // VALIDATION (2xxx)
  VALIDATION_ERROR = 'VAL_2001',
  INVALID_TRANSITION = 'VAL_2002',
  INVALID_RATING = 'VAL_2003',

  // TRIP (3xxx)
  TRIP_NOT_FOUND = 'TRIP_3001',
  RIDER_HAS_ACTIVE_TRIP = 'TRIP_3002',
  DRIVER_HAS_ACTIVE_TRIP = 'TRIP_3003',
  TRIP_STATUS_CONFLICT = 'TRIP_3004',
  TRIP_ALREADY_RATED = 'TRIP_3005',

  // DISPATCH (5xxx)
  OFFER_NOT_FOUND = 'DISPATCH_5001',

  // SYSTEM (9xxx)
  INTERNAL_ERROR = 'SYS_9001',
  SERVICE_UNAVAILABLE = 'SYS_9002',
  GEO_UNAVAILABLE = 'SYS_9003',
  BROKER_UNAVAILABLE = 'SYS_9004'
}
