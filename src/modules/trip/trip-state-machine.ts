/**
 * =============================================================================
 * TRIP MODULE - STATE MACHINE
 * =============================================================================
 *
 *   PENDING -> MATCHING -> ACCEPTED -> DRIVER_ARRIVED -> IN_PROGRESS -> COMPLETED
 *      |          |  \         |             |               |
 *      +----------+---+--------+-------------+---------------+--> CANCELLED
 *                 |
 *                 +--> EXPIRED
 *
 * Pure functions over TRIP_STATUS_TRANSITIONS; no I/O.
 * =============================================================================
 */

import {
  TERMINAL_TRIP_STATUSES,
  TRIP_STATUS_TRANSITIONS,
  TripStatus
} from '../../core/constants';
import { InvalidTransitionError } from '../../core/errors/AppError';

export function canTransition(from: TripStatus, to: TripStatus): boolean {
  return TRIP_STATUS_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: TripStatus): boolean {
  return TERMINAL_TRIP_STATUSES.includes(status);
}

/**
 * Rejection for an illegal move, or null when the move is allowed
 */
export function validateTransition(from: TripStatus, to: TripStatus): InvalidTransitionError | null {
  return canTransition(from, to) ? null : new InvalidTransitionError(from, to);
}
