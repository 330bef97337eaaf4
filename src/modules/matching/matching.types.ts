/**
 * =============================================================================
 * MATCHING MODULE - TYPES
 * =============================================================================
 */

import { OfferStatus } from '../../core/constants';

/**
 * A time-boxed proposal of one trip to one driver
 */
export interface Offer {
  offerId: string;
  tripId: string;
  driverId: string;
  status: OfferStatus;
  distanceKm: number;
  createdAt: string;
  expiresAt: string;
}

/**
 * How one offer ended. BUSY = the driver already held another offer and
 * this one was never sent.
 */
export type OfferOutcome =
  | OfferStatus.ACCEPTED
  | OfferStatus.REJECTED
  | OfferStatus.EXPIRED
  | OfferStatus.CANCELLED
  | 'busy';

/**
 * How a matching task ended
 * - accepted:   trip moved to ACCEPTED
 * - expired:    search exhausted, trip moved to EXPIRED
 * - cancelled:  task aborted (trip cancelled or process shutting down)
 * - superseded: trip left MATCHING through some other path
 * - failed:     repository unavailable, trip cancelled with system_error
 */
export type MatchOutcome = 'accepted' | 'expired' | 'cancelled' | 'superseded' | 'failed';

export interface MatchResult {
  tripId: string;
  outcome: MatchOutcome;
  driverId: string | null;
  offersMade: number;
}
