/**
 * =============================================================================
 * MATCHING MODULE - OFFER RESPONSE WAITER
 * =============================================================================
 *
 * One pending wait per offer. The wait settles exactly once, on whichever
 * comes first:
 * - resolve(offerId, accepted)   -> ACCEPTED / REJECTED
 * - the offer timeout            -> EXPIRED
 * - the task's AbortSignal       -> CANCELLED
 *
 * Waits are process-local. A response must reach the instance running the
 * trip's matching task, so dispatch runs as a single instance per Redis
 * even when events go through RedisEventBroker.
 * =============================================================================
 */

import { OfferStatus } from '../../core/constants';

type Settled = OfferStatus.ACCEPTED | OfferStatus.REJECTED | OfferStatus.EXPIRED | OfferStatus.CANCELLED;

export class OfferResponseWaiter {
  private pending = new Map<string, (status: Settled) => void>();

  wait(offerId: string, timeoutMs: number, signal: AbortSignal): Promise<Settled> {
    return new Promise<Settled>((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const onAbort = () => finish(OfferStatus.CANCELLED);

      const finish = (status: Settled) => {
        if (this.pending.get(offerId) !== finish) return;
        this.pending.delete(offerId);
        if (timer) clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        resolve(status);
      };

      this.pending.set(offerId, finish);

      if (signal.aborted) {
        finish(OfferStatus.CANCELLED);
        return;
      }

      timer = setTimeout(() => finish(OfferStatus.EXPIRED), timeoutMs);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Wake the wait for offerId. False when no wait is pending (already
   * settled, expired or unknown).
   */
  resolve(offerId: string, accepted: boolean): boolean {
    const finish = this.pending.get(offerId);
    if (!finish) return false;
    finish(accepted ? OfferStatus.ACCEPTED : OfferStatus.REJECTED);
    return true;
  }

  get size(): number {
    return this.pending.size;
  }
}
