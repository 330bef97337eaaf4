/**
 * =============================================================================
 * MATCHING MODULE - DISPATCH COORDINATOR
 * =============================================================================
 *
 * Ties trip lifecycle events to matching tasks.
 *
 *   trip.matching_requested  -> start a task (one per trip)
 *   trip.cancelled           -> abort the task, wait for it to exit
 *   trip.completed/expired   -> drop any leftover registry entry
 *
 * Every handler is idempotent; the event bus additionally de-duplicates on
 * eventId for the `dispatch-coordinator` consumer.
 * =============================================================================
 */

import { z } from 'zod';
import { EventType } from '../../core/constants';
import { ValidationError, errorMessage } from '../../core/errors/AppError';
import { DomainEvent } from '../../shared/events/domain-event';
import { EventBus } from '../../shared/events/event-bus.service';
import { logger } from '../../shared/services/logger.service';
import { MatchingEngine } from './matching.engine';
import { MatchResult } from './matching.types';

const tripEventPayloadSchema = z.object({
  tripId: z.string().min(1)
});

interface MatchingTask {
  controller: AbortController;
  done: Promise<MatchResult | null>;
}

export class DispatchCoordinator {
  static readonly CONSUMER = 'dispatch-coordinator';

  private tasks = new Map<string, MatchingTask>();

  constructor(private eventBus: EventBus, private engine: MatchingEngine) { }

  async start(): Promise<void> {
    const options = { consumer: DispatchCoordinator.CONSUMER };

    await this.eventBus.subscribe(EventType.TRIP_MATCHING_REQUESTED, async (event) => {
      this.startMatching(this.tripIdOf(event));
    }, options);

    await this.eventBus.subscribe(EventType.TRIP_CANCELLED, async (event) => {
      await this.cancelMatching(this.tripIdOf(event));
    }, options);

    await this.eventBus.subscribe(EventType.TRIP_COMPLETED, async (event) => {
      this.dropTask(this.tripIdOf(event));
    }, options);

    await this.eventBus.subscribe(EventType.TRIP_EXPIRED, async (event) => {
      this.dropTask(this.tripIdOf(event));
    }, options);

    logger.info('[Dispatch] Coordinator started');
  }

  /**
   * Spawn a task unless one is already running. Returns false when skipped.
   */
  startMatching(tripId: string): boolean {
    if (this.tasks.has(tripId)) {
      logger.debug(`[Dispatch] Task already running for ${tripId}`, { tripId });
      return false;
    }

    const controller = new AbortController();
    const done = this.engine.run(tripId, controller.signal)
      .then((result) => {
        logger.info(`[Dispatch] Task for ${tripId} finished: ${result.outcome}`, {
          tripId,
          driverId: result.driverId,
          offersMade: result.offersMade
        });
        return result;
      })
      .catch((error: unknown) => {
        logger.error(`[Dispatch] Task for ${tripId} crashed`, { tripId, error: errorMessage(error) });
        return null;
      })
      .finally(() => {
        if (this.tasks.get(tripId)?.controller === controller) {
          this.tasks.delete(tripId);
        }
      });

    this.tasks.set(tripId, { controller, done });
    logger.debug(`[Dispatch] Task started for ${tripId}`, { tripId, active: this.tasks.size });
    return true;
  }

  /**
   * Abort the trip's task and resolve once it has released its slots and
   * exited. No-op (false) when nothing is running.
   */
  async cancelMatching(tripId: string): Promise<boolean> {
    const task = this.tasks.get(tripId);
    if (!task) return false;

    task.controller.abort();
    await task.done;
    logger.info(`[Dispatch] Matching cancelled for ${tripId}`, { tripId });
    return true;
  }

  activeTaskCount(): number {
    return this.tasks.size;
  }

  hasTask(tripId: string): boolean {
    return this.tasks.has(tripId);
  }

  /**
   * Abort every running task and wait for all of them
   */
  async shutdown(): Promise<void> {
    const running = Array.from(this.tasks.values());
    logger.info(`[Dispatch] Shutting down, aborting ${running.length} task(s)`);

    for (const task of running) {
      task.controller.abort();
    }
    await Promise.all(running.map(task => task.done));
  }

  private dropTask(tripId: string): void {
    const task = this.tasks.get(tripId);
    if (!task) return;

    task.controller.abort();
    this.tasks.delete(tripId);
    logger.debug(`[Dispatch] Dropped registry entry for ${tripId}`, { tripId });
  }

  private tripIdOf(event: DomainEvent): string {
    const parsed = tripEventPayloadSchema.safeParse(event.payload);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }
    return parsed.data.tripId;
  }
}
