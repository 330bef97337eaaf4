/**
 * =============================================================================
 * EVENT BUS - Publish/subscribe facade over the broker
 * =============================================================================
 *
 * publish():
 *   Best effort. The state change that produced the event is already
 *   persisted, so a broker failure is logged and reported as `false`;
 *   it never throws back into a state transition.
 *
 * subscribe():
 *   Wraps the handler with de-duplication on (consumer, eventId) using an
 *   atomic SET NX with TTL. A redelivered event runs the handler at most once
 *   per consumer. If the handler throws, the mark is removed so the broker's
 *   retry can run it again.
 * =============================================================================
 */

import { DomainEvent } from './domain-event';
import { IEventBroker } from './event-broker';
import { RedisService } from '../services/redis.service';
import { logger } from '../services/logger.service';
import { errorMessage } from '../../core/errors/AppError';
import { EventTypeName } from '../../core/constants';

export type EventHandler = (event: DomainEvent) => Promise<void>;

export interface SubscribeOptions {
  /** Consumer group name; de-duplication is scoped to it */
  consumer: string;
}

export interface EventBusOptions {
  dedupeTtlSeconds: number;
}

export class EventBus {
  constructor(
    private broker: IEventBroker,
    private redis: RedisService,
    private options: EventBusOptions
  ) { }

  static processedKey(consumer: string, eventId: string): string {
    return `events:processed:${consumer}:${eventId}`;
  }

  async publish(event: DomainEvent): Promise<boolean> {
    try {
      await this.broker.publish(event);
      logger.debug(`[EventBus] Published ${event.eventType}`, { eventId: event.eventId });
      return true;
    } catch (error) {
      logger.error(`[EventBus] Failed to publish ${event.eventType}`, {
        eventId: event.eventId,
        error: errorMessage(error)
      });
      return false;
    }
  }

  async subscribe(eventType: EventTypeName, handler: EventHandler, options: SubscribeOptions): Promise<void> {
    const { consumer } = options;

    await this.broker.subscribe(eventType, async (event) => {
      const key = EventBus.processedKey(consumer, event.eventId);
      const firstDelivery = await this.redis.setIfAbsent(key, '1', this.options.dedupeTtlSeconds);

      if (!firstDelivery) {
        logger.debug(`[EventBus] ${consumer} skipping duplicate ${event.eventType}`, { eventId: event.eventId });
        return;
      }

      try {
        await handler(event);
      } catch (error) {
        await this.redis.del(key).catch((e: unknown) => {
          logger.error(`[EventBus] Could not clear processed mark ${key}`, { error: errorMessage(e) });
        });
        throw error;
      }
    });

    logger.info(`[EventBus] ${consumer} subscribed to ${eventType}`);
  }

  async shutdown(): Promise<void> {
    await this.broker.shutdown();
  }
}
