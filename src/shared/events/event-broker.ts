/**
 * =============================================================================
 * EVENT BROKERS - At-least-once delivery of domain events
 * =============================================================================
 *
 * MODES:
 * 1. InMemoryEventBroker - single process (development, tests)
 * 2. RedisEventBroker    - Redis pub/sub, shared across instances
 *
 * DELIVERY CONTRACT (both modes):
 * - A delivery is acknowledged only after the handler resolves
 * - A failing handler is retried with exponential backoff
 * - After maxAttempts the event goes to the dead-letter list
 * - Redelivery is possible, so handlers must be idempotent
 *   (EventBus de-duplicates on eventId)
 * =============================================================================
 */

import { DomainEvent, parseEvent, serializeEvent } from './domain-event';
import { RedisService } from '../services/redis.service';
import { logger } from '../services/logger.service';
import { sleep, backoffDelay } from '../resilience/retry';
import { ErrorCode } from '../../core/constants';
import { TransientInfraError, errorMessage } from '../../core/errors/AppError';

// =============================================================================
// TYPES
// =============================================================================

export type DeliveryHandler = (event: DomainEvent) => Promise<void>;

export interface IEventBroker {
  publish(event: DomainEvent): Promise<void>;
  subscribe(eventType: string, handler: DeliveryHandler): Promise<void>;
  shutdown(): Promise<void>;
}

export interface EventBrokerOptions {
  maxAttempts: number;
  retryBaseDelayMs: number;
}

export interface DeadLetter {
  event: DomainEvent;
  error: string;
  attempts: number;
  failedAt: string;
}

// =============================================================================
// SHARED DELIVERY LOOP
// =============================================================================

abstract class RetryingEventBroker implements IEventBroker {
  protected handlers = new Map<string, DeliveryHandler[]>();
  private inFlight = new Set<Promise<void>>();
  private stopping = new AbortController();

  constructor(protected options: EventBrokerOptions) { }

  abstract publish(event: DomainEvent): Promise<void>;
  abstract subscribe(eventType: string, handler: DeliveryHandler): Promise<void>;
  protected abstract deadLetter(record: DeadLetter): Promise<void>;

  /**
   * Start one tracked delivery per handler; returns without waiting
   */
  protected dispatch(event: DomainEvent): void {
    const handlers = this.handlers.get(event.eventType) ?? [];
    for (const handler of handlers) {
      const delivery: Promise<void> = this.deliver(event, handler).finally(() => {
        this.inFlight.delete(delivery);
      });
      this.inFlight.add(delivery);
    }
  }

  private async deliver(event: DomainEvent, handler: DeliveryHandler): Promise<void> {
    // Never run a handler inside the publisher's call stack
    await Promise.resolve();

    for (let attempt = 1; ; attempt++) {
      if (this.stopping.signal.aborted) return;

      try {
        await handler(event);
        return;
      } catch (error) {
        const message = errorMessage(error);

        if (attempt >= this.options.maxAttempts) {
          logger.error(`[Events] ${event.eventType} ${event.eventId} failed permanently after ${attempt} attempts`, { error: message });
          await this.deadLetterSafely({ event, error: message, attempts: attempt, failedAt: new Date().toISOString() });
          return;
        }

        const delay = backoffDelay(attempt, this.options.retryBaseDelayMs);
        logger.warn(`[Events] ${event.eventType} ${event.eventId} failed, retry ${attempt}/${this.options.maxAttempts} in ${delay}ms`, { error: message });

        try {
          await sleep(delay, this.stopping.signal);
        } catch {
          logger.warn(`[Events] Broker stopping, dropping retry of ${event.eventId}`);
          return;
        }
      }
    }
  }

  private async deadLetterSafely(record: DeadLetter): Promise<void> {
    try {
      await this.deadLetter(record);
    } catch (error) {
      logger.error(`[Events] Could not dead-letter ${record.event.eventId}`, { error: errorMessage(error) });
    }
  }

  protected addHandler(eventType: string, handler: DeliveryHandler): boolean {
    const existing = this.handlers.get(eventType);
    if (existing) {
      existing.push(handler);
      return false;
    }
    this.handlers.set(eventType, [handler]);
    return true;
  }

  /**
   * Resolves once no delivery (including pending retries) is in flight
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  async shutdown(): Promise<void> {
    this.stopping.abort();
    await this.drain();
    this.handlers.clear();
  }
}

// =============================================================================
// IN-MEMORY BROKER
// =============================================================================

export class InMemoryEventBroker extends RetryingEventBroker {
  private deadLetters: DeadLetter[] = [];

  async publish(event: DomainEvent): Promise<void> {
    this.dispatch(event);
  }

  async subscribe(eventType: string, handler: DeliveryHandler): Promise<void> {
    this.addHandler(eventType, handler);
  }

  protected async deadLetter(record: DeadLetter): Promise<void> {
    this.deadLetters.push(record);
  }

  getDeadLetters(eventType?: string): DeadLetter[] {
    return eventType
      ? this.deadLetters.filter(d => d.event.eventType === eventType)
      : [...this.deadLetters];
  }
}

// =============================================================================
// REDIS PUB/SUB BROKER
// =============================================================================

/**
 * Fans events out over Redis pub/sub. This shares events between processes
 * but not matching state: offer waits live in the process running the trip's
 * matching task, and POST /offers/respond only wakes a wait held by the
 * process that serves it. Run a single dispatch instance per Redis.
 */
export class RedisEventBroker extends RetryingEventBroker {
  constructor(private redis: RedisService, options: EventBrokerOptions) {
    super(options);
  }

  static channel(eventType: string): string {
    return `events:${eventType}`;
  }

  static deadLetterKey(eventType: string): string {
    return `dlq:events:${eventType}`;
  }

  async publish(event: DomainEvent): Promise<void> {
    try {
      await this.redis.publish(RedisEventBroker.channel(event.eventType), serializeEvent(event));
    } catch (error) {
      throw new TransientInfraError(`Failed to publish ${event.eventType}: ${errorMessage(error)}`, ErrorCode.BROKER_UNAVAILABLE);
    }
  }

  async subscribe(eventType: string, handler: DeliveryHandler): Promise<void> {
    const firstForType = this.addHandler(eventType, handler);
    if (!firstForType) return;

    await this.redis.subscribe(RedisEventBroker.channel(eventType), (message) => {
      this.onMessage(eventType, message);
    });
    logger.info(`[Events] Subscribed to ${RedisEventBroker.channel(eventType)}`);
  }

  private onMessage(eventType: string, message: string): void {
    let event: DomainEvent;
    try {
      event = parseEvent(message);
    } catch (error) {
      logger.error(`[Events] Malformed message on ${RedisEventBroker.channel(eventType)}`, { error: errorMessage(error) });
      this.redis.lPush(RedisEventBroker.deadLetterKey(eventType), message).catch((e: unknown) => {
        logger.error('[Events] Could not dead-letter malformed message', { error: errorMessage(e) });
      });
      return;
    }
    this.dispatch(event);
  }

  protected async deadLetter(record: DeadLetter): Promise<void> {
    await this.redis.lPush(RedisEventBroker.deadLetterKey(record.event.eventType), JSON.stringify(record));
  }

  async shutdown(): Promise<void> {
    const eventTypes = Array.from(this.handlers.keys());
    for (const eventType of eventTypes) {
      await this.redis.unsubscribe(RedisEventBroker.channel(eventType));
    }
    await super.shutdown();
  }
}
