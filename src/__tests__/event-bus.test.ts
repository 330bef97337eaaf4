/**
 * =============================================================================
 * DOMAIN EVENTS - Unit Tests
 * =============================================================================
 *
 * Envelope creation/parsing, broker retry + dead-letter, and per-consumer
 * de-duplication in the EventBus.
 * =============================================================================
 */

import { EventType } from '../core/constants';
import { ValidationError } from '../core/errors/AppError';
import { DomainEvent, createDomainEvent, parseEvent, serializeEvent } from '../shared/events/domain-event';
import { IEventBroker, InMemoryEventBroker, RedisEventBroker } from '../shared/events/event-broker';
import { EventBus } from '../shared/events/event-bus.service';
import { RedisService } from '../shared/services/redis.service';
import { TEST_REDIS_OPTIONS } from './helpers/dispatch-harness';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

// =============================================================================
// ENVELOPE
// =============================================================================

describe('createDomainEvent / parseEvent', () => {
  it('copies and freezes the payload', () => {
    const payload: Record<string, unknown> = { tripId: 'trip-1', pickup: { latitude: 1, longitude: 2 } };
    const event = createDomainEvent(EventType.TRIP_CREATED, payload);

    payload.tripId = 'changed';

    expect(event.payload.tripId).toBe('trip-1');
    expect(Object.isFrozen(event.payload)).toBe(true);
    expect(Object.isFrozen(event.payload.pickup)).toBe(true);
    expect(event.eventType).toBe('trip.created');
    expect(event.eventId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('parses what it serializes', () => {
    const event = createDomainEvent(EventType.OFFER_CREATED, { offerId: 'offer-1', distanceKm: 1.5 });

    expect(parseEvent(serializeEvent(event))).toEqual(event);
  });

  it('rejects malformed envelopes', () => {
    expect(() => parseEvent('not json')).toThrow(ValidationError);
    expect(() => parseEvent(JSON.stringify({
      eventId: 'not-a-uuid',
      eventType: 'trip.created',
      timestamp: new Date().toISOString(),
      payload: {}
    }))).toThrow(ValidationError);
    expect(() => parseEvent(JSON.stringify({
      eventId: '6f1c2a7e-3b1d-4c55-9a0e-1f2b3c4d5e6f',
      eventType: 'nodots',
      timestamp: new Date().toISOString(),
      payload: {}
    }))).toThrow(ValidationError);
  });
});

// =============================================================================
// EVENT BUS (IN-MEMORY BROKER)
// =============================================================================

describe('EventBus', () => {
  let redis: RedisService;
  let broker: InMemoryEventBroker;
  let bus: EventBus;

  beforeEach(() => {
    redis = new RedisService(TEST_REDIS_OPTIONS);
    broker = new InMemoryEventBroker({ maxAttempts: 3, retryBaseDelayMs: 1 });
    bus = new EventBus(broker, redis, { dedupeTtlSeconds: 60 });
  });

  afterEach(async () => {
    await bus.shutdown();
    await redis.shutdown();
  });

  it('delivers a published event to its subscriber', async () => {
    const received: DomainEvent[] = [];
    await bus.subscribe(EventType.TRIP_CREATED, async (e) => { received.push(e); }, { consumer: 'audit' });

    const event = createDomainEvent(EventType.TRIP_CREATED, { tripId: 'trip-1' });
    expect(await bus.publish(event)).toBe(true);

    await broker.drain();
    expect(received).toEqual([event]);
  });

  it('handles the same eventId once per consumer', async () => {
    const audit = jest.fn().mockResolvedValue(undefined);
    const billing = jest.fn().mockResolvedValue(undefined);
    await bus.subscribe(EventType.TRIP_COMPLETED, audit, { consumer: 'audit' });
    await bus.subscribe(EventType.TRIP_COMPLETED, billing, { consumer: 'billing' });

    const event = createDomainEvent(EventType.TRIP_COMPLETED, { tripId: 'trip-1' });
    await bus.publish(event);
    await bus.publish(event);
    await broker.drain();

    expect(audit).toHaveBeenCalledTimes(1);
    expect(billing).toHaveBeenCalledTimes(1);
    expect(await redis.exists(EventBus.processedKey('audit', event.eventId))).toBe(true);
  });

  it('retries a failing handler and clears the processed mark between attempts', async () => {
    const handler = jest.fn()
      .mockRejectedValueOnce(new Error('temporary'))
      .mockResolvedValueOnce(undefined);
    await bus.subscribe(EventType.TRIP_CANCELLED, handler, { consumer: 'dispatch' });

    await bus.publish(createDomainEvent(EventType.TRIP_CANCELLED, { tripId: 'trip-1' }));
    await broker.drain();

    expect(handler).toHaveBeenCalledTimes(2);
    expect(broker.getDeadLetters()).toEqual([]);
  });

  it('dead-letters after maxAttempts', async () => {
    const handler = jest.fn().mockRejectedValue(new Error('handler broken'));
    await bus.subscribe(EventType.TRIP_EXPIRED, handler, { consumer: 'dispatch' });

    const event = createDomainEvent(EventType.TRIP_EXPIRED, { tripId: 'trip-1' });
    await bus.publish(event);
    await broker.drain();

    expect(handler).toHaveBeenCalledTimes(3);
    const [dead] = broker.getDeadLetters(EventType.TRIP_EXPIRED);
    expect(dead.event).toEqual(event);
    expect(dead.error).toBe('handler broken');
    expect(dead.attempts).toBe(3);
  });

  it('returns false instead of throwing when the broker is down', async () => {
    const downBroker: IEventBroker = {
      publish: async () => { throw new Error('connection refused'); },
      subscribe: async () => undefined,
      shutdown: async () => undefined
    };
    const downBus = new EventBus(downBroker, redis, { dedupeTtlSeconds: 60 });

    expect(await downBus.publish(createDomainEvent(EventType.TRIP_CREATED, { tripId: 'trip-1' }))).toBe(false);
  });
});

// =============================================================================
// REDIS BROKER (IN-MEMORY PUB/SUB)
// =============================================================================

describe('RedisEventBroker', () => {
  let redis: RedisService;
  let broker: RedisEventBroker;

  beforeEach(() => {
    redis = new RedisService(TEST_REDIS_OPTIONS);
    broker = new RedisEventBroker(redis, { maxAttempts: 2, retryBaseDelayMs: 1 });
  });

  afterEach(async () => {
    await broker.shutdown();
    await redis.shutdown();
  });

  it('round-trips an event through the channel', async () => {
    const handler = jest.fn().mockResolvedValue(undefined);
    await broker.subscribe(EventType.OFFER_CREATED, handler);

    const event = createDomainEvent(EventType.OFFER_CREATED, { offerId: 'offer-1' });
    await broker.publish(event);
    await broker.drain();

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0]).toEqual(event);
  });

  it('parks malformed messages on the dead-letter list', async () => {
    const handler = jest.fn().mockResolvedValue(undefined);
    await broker.subscribe(EventType.OFFER_CREATED, handler);

    await redis.publish(RedisEventBroker.channel(EventType.OFFER_CREATED), '{"broken":');

    expect(handler).not.toHaveBeenCalled();
    expect(await redis.lRange('dlq:events:offer.created', 0, -1)).toEqual(['{"broken":']);
  });

  it('dead-letters a handler that keeps failing', async () => {
    await broker.subscribe(EventType.OFFER_EXPIRED, jest.fn().mockRejectedValue(new Error('nope')));

    const event = createDomainEvent(EventType.OFFER_EXPIRED, { offerId: 'offer-1' });
    await broker.publish(event);
    await broker.drain();

    const [raw] = await redis.lRange(RedisEventBroker.deadLetterKey(EventType.OFFER_EXPIRED), 0, -1);
    expect(JSON.parse(raw)).toMatchObject({ event: { eventId: event.eventId }, error: 'nope', attempts: 2 });
  });
});
