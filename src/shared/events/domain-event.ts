/**
 * =============================================================================
 * DOMAIN EVENT - Immutable event envelope
 * =============================================================================
 *
 * Every fact the dispatch engine publishes travels in this envelope:
 *
 * {
 *   "eventId": "1b4e28ba-2fa1-41d2-883f-0016d3cca427",
 *   "eventType": "trip.accepted",
 *   "timestamp": "2024-05-01T10:00:00.000Z",
 *   "payload": { "tripId": "...", "driverId": "..." }
 * }
 *
 * eventId is fresh per event and is what subscribers de-duplicate on.
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { EventTypeName } from '../../core/constants';
import { ValidationError } from '../../core/errors/AppError';

export type EventPayload = Readonly<Record<string, unknown>>;

export interface DomainEvent {
  readonly eventId: string;
  readonly eventType: string;
  readonly timestamp: string;
  readonly payload: EventPayload;
}

const domainEventSchema = z.object({
  eventId: z.string().uuid(),
  eventType: z.string().regex(/^[a-z_]+(\.[a-z_]+)+$/, 'eventType must be dot-namespaced'),
  timestamp: z.string().datetime(),
  payload: z.record(z.unknown())
});

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Build a new event. The payload is copied and frozen, so later changes to
 * the caller's object never leak into a published event.
 */
export function createDomainEvent(eventType: EventTypeName, payload: Record<string, unknown>): DomainEvent {
  const copy: Record<string, unknown> = JSON.parse(JSON.stringify(payload));
  return deepFreeze({
    eventId: uuidv4(),
    eventType,
    timestamp: new Date().toISOString(),
    payload: copy
  });
}

export function serializeEvent(event: DomainEvent): string {
  return JSON.stringify(event);
}

/**
 * Parse and validate a wire message
 * @throws ValidationError when the envelope is malformed
 */
export function parseEvent(raw: string): DomainEvent {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new ValidationError('Event is not valid JSON');
  }

  const result = domainEventSchema.safeParse(data);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return deepFreeze(result.data);
}
