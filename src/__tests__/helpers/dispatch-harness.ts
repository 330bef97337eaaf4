/**
 * =============================================================================
 * DISPATCH TEST HARNESS
 * =============================================================================
 *
 * Wires the trip and matching services against in-memory Redis, an
 * in-process event broker and a scripted geo source. Timeouts are in
 * milliseconds so a whole search runs in well under a second.
 * =============================================================================
 */

import { CancelActor, EventTypeName } from '../../core/constants';
import { DispatchCoordinator } from '../../modules/matching/dispatch.coordinator';
import { MatchingEngine, MatchingEngineConfig } from '../../modules/matching/matching.engine';
import { OfferResponseWaiter } from '../../modules/matching/offer-response.waiter';
import { OfferStore } from '../../modules/matching/offer.store';
import { DriverCandidate, IGeoCandidateSource } from '../../modules/geo/geo-candidate.source';
import { InMemoryTripRepository } from '../../modules/trip/trip.repository';
import { TripService } from '../../modules/trip/trip.service';
import { CreateTripRequest, Trip } from '../../modules/trip/trip.types';
import { DomainEvent } from '../../shared/events/domain-event';
import { InMemoryEventBroker } from '../../shared/events/event-broker';
import { EventBus } from '../../shared/events/event-bus.service';
import { sleep } from '../../shared/resilience/retry';
import { CacheService } from '../../shared/services/cache.service';
import { RedisService } from '../../shared/services/redis.service';

export const TEST_REDIS_OPTIONS = {
  enabled: false,
  url: 'redis://localhost:6379',
  maxRetries: 0,
  retryDelayMs: 0,
  connectionTimeoutMs: 0
};

export const TEST_MATCHING_CONFIG: MatchingEngineConfig = {
  minRadiusKm: 1,
  maxRadiusKm: 3,
  radiusStepKm: 1,
  maxRetries: 3,
  maxCandidates: 10,
  offerTimeoutMs: 40,
  retryBackoffMs: 5,
  repositoryRetries: 2,
  repositoryRetryDelayMs: 1
};

/**
 * Keeps every published event in order
 */
export class RecordingEventBroker extends InMemoryEventBroker {
  readonly published: DomainEvent[] = [];

  async publish(event: DomainEvent): Promise<void> {
    this.published.push(event);
    await super.publish(event);
  }

  ofType(eventType: EventTypeName): DomainEvent[] {
    return this.published.filter(e => e.eventType === eventType);
  }
}

/**
 * Returns the scripted drivers within the requested radius, nearest first
 */
export class FakeGeoSource implements IGeoCandidateSource {
  drivers: DriverCandidate[] = [];
  failure: Error | null = null;
  delayMs = 0;
  readonly radiiQueried: number[] = [];

  async nearby(_latitude: number, _longitude: number, radiusKm: number, limit: number): Promise<DriverCandidate[]> {
    this.radiiQueried.push(radiusKm);
    if (this.delayMs > 0) {
      await sleep(this.delayMs);
    }
    if (this.failure) {
      throw this.failure;
    }
    return this.drivers
      .filter(d => d.distanceKm <= radiusKm)
      .sort((a, b) => a.distanceKm - b.distanceKm)
      .slice(0, limit);
  }
}

export interface DispatchHarness {
  redis: RedisService;
  broker: RecordingEventBroker;
  eventBus: EventBus;
  repository: InMemoryTripRepository;
  tripService: TripService;
  geo: FakeGeoSource;
  offers: OfferStore;
  waiter: OfferResponseWaiter;
  engine: MatchingEngine;
  coordinator: DispatchCoordinator;
  /** Create a trip for riderId and move it to MATCHING */
  matchingTrip(riderId?: string): Promise<Trip>;
  shutdown(): Promise<void>;
}

export function tripRequest(riderId: string): CreateTripRequest {
  return {
    riderId,
    pickup: { latitude: 12.9716, longitude: 77.5946, address: 'MG Road' },
    dropoff: { latitude: 12.9352, longitude: 77.6245, address: 'Koramangala' },
    fareEstimate: 240
  };
}

export function createDispatchHarness(overrides: Partial<MatchingEngineConfig> = {}): DispatchHarness {
  const config: MatchingEngineConfig = { ...TEST_MATCHING_CONFIG, ...overrides };

  const redis = new RedisService(TEST_REDIS_OPTIONS);
  const broker = new RecordingEventBroker({ maxAttempts: 2, retryBaseDelayMs: 1 });
  const eventBus = new EventBus(broker, redis, { dedupeTtlSeconds: 60 });
  const repository = new InMemoryTripRepository();
  const tripService = new TripService(repository, eventBus, new CacheService(redis), { cacheTtlSeconds: 60 });
  const geo = new FakeGeoSource();
  const offers = new OfferStore(redis, { offerTimeoutMs: config.offerTimeoutMs, exclusionTtlSeconds: 60 });
  const waiter = new OfferResponseWaiter();
  const engine = new MatchingEngine(tripService, geo, offers, waiter, eventBus, config);
  const coordinator = new DispatchCoordinator(eventBus, engine);

  return {
    redis,
    broker,
    eventBus,
    repository,
    tripService,
    geo,
    offers,
    waiter,
    engine,
    coordinator,

    async matchingTrip(riderId = 'rider-1') {
      const created = await tripService.create(tripRequest(riderId));
      if (!created.success) throw created.error;
      const matching = await tripService.startMatching(created.trip.id);
      if (!matching.success) throw matching.error;
      return matching.trip;
    },

    async shutdown() {
      await coordinator.shutdown();
      await broker.shutdown();
      await redis.shutdown();
    }
  };
}

/**
 * Poll until probe returns a non-null value
 */
export async function waitFor<T>(probe: () => Promise<T | null>, timeoutMs = 1000): Promise<T> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    const value = await probe();
    if (value !== null) return value;
    await sleep(2);
  }
  throw new Error(`Condition not met within ${timeoutMs}ms`);
}

export async function cancelByRider(tripService: TripService, tripId: string): Promise<void> {
  const result = await tripService.cancel(tripId, CancelActor.RIDER, 'changed plans');
  if (!result.success) throw result.error;
}
