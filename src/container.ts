/**
 * =============================================================================
 * COMPOSITION ROOT
 * =============================================================================
 *
 * Builds every service once and hands each one its collaborators.
 *
 * STARTUP:   redis.initialize() -> coordinator.start()
 * SHUTDOWN:  coordinator -> event bus -> redis
 * =============================================================================
 */

import { AppConfig } from './config/environment';
import { DispatchCoordinator } from './modules/matching/dispatch.coordinator';
import { MatchingEngine } from './modules/matching/matching.engine';
import { OfferResponseWaiter } from './modules/matching/offer-response.waiter';
import { OfferStore } from './modules/matching/offer.store';
import { RedisGeoCandidateSource } from './modules/geo/geo-candidate.source';
import { ITripRepository, InMemoryTripRepository } from './modules/trip/trip.repository';
import { TripService } from './modules/trip/trip.service';
import { IEventBroker, InMemoryEventBroker, RedisEventBroker } from './shared/events/event-broker';
import { EventBus } from './shared/events/event-bus.service';
import { CircuitBreaker } from './shared/resilience/circuit-breaker';
import { CacheService } from './shared/services/cache.service';
import { logger } from './shared/services/logger.service';
import { IRedisClient, RedisService } from './shared/services/redis.service';

export interface ContainerOverrides {
  redisClient?: IRedisClient;
  tripRepository?: ITripRepository;
}

export class Container {
  readonly redis: RedisService;
  readonly cache: CacheService;
  readonly broker: IEventBroker;
  readonly eventBus: EventBus;
  readonly tripRepository: ITripRepository;
  readonly tripService: TripService;
  readonly geoBreaker: CircuitBreaker;
  readonly geo: RedisGeoCandidateSource;
  readonly offerStore: OfferStore;
  readonly waiter: OfferResponseWaiter;
  readonly matchingEngine: MatchingEngine;
  readonly coordinator: DispatchCoordinator;

  private started = false;

  constructor(readonly config: AppConfig, overrides: ContainerOverrides = {}) {
    const { dispatch, events } = config;

    this.redis = new RedisService(config.redis, overrides.redisClient);
    this.cache = new CacheService(this.redis);

    const brokerOptions = {
      maxAttempts: events.maxAttempts,
      retryBaseDelayMs: events.retryBaseDelayMs
    };
    this.broker = events.broker === 'redis'
      ? new RedisEventBroker(this.redis, brokerOptions)
      : new InMemoryEventBroker(brokerOptions);
    this.eventBus = new EventBus(this.broker, this.redis, { dedupeTtlSeconds: events.dedupeTtlSeconds });

    this.tripRepository = overrides.tripRepository ?? new InMemoryTripRepository();
    this.tripService = new TripService(this.tripRepository, this.eventBus, this.cache, {
      cacheTtlSeconds: config.cache.tripTtlSeconds
    });

    this.geoBreaker = new CircuitBreaker({
      name: 'geo-index',
      requestTimeout: dispatch.geoRequestTimeoutMs
    });
    this.geo = new RedisGeoCandidateSource(this.redis, this.geoBreaker, {
      driverLocationTtlSeconds: dispatch.driverLocationTtlSeconds
    });

    this.offerStore = new OfferStore(this.redis, {
      offerTimeoutMs: dispatch.offerTimeoutMs,
      exclusionTtlSeconds: dispatch.exclusionTtlSeconds
    });
    this.waiter = new OfferResponseWaiter();
    this.matchingEngine = new MatchingEngine(
      this.tripService,
      this.geo,
      this.offerStore,
      this.waiter,
      this.eventBus,
      dispatch
    );
    this.coordinator = new DispatchCoordinator(this.eventBus, this.matchingEngine);
  }

  async init(): Promise<void> {
    if (this.started) return;

    await this.redis.initialize();
    await this.coordinator.start();
    this.started = true;

    logger.info('[Container] Services initialized', {
      redis: this.redis.isRedisEnabled() ? 'redis' : 'memory',
      broker: this.config.events.broker
    });
  }

  async shutdown(): Promise<void> {
    await this.coordinator.shutdown();
    await this.eventBus.shutdown();
    await this.redis.shutdown();
    this.started = false;
    logger.info('[Container] Services stopped');
  }
}
