/**
 * =============================================================================
 * EXPRESS APPLICATION
 * =============================================================================
 *
 * ROUTES:
 * - /health/*                 Health and readiness probes
 * - /api/v1/trips             Trip lifecycle (rider + driver actions)
 * - /api/v1/offers            Offer responses and lookups (driver app)
 * - /api/v1/drivers           Driver position updates (geo index)
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import { Container } from './container';
import { createTripRouter } from './modules/trip/trip.routes';
import { TripController } from './modules/trip/trip.controller';
import { createDriverRouter, createOfferRouter } from './modules/matching/matching.routes';
import { MatchingController } from './modules/matching/matching.controller';
import { createHealthRouter } from './shared/routes/health.routes';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { requestIdMiddleware, securityHeaders } from './shared/middleware/security.middleware';

export const API_PREFIX = '/api/v1';

export function createApp(container: Container): Express {
  const app = express();
  const { config } = container;

  app.set('trust proxy', 1);

  // ===========================================================================
  // MIDDLEWARE
  // ===========================================================================

  app.use(requestIdMiddleware);
  app.use(compression({ threshold: 1024 }));
  app.use(securityHeaders);
  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    maxAge: 86400 // 24 hours preflight cache
  }));
  app.use(express.json({ limit: '100kb' }));
  app.use(requestLogger);

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.use('/', createHealthRouter({
    redis: container.redis,
    breakers: [container.geoBreaker],
    activeMatchingTasks: () => container.coordinator.activeTaskCount(),
    pendingOffers: () => container.waiter.size
  }));

  const matchingController = new MatchingController(container.matchingEngine, container.geo);

  app.use(`${API_PREFIX}/trips`, createTripRouter(new TripController(container.tripService)));
  app.use(`${API_PREFIX}/offers`, createOfferRouter(matchingController));
  app.use(`${API_PREFIX}/drivers`, createDriverRouter(matchingController));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
