/**
 * =============================================================================
 * MATCHING MODULE - ROUTES
 * =============================================================================
 *
 * - POST   /offers/respond               { tripId, driverId, accepted, offerId? }
 * - GET    /offers/driver/:driverId      Offer currently held by the driver
 * - GET    /offers/trip/:tripId          Offer currently pending for the trip
 * - PUT    /drivers/:driverId/location   { latitude, longitude }
 * - DELETE /drivers/:driverId/location   Driver goes offline
 * =============================================================================
 */

import { Router } from 'express';
import { MatchingController } from './matching.controller';

export function createOfferRouter(controller: MatchingController): Router {
  const router = Router();

  router.post('/respond', controller.respondToOffer);
  router.get('/driver/:driverId', controller.getDriverOffer);
  router.get('/trip/:tripId', controller.getTripOffer);

  return router;
}

export function createDriverRouter(controller: MatchingController): Router {
  const router = Router();

  router.put('/:driverId/location', controller.updateLocation);
  router.delete('/:driverId/location', controller.goOffline);

  return router;
}
