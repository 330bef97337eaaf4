/**
 * =============================================================================
 * TRIP MODULE - ROUTES
 * =============================================================================
 *
 * - POST /trips                    Create trip (+ start matching)
 * - GET  /trips                    List trips (riderId, driverId, status filters)
 * - GET  /trips/:tripId            Get trip
 * - GET  /trips/:tripId/history    Status history
 * - POST /trips/:tripId/cancel     { actor, reason }
 * - POST /trips/:tripId/arrived    Driver at pickup
 * - POST /trips/:tripId/start      Rider on board
 * - POST /trips/:tripId/complete   { finalFare }
 * - POST /trips/:tripId/rate       { by, rating }
 * =============================================================================
 */

import { Router } from 'express';
import { TripController } from './trip.controller';

export function createTripRouter(controller: TripController): Router {
  const router = Router();

  router.post('/', controller.createTrip);
  router.get('/', controller.listTrips);
  router.get('/:tripId', controller.getTrip);
  router.get('/:tripId/history', controller.getHistory);
  router.post('/:tripId/cancel', controller.cancelTrip);
  router.post('/:tripId/arrived', controller.driverArrived);
  router.post('/:tripId/start', controller.startRide);
  router.post('/:tripId/complete', controller.completeTrip);
  router.post('/:tripId/rate', controller.rateTrip);

  return router;
}
