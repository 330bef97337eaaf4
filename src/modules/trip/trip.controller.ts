/**
 * =============================================================================
 * TRIP MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { TripNotFoundError } from '../../core/errors/AppError';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { validateSchema } from '../../shared/utils/validation.utils';
import { TripService } from './trip.service';
import { TransitionResult, Trip } from './trip.types';
import {
  cancelTripSchema,
  completeTripSchema,
  createTripSchema,
  listTripsQuerySchema,
  rateTripSchema
} from './trip.schema';

/**
 * Unwrap a service result; rejections go to the error middleware
 */
function unwrap(result: TransitionResult): Trip {
  if (!result.success) {
    throw result.error;
  }
  return result.trip;
}

export class TripController {
  constructor(private tripService: TripService) { }

  /**
   * Create a trip and immediately start matching
   */
  createTrip = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const data = validateSchema(createTripSchema, req.body);

    const created = unwrap(await this.tripService.create(data));
    const trip = unwrap(await this.tripService.startMatching(created.id));

    ApiResponse.created(res, { trip }, 'Trip requested');
  });

  getTrip = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const { tripId } = req.params;
    const trip = await this.tripService.get(tripId);
    if (!trip) {
      throw new TripNotFoundError(tripId);
    }
    ApiResponse.success(res, { trip });
  });

  listTrips = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const query = validateSchema(listTripsQuerySchema, req.query);
    const trips = await this.tripService.list(query);
    ApiResponse.success(res, { trips }, undefined, { limit: query.limit, offset: query.offset, count: trips.length });
  });

  getHistory = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const { tripId } = req.params;
    const trip = await this.tripService.get(tripId);
    if (!trip) {
      throw new TripNotFoundError(tripId);
    }
    const history = await this.tripService.getHistory(tripId);
    ApiResponse.success(res, { history });
  });

  cancelTrip = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const { actor, reason } = validateSchema(cancelTripSchema, req.body);
    const trip = unwrap(await this.tripService.cancel(req.params.tripId, actor, reason));
    ApiResponse.success(res, { trip }, 'Trip cancelled');
  });

  driverArrived = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const trip = unwrap(await this.tripService.driverArrived(req.params.tripId));
    ApiResponse.success(res, { trip });
  });

  startRide = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const trip = unwrap(await this.tripService.startRide(req.params.tripId));
    ApiResponse.success(res, { trip });
  });

  completeTrip = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const { finalFare } = validateSchema(completeTripSchema, req.body);
    const trip = unwrap(await this.tripService.complete(req.params.tripId, finalFare));
    ApiResponse.success(res, { trip }, 'Trip completed');
  });

  rateTrip = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const { by, rating } = validateSchema(rateTripSchema, req.body);
    const trip = unwrap(await this.tripService.rate(req.params.tripId, by, rating));
    ApiResponse.success(res, { trip }, 'Rating saved');
  });
}
