/**
 * =============================================================================
 * MATCHING MODULE - CONTROLLER
 * =============================================================================
 *
 * Driver-facing endpoints: answer an offer, poll for the current offer,
 * report position.
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { ErrorCode } from '../../core/constants';
import { NotFoundError } from '../../core/errors/AppError';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { validateSchema } from '../../shared/utils/validation.utils';
import { RedisGeoCandidateSource } from '../geo/geo-candidate.source';
import { MatchingEngine } from './matching.engine';
import { driverLocationSchema, respondOfferSchema } from './matching.schema';

export class MatchingController {
  constructor(
    private engine: MatchingEngine,
    private geo: RedisGeoCandidateSource
  ) { }

  /**
   * A stale or duplicate answer is not an error: applied=false
   */
  respondToOffer = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const { tripId, driverId, accepted, offerId } = validateSchema(respondOfferSchema, req.body);

    const applied = await this.engine.respond(tripId, driverId, accepted, offerId);

    ApiResponse.success(
      res,
      { applied },
      applied ? 'Response recorded' : 'No pending offer for this driver'
    );
  });

  getDriverOffer = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const { driverId } = req.params;
    const offer = await this.engine.getDriverOffer(driverId);
    if (!offer) {
      throw new NotFoundError('No pending offer for this driver', ErrorCode.OFFER_NOT_FOUND, { driverId });
    }
    ApiResponse.success(res, { offer });
  });

  getTripOffer = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const { tripId } = req.params;
    const offer = await this.engine.getActiveOffer(tripId);
    if (!offer) {
      throw new NotFoundError('No pending offer for this trip', ErrorCode.OFFER_NOT_FOUND, { tripId });
    }
    ApiResponse.success(res, { offer });
  });

  updateLocation = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const { latitude, longitude } = validateSchema(driverLocationSchema, req.body);
    await this.geo.updateDriverLocation(req.params.driverId, latitude, longitude);
    ApiResponse.ok(res, 'Location updated');
  });

  goOffline = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    await this.geo.removeDriver(req.params.driverId);
    ApiResponse.ok(res, 'Driver offline');
  });
}
