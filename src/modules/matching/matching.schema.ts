/**
 * =============================================================================
 * MATCHING MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { coordinatesSchema, idSchema, uuidSchema } from '../../shared/utils/validation.utils';

/**
 * POST /offers/respond
 * offerId is optional; when given, a response to an older offer is ignored.
 */
export const respondOfferSchema = z.object({
  tripId: idSchema,
  driverId: idSchema,
  accepted: z.boolean(),
  offerId: uuidSchema.optional()
}).strict();

/**
 * PUT /drivers/:driverId/location
 */
export const driverLocationSchema = coordinatesSchema.strict();

export type RespondOfferInput = z.infer<typeof respondOfferSchema>;
export type DriverLocationInput = z.infer<typeof driverLocationSchema>;
