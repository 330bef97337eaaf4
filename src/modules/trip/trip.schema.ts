/**
 * =============================================================================
 * TRIP MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { CancelActor, TripStatus } from '../../core/constants';
import { idSchema, locationSchema } from '../../shared/utils/validation.utils';

/**
 * POST /trips
 * Fare and surge come from the pricing service and are taken as given.
 */
export const createTripSchema = z.object({
  riderId: idSchema,
  pickup: locationSchema,
  dropoff: locationSchema,
  fareEstimate: z.number().nonnegative(),
  surgeMultiplier: z.number().min(1).max(10).optional(),
  distanceKm: z.number().nonnegative().optional(),
  notes: z.string().max(500).optional()
}).strict();

export const cancelTripSchema = z.object({
  actor: z.nativeEnum(CancelActor),
  reason: z.string().trim().min(1).max(500)
}).strict();

export const completeTripSchema = z.object({
  finalFare: z.number().nonnegative()
}).strict();

export const rateTripSchema = z.object({
  by: z.enum(['rider', 'driver']),
  rating: z.number().int().min(1).max(5)
}).strict();

/**
 * GET /trips query string
 */
export const listTripsQuerySchema = z.object({
  riderId: idSchema.optional(),
  driverId: idSchema.optional(),
  status: z.nativeEnum(TripStatus).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0)
});

export type CreateTripInput = z.infer<typeof createTripSchema>;
export type CancelTripInput = z.infer<typeof cancelTripSchema>;
export type CompleteTripInput = z.infer<typeof completeTripSchema>;
export type RateTripInput = z.infer<typeof rateTripSchema>;
export type ListTripsQuery = z.infer<typeof listTripsQuerySchema>;
