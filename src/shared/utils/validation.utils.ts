/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 * Shared validation schemas and utilities.
 * =============================================================================
 */

import { z } from 'zod';
import { ValidationError } from '../../core/errors/AppError';

// ============================================================
// COMMON SCHEMAS
// ============================================================

/**
 * Opaque identifier (trip, rider, driver ids)
 */
export const idSchema = z.string().trim().min(1).max(128);

/**
 * UUID schema
 */
export const uuidSchema = z.string().uuid();

/**
 * Coordinates schema
 */
export const coordinatesSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180)
});

/**
 * Location schema (coordinates + optional street address)
 */
export const locationSchema = coordinatesSchema.extend({
  address: z.string().min(1).max(500).optional()
});

// ============================================================
// VALIDATION HELPERS
// ============================================================

/**
 * Synchronous schema validation - validates data and returns parsed result
 * @throws ValidationError on validation failure
 */
export function validateSchema<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}

