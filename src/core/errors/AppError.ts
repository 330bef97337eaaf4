/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // State machine rejection (returned, not thrown)
 * return { success: false, error: new InvalidTransitionError(trip.status, TripStatus.ACCEPTED) };
 *
 * // Infrastructure failure at an adapter boundary
 * throw new TransientInfraError('Geo index unreachable', ErrorCode.GEO_UNAVAILABLE);
 * ```
 *
 * TAXONOMY:
 * - ValidationError         400  invalid input or invalid state transition
 * - NotFoundError           404  HTTP boundary only; internally "not found" is null
 * - ConflictError           409  conditional update matched zero rows
 * - BusinessRuleViolation   422  rider/driver already busy, rating twice
 * - TransientInfraError     503  geo / repository / broker failures
 *
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS, TripStatus } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): ErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
        timestamp: this.timestamp
      }
    };
  }
}

/**
 * Error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: string;
  };
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * 400 Validation Error - Schema/input validation failed
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = [],
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, true, { ...details, ...(errors.length > 0 && { errors }) });
    this.errors = errors;
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError('Invalid request data', errors);
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(
    message: string = 'Resource not found',
    code: ErrorCode | string = 'NOT_FOUND',
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.NOT_FOUND, code, true, details);
  }
}

/**
 * 409 Conflict - Concurrent modification lost the race
 */
export class ConflictError extends AppError {
  constructor(
    message: string = 'Resource conflict',
    code: ErrorCode | string = 'CONFLICT',
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.CONFLICT, code, true, details);
  }
}

/**
 * 422 Business Rule Violation - Valid request that the domain refuses
 */
export class BusinessRuleViolationError extends AppError {
  constructor(
    message: string,
    code: ErrorCode | string,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.UNPROCESSABLE, code, true, details);
  }
}

/**
 * 503 Transient Infrastructure Error - Dependency down or timed out
 */
export class TransientInfraError extends AppError {
  constructor(
    message: string = 'Service temporarily unavailable',
    code: ErrorCode | string = ErrorCode.SERVICE_UNAVAILABLE,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.SERVICE_UNAVAILABLE, code, true, details);
  }
}

// =============================================================================
// DOMAIN-SPECIFIC ERRORS
// =============================================================================

export class TripNotFoundError extends NotFoundError {
  constructor(tripId: string) {
    super(`Trip not found: ${tripId}`, ErrorCode.TRIP_NOT_FOUND, { tripId });
  }
}

export class InvalidTransitionError extends ValidationError {
  constructor(currentStatus: TripStatus, attemptedStatus: TripStatus) {
    super(
      `Cannot move trip from ${currentStatus} to ${attemptedStatus}`,
      [],
      ErrorCode.INVALID_TRANSITION,
      { currentStatus, attemptedStatus }
    );
  }
}

export class TripStatusConflictError extends ConflictError {
  constructor(tripId: string, expectedStatus: TripStatus) {
    super(
      'Trip status changed concurrently',
      ErrorCode.TRIP_STATUS_CONFLICT,
      { tripId, expectedStatus }
    );
  }
}

// =============================================================================
// ERROR TYPE GUARDS
// =============================================================================

/**
 * Check if error is an operational (expected) error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

export function isTransientInfraError(error: unknown): error is TransientInfraError {
  return error instanceof TransientInfraError;
}

/**
 * Message of any thrown value, for logging
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
