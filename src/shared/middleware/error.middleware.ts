/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all routes.
 *
 * SECURITY:
 * - Stack traces never reach clients
 * - Infrastructure error messages are hidden (TransientInfraError and
 *   anything that is not an AppError)
 * - All errors are logged server-side
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';
import { isOperationalError, isTransientInfraError } from '../../core/errors/AppError';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const logData = {
    error: error.message,
    path: req.path,
    method: req.method,
    requestId: req.get('x-request-id')
  };

  if (isTransientInfraError(error)) {
    logger.error('Request failed on infrastructure', { ...logData, code: error.code });
    res.status(error.statusCode).json({
      success: false,
      error: {
        code: ErrorCode.SERVICE_UNAVAILABLE,
        message: 'Service temporarily unavailable. Please try again.'
      }
    });
    return;
  }

  if (isOperationalError(error)) {
    // Client-caused rejections are expected traffic
    logger.warn('Request rejected', { ...logData, code: error.code, status: error.statusCode });
    res.status(error.statusCode).json(error.toJSON());
    return;
  }

  logger.error('Unhandled request error', { ...logData, stack: error.stack });

  // Unknown error - never expose internal details to client
  res.status(HTTP_STATUS.INTERNAL_ERROR).json({
    success: false,
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: 'An unexpected error occurred. Please try again later.'
    }
  });
}

/**
 * Async route wrapper to catch async errors
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(HTTP_STATUS.NOT_FOUND).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: `Cannot ${req.method} ${req.path}`
    }
  });
}
