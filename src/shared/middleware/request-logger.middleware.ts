/**
 * =============================================================================
 * REQUEST LOGGER MIDDLEWARE
 * =============================================================================
 *
 * One log line per finished request. Bodies and authorization headers are
 * never logged; sensitive query parameters are masked.
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';

// Query params to mask in logs
const SENSITIVE_PARAMS = ['token', 'key', 'secret', 'password'];

/**
 * Mask sensitive query parameters
 */
export function maskQueryParams(query: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(query)) {
    const isSensitive = SENSITIVE_PARAMS.some(param =>
      key.toLowerCase().includes(param)
    );
    masked[key] = isSensitive ? '[MASKED]' : value;
  }

  return masked;
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const logData = {
      requestId: req.get('x-request-id'),
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration: `${duration}ms`,
      ip: req.ip,
      ...(Object.keys(req.query).length > 0 ? { query: maskQueryParams(req.query) } : {})
    };

    if (res.statusCode >= 500) {
      logger.error('Request failed', logData);
    } else if (res.statusCode >= 400) {
      logger.warn('Request error', logData);
    } else {
      logger.info('Request completed', logData);
    }
  });

  next();
}
