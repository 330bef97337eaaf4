/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * DISPATCH TUNING:
 * - Search radius grows from DISPATCH_MIN_RADIUS_KM to DISPATCH_MAX_RADIUS_KM
 *   in DISPATCH_RADIUS_STEP_KM increments
 * - Each offer waits DISPATCH_OFFER_TIMEOUT_MS for the driver to answer
 * - Empty searches back off DISPATCH_RETRY_BACKOFF_MS before widening
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getOptional() for values with sensible defaults
 * =============================================================================
 */

import dotenv from 'dotenv';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get integer environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get decimal environment variable (radii are fractional kilometres)
 */
function getFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const nodeEnv = getOptional('NODE_ENV', 'development');

/**
 * Application configuration object
 * All configuration is validated at startup
 */
export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', '0.0.0.0'),

  // Redis (exclusion sets, offer slots, geo index, event dedupe)
  redis: {
    enabled: getBoolean('REDIS_ENABLED', false),
    url: getOptional('REDIS_URL', 'redis://localhost:6379'),
    maxRetries: getNumber('REDIS_MAX_RETRIES', 5),
    retryDelayMs: getNumber('REDIS_RETRY_DELAY_MS', 1000),
    connectionTimeoutMs: getNumber('REDIS_CONNECTION_TIMEOUT_MS', 10000),
  },

  // Driver matching
  dispatch: {
    minRadiusKm: getFloat('DISPATCH_MIN_RADIUS_KM', 1),
    maxRadiusKm: getFloat('DISPATCH_MAX_RADIUS_KM', 10),
    radiusStepKm: getFloat('DISPATCH_RADIUS_STEP_KM', 1),
    maxRetries: getNumber('DISPATCH_MAX_RETRIES', 3),
    maxCandidates: getNumber('DISPATCH_MAX_CANDIDATES', 10),
    offerTimeoutMs: getNumber('DISPATCH_OFFER_TIMEOUT_MS', 30 * 1000),
    retryBackoffMs: getNumber('DISPATCH_RETRY_BACKOFF_MS', 5 * 1000),
    exclusionTtlSeconds: getNumber('DISPATCH_EXCLUSION_TTL_SECONDS', 24 * 60 * 60),
    repositoryRetries: getNumber('DISPATCH_REPOSITORY_RETRIES', 3),
    repositoryRetryDelayMs: getNumber('DISPATCH_REPOSITORY_RETRY_DELAY_MS', 500),
    // Driver drops out of the geo index when no location update arrives in time
    driverLocationTtlSeconds: getNumber('DISPATCH_DRIVER_LOCATION_TTL_SECONDS', 120),
    geoRequestTimeoutMs: getNumber('DISPATCH_GEO_REQUEST_TIMEOUT_MS', 2000),
  },

  // Domain events
  events: {
    // 'memory' = in-process queue, 'redis' = Redis pub/sub across instances
    broker: getOptional('EVENT_BROKER', 'memory'),
    maxAttempts: getNumber('EVENT_MAX_ATTEMPTS', 3),
    retryBaseDelayMs: getNumber('EVENT_RETRY_BASE_DELAY_MS', 1000),
    dedupeTtlSeconds: getNumber('EVENT_DEDUPE_TTL_SECONDS', 24 * 60 * 60),
  },

  // Trip read cache
  cache: {
    tripTtlSeconds: getNumber('TRIP_CACHE_TTL_SECONDS', 300),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', nodeEnv === 'test' ? 'error' : 'debug'),

  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',
} as const;

export type AppConfig = typeof config;
export type DispatchConfig = typeof config.dispatch;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast if dispatch tuning is inconsistent
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];
  const { dispatch } = config;

  if (dispatch.minRadiusKm <= 0 || dispatch.radiusStepKm <= 0) {
    errors.push('DISPATCH_MIN_RADIUS_KM and DISPATCH_RADIUS_STEP_KM must be positive');
  }
  if (dispatch.maxRadiusKm < dispatch.minRadiusKm) {
    errors.push('DISPATCH_MAX_RADIUS_KM must be >= DISPATCH_MIN_RADIUS_KM');
  }
  if (dispatch.offerTimeoutMs <= 0) {
    errors.push('DISPATCH_OFFER_TIMEOUT_MS must be positive');
  }
  if (config.events.broker !== 'memory' && config.events.broker !== 'redis') {
    errors.push(`EVENT_BROKER must be "memory" or "redis", got "${config.events.broker}"`);
  }

  if (config.isProduction) {
    if (!config.redis.enabled) {
      warnings.push('REDIS_ENABLED is false - offer slots and exclusion sets will not survive restarts');
    }
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is set to "*" - this should be restricted in production');
    }
  }

  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

// Run validation
validateConfig();
