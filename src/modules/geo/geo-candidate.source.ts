/**
 * =============================================================================
 * GEO MODULE - CANDIDATE SOURCE
 * =============================================================================
 *
 * Answers "which drivers are within R km of this point, nearest first".
 *
 * REDIS KEYS:
 * - drivers:locations            GEO set, member = driverId
 * - driver:heartbeat:{driverId}  Presence marker (TTL); no marker = offline
 *
 * Drivers push their position through updateDriverLocation(); a driver whose
 * heartbeat has expired is dropped from the index on the next query.
 * =============================================================================
 */

import { ErrorCode } from '../../core/constants';
import { TransientInfraError, errorMessage } from '../../core/errors/AppError';
import { CircuitBreaker } from '../../shared/resilience/circuit-breaker';
import { RedisService } from '../../shared/services/redis.service';
import { logger } from '../../shared/services/logger.service';

/**
 * Read-only projection returned by a geo query
 */
export interface DriverCandidate {
  driverId: string;
  distanceKm: number;
}

export interface IGeoCandidateSource {
  /**
   * Drivers within radiusKm of (latitude, longitude), ascending by distance,
   * at most `limit` entries.
   * @throws TransientInfraError when the index cannot be queried
   */
  nearby(latitude: number, longitude: number, radiusKm: number, limit: number): Promise<DriverCandidate[]>;
}

export interface GeoCandidateSourceOptions {
  driverLocationTtlSeconds: number;
}

const REDIS_KEYS = {
  LOCATIONS: 'drivers:locations',
  HEARTBEAT: (driverId: string) => `driver:heartbeat:${driverId}`
};

export class RedisGeoCandidateSource implements IGeoCandidateSource {
  constructor(
    private redis: RedisService,
    private breaker: CircuitBreaker,
    private options: GeoCandidateSourceOptions
  ) { }

  async nearby(latitude: number, longitude: number, radiusKm: number, limit: number): Promise<DriverCandidate[]> {
    try {
      return await this.breaker.execute(async () => {
        const members = await this.redis.geoRadius(REDIS_KEYS.LOCATIONS, longitude, latitude, radiusKm, 'km', limit);
        const candidates: DriverCandidate[] = [];

        for (const { member, distance } of members) {
          if (await this.redis.exists(REDIS_KEYS.HEARTBEAT(member))) {
            candidates.push({ driverId: member, distanceKm: distance });
          } else {
            // Stale entry, driver went offline without telling us
            await this.redis.geoRemove(REDIS_KEYS.LOCATIONS, member);
            logger.debug(`[Geo] Removed stale driver ${member}`);
          }
        }

        return candidates;
      });
    } catch (error) {
      throw new TransientInfraError(`Geo query failed: ${errorMessage(error)}`, ErrorCode.GEO_UNAVAILABLE, {
        radiusKm
      });
    }
  }

  /**
   * Driver online / position update
   */
  async updateDriverLocation(driverId: string, latitude: number, longitude: number): Promise<void> {
    await this.redis.geoAdd(REDIS_KEYS.LOCATIONS, longitude, latitude, driverId);
    await this.redis.set(REDIS_KEYS.HEARTBEAT(driverId), new Date().toISOString(), this.options.driverLocationTtlSeconds);
    logger.debug(`[Geo] ${driverId} @ (${latitude}, ${longitude})`);
  }

  /**
   * Driver offline
   */
  async removeDriver(driverId: string): Promise<void> {
    await this.redis.geoRemove(REDIS_KEYS.LOCATIONS, driverId);
    await this.redis.del(REDIS_KEYS.HEARTBEAT(driverId));
    logger.debug(`[Geo] ${driverId} went offline`);
  }
}
