/**
 * =============================================================================
 * CACHE SERVICE - Read-through Caching Layer
 * =============================================================================
 *
 * Thin JSON cache on top of RedisService, so it is shared across instances
 * when REDIS_ENABLED=true and process-local otherwise.
 *
 * The cache is never the source of truth:
 * - Read failures are treated as a miss
 * - Write/delete failures are logged and ignored
 * - Writers invalidate after every successful state change
 *
 * FOR BACKEND DEVELOPERS:
 * - Use delete() right after the repository write succeeds
 * =============================================================================
 */

import { RedisService } from './redis.service';
import { logger } from './logger.service';
import { errorMessage } from '../../core/errors/AppError';

export class CacheService {
  private readonly prefix = 'cache:';

  constructor(private redis: RedisService) { }

  async get<T>(key: string): Promise<T | null> {
    try {
      return await this.redis.getJSON<T>(this.prefix + key);
    } catch (error) {
      logger.warn(`[Cache] Read failed for ${key}, treating as miss`, { error: errorMessage(error) });
      return null;
    }
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    try {
      await this.redis.setJSON(this.prefix + key, value, ttlSeconds);
    } catch (error) {
      logger.warn(`[Cache] Write failed for ${key}`, { error: errorMessage(error) });
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.redis.del(this.prefix + key);
    } catch (error) {
      logger.warn(`[Cache] Invalidate failed for ${key}`, { error: errorMessage(error) });
    }
  }

  // ===========================================================================
  // KEY HELPERS
  // ===========================================================================

  static tripKey(tripId: string): string {
    return `trip:${tripId}`;
  }
}
