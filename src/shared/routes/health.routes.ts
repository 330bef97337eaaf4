/**
 * =============================================================================
 * HEALTH CHECK ROUTES - Monitoring Endpoints
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health          - Quick health check (for load balancers)
 * - GET /health/live     - Liveness probe (is the process running?)
 * - GET /health/ready    - Readiness probe (can it accept traffic?)
 * - GET /health/detailed - Full system status (internal use)
 *
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { CircuitBreaker, CircuitState } from '../resilience/circuit-breaker';
import { RedisService } from '../services/redis.service';
import { logger } from '../services/logger.service';
import { errorMessage } from '../../core/errors/AppError';

export interface HealthDependencies {
  redis: RedisService;
  breakers: CircuitBreaker[];
  /** Number of matching tasks running in this instance */
  activeMatchingTasks: () => number;
  /** Offers in this instance waiting for a driver's answer */
  pendingOffers: () => number;
}

export function createHealthRouter(deps: HealthDependencies): Router {
  const router = Router();
  const startTime = Date.now();

  /**
   * Basic health check - returns 200 if server is running, nothing else
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString()
    });
  });

  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      pid: process.pid,
      uptime: Math.floor((Date.now() - startTime) / 1000)
    });
  });

  /**
   * Readiness probe - Redis (or its fallback) answers, no circuit open
   */
  router.get('/health/ready', async (_req: Request, res: Response) => {
    try {
      const redisHealth = await deps.redis.healthCheck();
      const checks: Record<string, boolean> = {
        redis: redisHealth.status === 'healthy',
        circuits: deps.breakers.every(cb => cb.getState() !== CircuitState.OPEN)
      };

      const isReady = Object.values(checks).every(v => v);

      res.status(isReady ? 200 : 503).json({
        status: isReady ? 'ready' : 'not_ready',
        checks,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      logger.error('Health check failed', { error: errorMessage(error) });
      res.status(503).json({
        status: 'error',
        message: 'Health check failed'
      });
    }
  });

  router.get('/health/detailed', async (_req: Request, res: Response) => {
    const memUsage = process.memoryUsage();
    const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);

    res.json({
      status: 'healthy',
      environment: process.env.NODE_ENV || 'development',
      timestamp: new Date().toISOString(),

      server: {
        pid: process.pid,
        uptime: formatUptime(uptimeSeconds),
        uptimeSeconds,
        nodeVersion: process.version
      },

      process: {
        memory: {
          heapUsed: formatBytes(memUsage.heapUsed),
          heapTotal: formatBytes(memUsage.heapTotal),
          rss: formatBytes(memUsage.rss)
        }
      },

      redis: await deps.redis.healthCheck(),

      dispatch: {
        activeMatchingTasks: deps.activeMatchingTasks(),
        pendingOffers: deps.pendingOffers()
      },

      circuitBreakers: deps.breakers.map(cb => cb.getStats())
    });
  });

  return router;
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let value = bytes;
  let unitIndex = 0;

  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  return `${value.toFixed(2)} ${units[unitIndex]}`;
}

export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  parts.push(`${secs}s`);

  return parts.join(' ');
}
