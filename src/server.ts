/**
 * =============================================================================
 * TRIP DISPATCH BACKEND - MAIN SERVER
 * =============================================================================
 *
 * MODULES:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ TRIP       │ Trip lifecycle state machine, ratings, history            │
 * │ MATCHING   │ Radius search, one-driver-at-a-time offers, dispatch      │
 * │ GEO        │ Driver positions in a Redis GEO index                     │
 * │ EVENTS     │ Domain event bus (in-process or Redis pub/sub)            │
 * └─────────────────────────────────────────────────────────────────────────┘
 * =============================================================================
 */

import { createServer } from 'http';
import { config } from './config/environment';
import { createApp } from './app';
import { Container } from './container';
import { logger } from './shared/services/logger.service';
import { errorMessage } from './core/errors/AppError';

const SHUTDOWN_TIMEOUT_MS = 30000;

async function bootstrap(): Promise<void> {
  const container = new Container(config);
  await container.init();

  const app = createApp(container);
  const server = createServer(app);

  server.timeout = 30000;           // 30s max request time
  server.keepAliveTimeout = 65000;  // 65s > ALB idle timeout (60s)
  server.headersTimeout = 66000;    // 66s > keepAliveTimeout

  server.listen(config.port, config.host, () => {
    logger.info(`🚕 Trip dispatch backend listening on http://${config.host}:${config.port}`, {
      environment: config.nodeEnv,
      redis: container.redis.isRedisEnabled() ? 'redis' : 'memory',
      broker: config.events.broker
    });
  });

  let shuttingDown = false;

  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received. Starting graceful shutdown...`);

    const forceExit = setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    await new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) {
          logger.error('Error closing HTTP server', { error: error.message });
        } else {
          logger.info('HTTP server closed');
        }
        resolve();
      });
    });

    try {
      await container.shutdown();
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => { void gracefulShutdown('SIGTERM'); });
  process.on('SIGINT', () => { void gracefulShutdown('SIGINT'); });
}

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { error: errorMessage(reason) });
  process.exit(1);
});

bootstrap().catch((error: unknown) => {
  logger.error('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
});
