// src/index.ts

/**
 * ENVIRONMENT VARIABLES
 * Load these first before anything else
 */
import 'dotenv/config';

import type { Server } from 'http';
import type { Redis } from 'ioredis';

/**
 * CUSTOM UTILITIES AND CONFIGURATIONS
 */
import pool, { closePool, testConnection } from '@/db/config';
import { checkRedisHealth, closeRedisConnection, createRedisClient } from '@/config/redis.config';
import logger from '@/utils/logger';
import { config } from '@/config';
import { createApp } from '@/app';
import { PgProductService } from '@/api/services/products.service';
import { InMemoryProductService } from '@/api/services/memory-products.service';
import { RedisRateLimitStore, rateLimitProducts } from '@/api/middlewares/product.middleware';
import type { RequestHandler } from 'express';
import type { ProductService } from '@/types/products.types';

/**
 * APPLICATION LOGGER
 */
const appLogger = logger.child({
  module: 'app',
  context: 'server'
});

let server: Server | undefined;
let redisClient: Redis | undefined;

/**
 * PRODUCT STORE
 * PRODUCT_STORE=memory runs the API without PostgreSQL.
 */
async function createProductService(): Promise<ProductService> {
  if (config.products.store === 'memory') {
    appLogger.warn('Using in-memory product store. Data is lost on restart.');
    return new InMemoryProductService();
  }

  await testConnection();
  appLogger.info('Database connection test passed');
  return new PgProductService(pool);
}

/**
 * RATE LIMITER
 * Only mounted when REDIS_URL is set and Redis answers at start-up.
 */
async function createRateLimiter(): Promise<RequestHandler | undefined> {
  if (!config.redis.url) {
    appLogger.info('REDIS_URL not set. Rate limiting disabled.');
    return undefined;
  }

  redisClient = createRedisClient(config.redis.url);
  const redisHealth = await checkRedisHealth(redisClient);
  if (!redisHealth.isHealthy) {
    appLogger.warn({
      error: redisHealth.error
    }, 'Redis health check failed. Proceeding without rate limiting...');
    await closeRedisConnection(redisClient);
    redisClient = undefined;
    return undefined;
  }

  appLogger.info({ latency: redisHealth.latency }, 'Redis health check passed');
  return rateLimitProducts(new RedisRateLimitStore(redisClient), {
    max: config.server.rateLimit.max,
    windowSeconds: config.server.rateLimit.windowSeconds,
    keyPrefix: config.redis.keyPrefix.rateLimit
  });
}

/**
 * SERVER STARTUP FUNCTION
 * Handles the entire startup sequence including service checks
 */
async function startServer() {
  try {
    const rateLimiter = await createRateLimiter();
    const productService = await createProductService();

    const app = createApp({ productService, rateLimiter });
    const port = config.server.port;

    server = app.listen(port, () => {
      appLogger.info({
        port,
        env: config.env,
        apiPrefix: config.server.apiPrefix,
        productStore: config.products.store,
        rateLimiting: Boolean(rateLimiter)
      }, 'Server started successfully 🚀');
    });
  } catch (error) {
    appLogger.error({
      error: error instanceof Error ? error.message : 'Unknown error',
      stack: error instanceof Error ? error.stack : undefined
    }, 'Failed to start server');

    process.exit(1);
  }
}

/**
 * GRACEFUL SHUTDOWN
 * Stops accepting connections, then closes Redis and the pg pool.
 */
async function shutdown(signal: NodeJS.Signals): Promise<void> {
  appLogger.info({ signal }, 'Shutdown signal received. Starting graceful shutdown...');

  const httpServer = server;
  if (httpServer) {
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => (error ? reject(error) : resolve()));
    });
  }
  if (redisClient) {
    await closeRedisConnection(redisClient);
  }
  if (config.products.store === 'postgres') {
    await closePool();
  }

  appLogger.info('Shutdown complete');
}

/**
 * PROCESS EVENT HANDLERS
 */
process.on('uncaughtException', (error: Error) => {
  appLogger.error({
    error: error.message,
    stack: error.stack,
    type: 'UncaughtException'
  }, 'Uncaught exception occurred');

  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  appLogger.error({
    reason,
    type: 'UnhandledRejection'
  }, 'Unhandled promise rejection');

  process.exit(1);
});

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        appLogger.error({ error }, 'Graceful shutdown failed');
        process.exit(1);
      });
  });
}

/**
* START THE SERVER
*/
void startServer();
