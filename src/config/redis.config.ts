// src/config/redis.config.ts

import { Redis, type RedisOptions } from 'ioredis';
import logger from '@/utils/logger';
import { config } from '@/config/index';
import { URL } from 'url';

const redisLogger = logger.child({
    module: 'redis',
    context: 'connection'
});

// Redis error codes worth telling apart in the logs
type RedisErrorCode =
    | 'ECONNREFUSED'
    | 'ECONNRESET'
    | 'ETIMEDOUT'
    | 'READONLY'
    | 'LOADING'
    | 'CLUSTERDOWN';

interface RedisError extends Error {
    code?: RedisErrorCode;
}

interface RedisHealthCheck {
    isHealthy: boolean;
    latency?: number;
    error?: string;
    lastChecked: Date;
}

/**
 * Connection options for a redis:// or rediss:// URL.
 */
export function buildRedisOptions(redisUrl: string): RedisOptions {
    const parsedRedisUrl = new URL(redisUrl);

    return {
        host: parsedRedisUrl.hostname,
        port: parseInt(parsedRedisUrl.port, 10) || 6379,
        username: parsedRedisUrl.username || undefined,
        password: parsedRedisUrl.password || undefined,
        db: parseInt(parsedRedisUrl.pathname.slice(1), 10) || 0,

        maxRetriesPerRequest: 3,
        connectTimeout: 10000,
        commandTimeout: 5000,
        keepAlive: 30000,

        retryStrategy(times: number): number | null {
            const delay = Math.min(times * 100, 5000);
            if (times > 50) {
                redisLogger.error('Maximum Redis retry attempts reached');
                return null;
            }
            redisLogger.info({ attempt: times, nextRetryIn: `${delay}ms` }, 'Retrying Redis connection');
            return delay;
        },

        reconnectOnError(err: Error): boolean {
            const shouldReconnect = ['READONLY', 'LOADING', 'CLUSTERDOWN'].some(code => err.message.includes(code));
            if (shouldReconnect) {
                redisLogger.warn({ error: err.message }, 'Reconnecting due to recoverable error');
            }
            return shouldReconnect;
        },

        // Commands fail immediately while disconnected instead of queueing,
        // so the rate limiter can fall through without waiting.
        enableOfflineQueue: false,
        enableReadyCheck: true,
        lazyConnect: true,

        tls: parsedRedisUrl.protocol === 'rediss:' ? { rejectUnauthorized: true } : undefined,
        showFriendlyErrorStack: !config.isProduction
    };
}

/**
 * Creates a client with connection logging attached. The connection is
 * opened by the first health check (lazyConnect).
 */
export function createRedisClient(redisUrl: string): Redis {
    const options = buildRedisOptions(redisUrl);
    const redisClient = new Redis(options);

    redisClient.on('ready', () => {
        redisLogger.info({ host: options.host, port: options.port }, 'Redis client is ready to accept commands');
    });

    redisClient.on('error', (error: RedisError) => {
        redisLogger.error({
            code: error.code,
            message: error.message
        }, 'Redis connection error occurred');
    });

    redisClient.on('close', () => {
        redisLogger.warn('Redis connection closed');
    });

    return redisClient;
}

/**
 * Pings Redis, retrying a few times before reporting it unhealthy.
 */
export async function checkRedisHealth(
    redisClient: Redis,
    { maxAttempts = 3, retryDelay = 1000 }: { maxAttempts?: number; retryDelay?: number } = {}
): Promise<RedisHealthCheck> {
    let lastError = 'Unknown error';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        const startTime = process.hrtime();
        try {
            if (redisClient.status === 'wait' || redisClient.status === 'end') {
                await redisClient.connect();
            }
            const pingResult = await redisClient.ping();
            const [seconds, nanoseconds] = process.hrtime(startTime);

            return {
                isHealthy: pingResult === 'PONG',
                latency: seconds * 1000 + nanoseconds / 1000000,
                lastChecked: new Date()
            };
        } catch (error) {
            lastError = error instanceof Error ? error.message : 'Unknown error';
            redisLogger.error({ attempt, error: lastError }, 'Redis health check failed');

            if (attempt < maxAttempts) {
                await new Promise(resolve => setTimeout(resolve, retryDelay));
            }
        }
    }

    return {
        isHealthy: false,
        error: lastError,
        lastChecked: new Date()
    };
}

export async function closeRedisConnection(redisClient: Redis): Promise<void> {
    try {
        await redisClient.quit();
        redisLogger.info('Redis connection closed successfully');
    } catch (error) {
        redisLogger.error({ error }, 'Error during graceful Redis shutdown');
        redisClient.disconnect();
        redisLogger.warn('Forced Redis disconnect after failed graceful shutdown');
    }
}

export type { RedisError, RedisHealthCheck };
