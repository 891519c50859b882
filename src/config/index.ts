// src/config/index.ts

// Zod checks the *shape* of the environment at runtime, the same way TypeScript checks it at compile time.
import { z } from 'zod';

import logger from '@/utils/logger';

// Config errors get their own child logger so they are easy to find at boot.
const configLogger = logger.child({ module: 'config' });

// Redis key prefixes. Everything this service writes to Redis lives under one of these.
interface RedisKeyPrefixes {
    readonly rateLimit: `${string}rate-limit:`;
}

const port = z.string().regex(/^\d+$/).transform(Number).pipe(z.number().min(1).max(65535));

const envSchema = z.object({
    // NODE_ENV: 'development', 'production' or 'test'. Affects logging and error detail in responses.
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // PORT: The port the HTTP server listens on.
    PORT: port.default('3000'),

    // API_PREFIX: Where the API router is mounted. Product routes live at `${API_PREFIX}/products`.
    API_PREFIX: z.string().startsWith('/').default('/api'),

    // PRODUCT_STORE: Which ProductService backs the API. 'memory' runs without a database.
    PRODUCT_STORE: z.enum(['postgres', 'memory']).default('postgres'),

    // Database Configuration (PostgreSQL)
    DB_HOST: z.string().default('localhost'),
    DB_PORT: port.default('5432'),
    DB_NAME: z.string().default('product_catalog'),
    DB_USER: z.string().default('postgres'),
    DB_PASSWORD: z.string().default('postgres'),
    DATABASE_URL: z.string().url().optional(), // Alternative to the individual DB_* settings.

    // Redis Configuration. Rate limiting is switched off when REDIS_URL is absent.
    REDIS_URL: z.string().url().optional(),
    REDIS_PREFIX: z.string().default('catalog:'),

    // RATE_LIMIT requests per RATE_LIMIT_WINDOW per client IP on the product routes. The window accepts '<n>s' or '<n>m'.
    RATE_LIMIT: z.string().regex(/^\d+$/).default('100'),
    RATE_LIMIT_WINDOW: z.string().regex(/^\d+[sm]?$/, 'Use seconds (30s) or minutes (1m)').default('1m'),

    // Logging Configuration. Read by the logger itself (it starts before this schema runs); validated here.
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

// Parse and validate the environment. A broken environment stops the process before anything listens.
const parseEnv = () => {
    const result = envSchema.safeParse(process.env);

    if (!result.success) {
        configLogger.error({ errors: result.error.format() }, 'Invalid environment configuration');
        process.exit(1);
    }

    return result.data;
};

const env = parseEnv();

// Converts '30s' / '5m' / '60' into seconds.
const toWindowSeconds = (window: string): number => {
    const amount = parseInt(window, 10);
    return window.endsWith('m') ? amount * 60 : amount;
};

const keyPrefix: RedisKeyPrefixes = {
    rateLimit: `${env.REDIS_PREFIX}rate-limit:`,
};

export const config = {
    env: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',
    server: {
        port: env.PORT,
        apiPrefix: env.API_PREFIX,
        rateLimit: {
            max: parseInt(env.RATE_LIMIT, 10),
            windowSeconds: toWindowSeconds(env.RATE_LIMIT_WINDOW),
        },
    },
    products: {
        store: env.PRODUCT_STORE,
    },
    db: {
        host: env.DB_HOST,
        port: env.DB_PORT,
        name: env.DB_NAME,
        user: env.DB_USER,
        password: env.DB_PASSWORD,
        url: env.DATABASE_URL,
    },
    redis: {
        url: env.REDIS_URL,
        keyPrefix,
    },
} as const;

export type Config = typeof config;

// Checks that span more than one variable, which the schema alone can't express.
// Like a schema failure, any problem here stops the process before anything listens.
function validateConfig() {
    const problems: string[] = [];

    if (!config.db.url && (!config.db.host || !config.db.name || !config.db.user)) {
        problems.push('Either DATABASE_URL or all of DB_HOST, DB_PORT, DB_NAME and DB_USER must be provided');
    }

    if (config.server.rateLimit.max < 1) {
        problems.push('Rate limit maximum must be positive');
    }

    if (config.server.rateLimit.windowSeconds < 1) {
        problems.push('Rate limit window must be at least one second');
    }

    if (problems.length > 0) {
        configLogger.error({ problems }, 'Invalid configuration');
        process.exit(1);
    }

    configLogger.info({
        env: config.env,
        apiPrefix: config.server.apiPrefix,
        productStore: config.products.store,
        rateLimiting: Boolean(config.redis.url),
    }, 'Configuration validated successfully');
}

validateConfig();
