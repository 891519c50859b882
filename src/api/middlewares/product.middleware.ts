/**
 * PRODUCTS MIDDLEWARE
 *
 * Request parsing and rate limiting for the product endpoints:
 *
 * 1. Zod schemas that bind route params, query strings and bodies to typed values
 * 2. A sliding-window rate limiter backed by a Redis sorted set
 *
 * The schemas only check JSON/param *types*. Business rules for products
 * belong to the ProductService implementation.
 */

//======================= IMPORTS =======================//

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';

import logger from '@/utils/logger';
import { createError } from '@/middlewares/error.middleware';
import { SORT_CRITERIA, type SortOrder } from '@/types/products.types';

//======================= VALIDATION SCHEMAS =======================//

/**
 * `:id` route param: a plain decimal integer ("0" and "-1" included).
 * Rejects "abc", "1.5", "1e3", "0x10" and " 7". Whether the id exists is
 * the service's call.
 */
export const productIdParamsSchema = z.object({
    id: z
        .string()
        .regex(/^-?\d+$/, 'id must be an integer')
        .transform(Number)
        .refine(Number.isSafeInteger, 'id is out of range')
});

export const categoryParamsSchema = z.object({
    category: z.string()
});

/**
 * Body for create and update. Unknown keys (including `id`) are stripped.
 */
export const productBodySchema = z.object({
    name: z.string(),
    description: z.string().default(''),
    price: z.number(),
    category: z.string()
});

export const searchQuerySchema = z.object({
    name: z.string({ required_error: 'name query parameter is required' })
});

const SORT_ORDER_ALIASES = new Map<string, SortOrder>([
    ['asc', 'asc'],
    ['ascending', 'asc'],
    ['desc', 'desc'],
    ['descending', 'desc']
]);

/**
 * `order` is optional and case-insensitive; absent means ascending.
 */
export const sortOrderSchema = z
    .string()
    .optional()
    .transform((value, ctx): SortOrder => {
        if (value === undefined) {
            return 'asc';
        }
        const order = SORT_ORDER_ALIASES.get(value.trim().toLowerCase());
        if (!order) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'order must be one of asc, desc'
            });
            return z.NEVER;
        }
        return order;
    });

export const sortQuerySchema = z.object({
    criteria: z.enum(SORT_CRITERIA, {
        errorMap: () => ({ message: `criteria must be one of ${SORT_CRITERIA.join(', ')}` })
    }),
    order: sortOrderSchema
});

//======================= MIDDLEWARE SETUP =======================//

const productLogger = logger.child({
    module: 'products-middleware',
    layer: 'middleware'
});

//======================= MIDDLEWARE FUNCTIONS =======================//

/**
 * Binds one part of the request to a schema.
 *
 * Resolves to the parsed value, or to `undefined` after handing the
 * ZodError to the error handler (which answers 400).
 *
 * @example
 * const params = parseRequest(productIdParamsSchema, req.params, next);
 * if (!params) return;
 */
export function parseRequest<T extends z.ZodTypeAny>(
    schema: T,
    value: unknown,
    next: NextFunction
): z.output<T> | undefined {
    const result = schema.safeParse(value);
    if (!result.success) {
        next(result.error);
        return undefined;
    }
    return result.data;
}

/**
 * Counts hits for a key inside a sliding window.
 */
export interface RateLimitStore {
    /** Records one hit and resolves with the number of hits inside the window, this one included. */
    hit(key: string, windowSeconds: number, now: number): Promise<number>;
}

/**
 * The MULTI commands the sliding window issues. An ioredis `Redis`
 * client satisfies it.
 */
export interface RateLimitTransaction {
    zremrangebyscore(key: string, min: number, max: number): RateLimitTransaction;
    zadd(key: string, score: number, member: string): RateLimitTransaction;
    zcard(key: string): RateLimitTransaction;
    expire(key: string, seconds: number): RateLimitTransaction;
    exec(): Promise<[error: Error | null, result: unknown][] | null>;
}

export interface RateLimitRedis {
    multi(): RateLimitTransaction;
}

/**
 * Sliding window on a sorted set: members scored by timestamp, anything older
 * than the window trimmed before counting.
 */
export class RedisRateLimitStore implements RateLimitStore {
    constructor(private readonly redis: RateLimitRedis) {}

    async hit(key: string, windowSeconds: number, now: number): Promise<number> {
        const results = await this.redis
            .multi()
            .zremrangebyscore(key, 0, now - windowSeconds)
            .zadd(key, now, `${now}-${Math.random()}`)
            .zcard(key)
            .expire(key, windowSeconds)
            .exec();

        const zcard = results?.[2];
        if (!zcard) {
            throw new Error('Rate limit transaction was aborted');
        }
        const [error, count] = zcard;
        if (error) {
            throw error;
        }
        return Number(count);
    }
}

export type RateLimitOptions = {
    max: number;
    windowSeconds: number;
    keyPrefix: string;
};

/**
 * Rate limiting middleware for product-related actions.
 *
 * A store failure lets the request through: the catalog stays available
 * when Redis is down.
 */
export function rateLimitProducts(store: RateLimitStore, options: RateLimitOptions): RequestHandler {
    const { max, windowSeconds, keyPrefix } = options;

    return async function rateLimitMiddleware(req: Request, res: Response, next: NextFunction): Promise<void> {
        const ip = req.ip || req.socket.remoteAddress || '0.0.0.0';
        const key = `${keyPrefix}products:${ip}`;
        const now = Math.floor(Date.now() / 1000);

        let count: number;
        try {
            count = await store.hit(key, windowSeconds, now);
        } catch (error) {
            productLogger.warn({
                error: error instanceof Error ? error.message : error,
                ip
            }, 'Rate limit store unavailable, allowing request');
            next();
            return;
        }

        res.setHeader('X-RateLimit-Limit', max);
        res.setHeader('X-RateLimit-Remaining', Math.max(0, max - count));
        res.setHeader('X-RateLimit-Reset', now + windowSeconds);

        if (count > max) {
            productLogger.warn({ ip, count, max, path: req.path }, 'Rate limit exceeded');
            next(createError(429, 'Too many requests'));
            return;
        }

        next();
    };
}
