import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';

import { createApp } from '@/app';
import { InMemoryProductService } from '@/api/services/memory-products.service';
import {
    productIdParamsSchema,
    rateLimitProducts,
    RedisRateLimitStore,
    sortQuerySchema,
    type RateLimitStore,
    type RateLimitTransaction,
} from '../product.middleware';

class CountingStore implements RateLimitStore {
    readonly hits = new Map<string, number>();
    readonly windows: number[] = [];

    async hit(key: string, windowSeconds: number): Promise<number> {
        const count = (this.hits.get(key) ?? 0) + 1;
        this.hits.set(key, count);
        this.windows.push(windowSeconds);
        return count;
    }
}

class BrokenStore implements RateLimitStore {
    async hit(): Promise<number> {
        throw new Error('ECONNREFUSED');
    }
}

describe('rateLimitProducts', () => {
    let store: CountingStore;

    beforeEach(() => {
        store = new CountingStore();
    });

    const appWith = (rateStore: RateLimitStore) =>
        createApp({
            productService: new InMemoryProductService([
                { name: 'Desk Lamp', description: 'LED lamp', price: 24.5, category: 'Lighting' },
            ]),
            rateLimiter: rateLimitProducts(rateStore, { max: 2, windowSeconds: 60, keyPrefix: 'test:' }),
            apiPrefix: '/api',
        });

    it('sets rate limit headers while under the limit', async () => {
        const app = appWith(store);

        const res = await request(app).get('/api/products/total-count');

        expect(res.status).toBe(200);
        expect(res.headers['x-ratelimit-limit']).toBe('2');
        expect(res.headers['x-ratelimit-remaining']).toBe('1');
        expect(store.windows).toEqual([60]);
        expect([...store.hits.keys()][0]).toMatch(/^test:products:/);
    });

    it('returns 429 once the limit is exceeded', async () => {
        const app = appWith(store);

        await request(app).get('/api/products');
        await request(app).get('/api/products');
        const res = await request(app).get('/api/products');

        expect(res.status).toBe(429);
        expect(res.body).toEqual({ status: 'error', message: 'Too many requests' });
        expect(res.headers['x-ratelimit-remaining']).toBe('0');
    });

    it('lets requests through when the store is unavailable', async () => {
        const app = appWith(new BrokenStore());

        const res = await request(app).get('/api/products/1');

        expect(res.status).toBe(200);
        expect(res.body.data.name).toBe('Desk Lamp');
        expect(res.headers['x-ratelimit-limit']).toBeUndefined();
    });

    it('does not limit routes outside /products', async () => {
        const app = appWith(store);

        await request(app).get('/api/health');

        expect(store.hits.size).toBe(0);
    });
});

describe('request schemas', () => {
    it('binds any decimal integer id', () => {
        expect(productIdParamsSchema.parse({ id: '12' })).toEqual({ id: 12 });
        expect(productIdParamsSchema.parse({ id: '0' })).toEqual({ id: 0 });
        expect(productIdParamsSchema.parse({ id: '-1' })).toEqual({ id: -1 });
    });

    it.each(['abc', '1.5', '1e3', '0x10', ' 7', '', '99999999999999999999'])('rejects the id %j', (id) => {
        expect(productIdParamsSchema.safeParse({ id }).success).toBe(false);
    });

    it('normalises the sort order', () => {
        expect(sortQuerySchema.parse({ criteria: 'name' })).toEqual({ criteria: 'name', order: 'asc' });
        expect(sortQuerySchema.parse({ criteria: 'price', order: ' Desc ' })).toEqual({ criteria: 'price', order: 'desc' });
        expect(sortQuerySchema.safeParse({ criteria: 'price', order: 'constructor' }).success).toBe(false);
    });
});

type ExecResult = Awaited<ReturnType<RateLimitTransaction['exec']>>;

class FakeTransaction implements RateLimitTransaction {
    readonly commands: unknown[][] = [];

    constructor(private readonly result: ExecResult) {}

    zremrangebyscore(key: string, min: number, max: number): RateLimitTransaction {
        this.commands.push(['zremrangebyscore', key, min, max]);
        return this;
    }

    zadd(key: string, score: number, member: string): RateLimitTransaction {
        this.commands.push(['zadd', key, score, member]);
        return this;
    }

    zcard(key: string): RateLimitTransaction {
        this.commands.push(['zcard', key]);
        return this;
    }

    expire(key: string, seconds: number): RateLimitTransaction {
        this.commands.push(['expire', key, seconds]);
        return this;
    }

    async exec(): Promise<ExecResult> {
        return this.result;
    }
}

describe('RedisRateLimitStore', () => {
    const storeReturning = (result: ExecResult) => {
        const transaction = new FakeTransaction(result);
        return { transaction, store: new RedisRateLimitStore({ multi: () => transaction }) };
    };

    it('trims the window, records the hit and returns the ZCARD count', async () => {
        const { transaction, store } = storeReturning([[null, 0], [null, 1], [null, 3], [null, 1]]);

        const count = await store.hit('test:products:1.2.3.4', 60, 1000);

        expect(count).toBe(3);
        expect(transaction.commands.map((command) => command[0])).toEqual([
            'zremrangebyscore',
            'zadd',
            'zcard',
            'expire',
        ]);
        expect(transaction.commands[0]).toEqual(['zremrangebyscore', 'test:products:1.2.3.4', 0, 940]);
        expect(transaction.commands[1]?.[2]).toBe(1000);
        expect(String(transaction.commands[1]?.[3])).toMatch(/^1000-/);
        expect(transaction.commands[3]).toEqual(['expire', 'test:products:1.2.3.4', 60]);
    });

    it('throws when the transaction is aborted', async () => {
        const { store } = storeReturning(null);

        await expect(store.hit('test:products:1.2.3.4', 60, 1000)).rejects.toThrow(
            'Rate limit transaction was aborted'
        );
    });

    it('rethrows a failed ZCARD', async () => {
        const failure = new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
        const { store } = storeReturning([[null, 0], [null, 1], [failure, null], [null, 1]]);

        await expect(store.hit('test:products:1.2.3.4', 60, 1000)).rejects.toBe(failure);
    });
});
