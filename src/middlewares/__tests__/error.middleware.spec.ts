import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { z } from 'zod';

import { createError, errorHandler, isAppError } from '../error.middleware';

function appThrowing(error: unknown) {
    const app = express();
    app.get('/fail', () => {
        throw error;
    });
    app.use(errorHandler);
    return app;
}

describe('errorHandler', () => {
    it('answers 400 with the issues for a ZodError', async () => {
        const parsed = z.object({ id: z.number() }).safeParse({ id: 'x' });
        if (parsed.success) throw new Error('expected a parse failure');

        const res = await request(appThrowing(parsed.error)).get('/fail');

        expect(res.status).toBe(400);
        expect(res.body.message).toBe('Validation error');
        expect(res.body.errors[0].path).toEqual(['id']);
    });

    it('uses the status and message of an AppError', async () => {
        const res = await request(appThrowing(createError(404, 'Product not found', new Error('no row')))).get('/fail');

        expect(res.status).toBe(404);
        expect(res.body).toEqual({ status: 'error', message: 'Product not found' });
    });

    it('answers 500 for an unmapped database error', async () => {
        const duplicate = Object.assign(new Error('duplicate key value'), { code: '23505' });

        const res = await request(appThrowing(duplicate)).get('/fail');

        expect(res.status).toBe(500);
        expect(res.body).toEqual({ status: 'error', message: 'duplicate key value' });
    });

    it('falls back to 500 for anything else', async () => {
        const res = await request(appThrowing(new Error('boom'))).get('/fail');

        expect(res.status).toBe(500);
        expect(res.body).toEqual({ status: 'error', message: 'boom' });
    });
});

describe('isAppError', () => {
    it('recognises objects with a numeric status code and a message', () => {
        expect(isAppError(createError(500, 'Failed'))).toBe(true);
        expect(isAppError({ statusCode: '500', message: 'Failed' })).toBe(false);
        expect(isAppError(new Error('plain'))).toBe(false);
        expect(isAppError(null)).toBe(false);
    });
});
