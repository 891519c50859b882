//======================= IMPORTS =======================//
import type { Request, Response, NextFunction } from 'express';

import logger from '@/utils/logger';

/**
 * UUID Generator:
 * - Built into Node.js (no extra dependencies)
 * - Format: 550e8400-e29b-41d4-a716-446655440000
 */
import { randomUUID } from 'crypto';

//=================== TYPE DEFINITIONS ===================//
/**
 * EXTENDING THE REQUEST TYPE
 *
 * 1. id: Unique identifier for each request, echoed as X-Request-Id
 * 2. correlationId: Shared by every request that belongs to the same
 *    client operation, echoed as X-Correlation-Id
 */
export type RequestWithId = Request & {
  id?: string;
  correlationId?: string;
};

//=================== UTILITY FUNCTIONS ===================//
/**
 * REQUEST DURATION CALCULATOR
 * process.hrtime is monotonic, so clock changes don't skew durations.
 *
 * @example
 * const start = process.hrtime();
 * getDuration(start); // "123.45ms"
 */
const getDuration = (startTime: [number, number]): string => {
  const [seconds, nanoseconds] = process.hrtime(startTime);
  const duration = seconds * 1000 + nanoseconds / 1000000;
  return `${duration.toFixed(2)}ms`;
};

/**
 * REQUEST CONTEXT CREATOR
 * Bodies are left out of GET requests, which shouldn't carry one.
 */
const createRequestContext = (req: RequestWithId) => ({
  requestId: req.id,
  correlationId: req.correlationId,
  path: req.path,
  method: req.method,
  query: req.query,
  body: req.method !== 'GET' ? req.body : undefined,
  ip: req.ip,
  userAgent: req.get('user-agent'),
  handler: 'requestLogger'
});

//=================== MIDDLEWARE FUNCTIONS ===================//
/**
 * MAIN REQUEST LOGGER MIDDLEWARE
 *
 * HOW IT WORKS:
 * 1. Request comes in
 * 2. Generate unique ID
 * 3. Start timing
 * 4. Log request details
 * 5. Wait for completion
 * 6. Log response details
 */
export const requestLogger = (
  req: RequestWithId,
  res: Response,
  next: NextFunction
) => {
  req.id = randomUUID();

  const startTime = process.hrtime();

  const requestLogger = logger.child(createRequestContext(req));

  requestLogger.info('Incoming request');

  res.on('finish', () => {
    requestLogger.info({
      statusCode: res.statusCode,
      duration: getDuration(startTime)
    }, 'Request completed');
  });

  req.on('error', (error) => {
    requestLogger.error({ error }, 'Request error');
  });

  // Lets clients quote a specific request in bug reports
  res.setHeader('X-Request-Id', req.id);

  next();
};

/**
 * CORRELATION ID MIDDLEWARE
 *
 * Reuses the caller's X-Correlation-Id when present, otherwise starts
 * a new one. Registered before requestLogger so the id lands in the
 * request log context.
 */
export const addCorrelationId = (
  req: RequestWithId,
  res: Response,
  next: NextFunction
) => {
  const correlationId = req.get('X-Correlation-Id') || randomUUID();

  req.correlationId = correlationId;

  res.setHeader('X-Correlation-Id', correlationId);

  next();
};
