// src/middlewares/error.middleware.ts

//======================= IMPORTS =======================//
/**
 * EXPRESS TYPES
 * - ErrorRequestHandler: Special type for error handling middleware
 */
import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';

/**
 * ZOD ERROR TYPE
 * Thrown by the request parsers in the product middleware when a
 * route param, query string or body has the wrong type.
 */
import { ZodError } from 'zod';

import { config } from '@/config';
import logger from '@/utils/logger';

//======================= TYPE DEFINITIONS =======================//
/**
 * CUSTOM ERROR TYPE
 *
 * Properties:
 * - statusCode: HTTP status code sent to the client
 * - message: Human-readable error message
 * - error?: The underlying failure, logged and shown only in development
 *
 * Example usage:
 * next(createError(404, 'Product not found'));
 */
export type AppError = {
  statusCode: number;
  message: string;
  error?: unknown;
};

//======================= ERROR FACTORY =======================//
/**
 * ERROR CREATOR FUNCTION
 *
 * @example
 * // Map a failed service call to the endpoint's fixed status
 * next(createError(500, 'Failed to add product', error));
 */
export const createError = (
  statusCode: number,
  message: string,
  error?: unknown
): AppError => ({
  statusCode,
  message,
  error
});

/**
 * Also matches the http-errors objects body-parser passes along for
 * malformed JSON, which carry their own statusCode.
 */
export const isAppError = (err: unknown): err is AppError =>
  typeof err === 'object' &&
  err !== null &&
  'statusCode' in err &&
  typeof err.statusCode === 'number' &&
  'message' in err &&
  typeof err.message === 'string';

const describeCause = (cause: unknown): unknown =>
  cause instanceof Error ? { name: cause.name, message: cause.message } : cause;

//======================= MAIN ERROR HANDLER =======================//
/**
 * GLOBAL ERROR HANDLING MIDDLEWARE
 *
 * Must be registered after every route.
 *
 * TYPES OF ERRORS HANDLED:
 * 1. Validation Errors (Zod)
 * 2. Custom Application Errors (and body-parser errors)
 * 3. Generic Errors
 *
 * Controllers map every service failure, database errors included, to an
 * AppError, so raw driver errors only arrive here unmapped as a 500.
 */
export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const errorLogger = logger.child({
    handler: 'errorHandler',
    path: req.path,
    method: req.method
  });

  /**
   * HANDLE VALIDATION ERRORS
   *
   * Example:
   * GET /api/products/abc -> id "Expected number, received nan"
   */
  if (err instanceof ZodError) {
    errorLogger.warn({ issues: err.errors }, 'Request rejected by validation');
    res.status(400).json({
      status: 'error',
      message: 'Validation error',
      errors: err.errors
    });
    return;
  }

  /**
   * HANDLE CUSTOM APP ERRORS
   *
   * Example:
   * next(createError(404, 'Product not found'));
   */
  if (isAppError(err)) {
    const cause = describeCause(err.error);
    if (err.statusCode >= 500) {
      errorLogger.error({ statusCode: err.statusCode, cause }, err.message);
    } else {
      errorLogger.warn({ statusCode: err.statusCode, cause }, err.message);
    }

    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
      ...(config.isDevelopment && cause !== undefined && { error: cause })
    });
    return;
  }

  errorLogger.error({ err }, 'Unhandled error');

  /**
   * HANDLE DEFAULT/UNKNOWN ERRORS
   * The real message and stack only leave the server outside production.
   */
  const message = err instanceof Error ? err.message : 'Internal server error';
  res.status(500).json({
    status: 'error',
    message: config.isProduction ? 'Internal server error' : message,
    ...(config.isDevelopment && err instanceof Error && {
      stack: err.stack
    })
  });
};
