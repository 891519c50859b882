// src/app.ts

/**
 * STANDARD IMPORTS
 */
import express, { type Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import compression from 'compression';

import type { Request, Response } from 'express';

/**
 * CUSTOM UTILITIES AND CONFIGURATIONS
 */
import { config } from '@/config';
import { errorHandler } from '@/middlewares/error.middleware';
import { addCorrelationId, requestLogger } from '@/middlewares/logging.middleware';
import { createApiRouter, type ApiRouterDeps } from '@/api/routes';

export type AppOptions = ApiRouterDeps & {
  /** Defaults to config.server.apiPrefix. */
  apiPrefix?: string;
};

/**
 * CREATE EXPRESS APPLICATION
 * Builds the app without listening, so tests can drive it with supertest.
 */
export function createApp({ apiPrefix = config.server.apiPrefix, ...deps }: AppOptions): Express {
  const app = express();

  // Basic middleware setup
  app.use(helmet());
  app.use(cors());
  app.use(compression());
  app.use(express.json());
  app.use(addCorrelationId);
  app.use(requestLogger);

  // Health check endpoint
  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({
      status: 'success',
      message: 'Server is healthy',
      timestamp: new Date().toISOString()
    });
  });

  // API routes
  app.use(apiPrefix, createApiRouter(deps));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
