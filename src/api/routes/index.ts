import { Router } from 'express';

/**
 * REQUEST AND RESPONSE TYPES
 *
 * Example:
 * req.query.page -> TypeScript knows this might be undefined
 */
import type { Request, Response } from 'express';

import logger from '@/utils/logger';
import type { ProductService } from '@/types/products.types';

import { createProductRouter, type ProductRouterOptions } from './products.routes';

//======================= ROUTER SETUP =======================//
/**
 * CREATE ROUTE-SPECIFIC LOGGER
 *
 * Example log output:
 * {
 *   module: 'routes',
 *   msg: 'Route not found',
 *   path: '/nonexistent'
 * }
 */
const routeLogger = logger.child({ module: 'routes' });

export type ApiRouterDeps = {
  productService: ProductService;
} & ProductRouterOptions;

/**
 * API ROUTER FACTORY
 * The product service is passed in rather than imported, so tests and
 * PRODUCT_STORE can choose the implementation.
 *
 * Mounted by the app under config.server.apiPrefix ('/api' by default):
 * - GET  /api/health
 * - ALL  /api/products/...
 * - 404 handler for any other /api/* route
 */
export const createApiRouter = ({ productService, rateLimiter }: ApiRouterDeps): Router => {
  const router = Router();

  //======================= HEALTH CHECK ROUTE =======================//
  /**
   * HEALTH CHECK ENDPOINT
   * Used by load balancers and container readiness/liveness checks.
   *
   * Example usage:
   * curl http://your-api/api/health
   */
  router.get('/health', (req: Request, res: Response) => {
    res.status(200).json({
      status: 'success',
      message: 'Server is healthy'
    });
  });

  router.use('/products', createProductRouter(productService, { rateLimiter }));

  //======================= 404 HANDLER =======================//
  /**
   * 404 NOT FOUND HANDLER
   * router.use catches every HTTP method, and runs after all other routes.
   * Unknown paths are logged since they are often misconfigured clients
   * or scanners.
   */
  router.use((req: Request, res: Response) => {
    routeLogger.warn({
      path: req.path,
      method: req.method
    }, 'Route not found');

    res.status(404).json({
      status: 'error',
      message: 'Route not found'
    });
  });

  return router;
};
