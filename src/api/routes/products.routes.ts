import { Router, type RequestHandler } from 'express';

import { createProductController } from '@/api/controllers/products.controller';
import type { ProductService } from '@/types/products.types';

export type ProductRouterOptions = {
  /** Runs before every product route, e.g. `rateLimitProducts(...)`. */
  rateLimiter?: RequestHandler;
};

export const createProductRouter = (
  productService: ProductService,
  options: ProductRouterOptions = {}
): Router => {
  const router = Router();
  const controller = createProductController(productService);

  if (options.rateLimiter) {
    router.use(options.rateLimiter);
  }

  // Literal paths first so they are not captured by /:id
  router.get('/search', controller.getProductsByName);
  router.get('/total-count', controller.getTotalProductCount);
  router.get('/sort', controller.getSortedProducts);
  router.get('/category/:category', controller.getProductsByCategory);

  router.post('/', controller.addProduct);
  router.get('/', controller.getAllProducts);
  router.delete('/', controller.deleteAllProducts);

  router.get('/:id', controller.getProductById);
  router.put('/:id', controller.updateProduct);
  router.delete('/:id', controller.deleteProduct);

  return router;
};
