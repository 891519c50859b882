import type { Request, Response, NextFunction } from 'express';

import logger from '@/utils/logger';
import { createError } from '@/middlewares/error.middleware';
import {
  categoryParamsSchema,
  parseRequest,
  productBodySchema,
  productIdParamsSchema,
  searchQuerySchema,
  sortQuerySchema,
} from '@/api/middlewares/product.middleware';
import type { Product, ProductService, SortCriteria, SortOrder } from '@/types/products.types';

const controllerLogger = logger.child({ module: 'products-controller' });

type Handler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

export type ProductController = {
  addProduct: Handler;
  getAllProducts: Handler;
  getProductById: Handler;
  getProductsByName: Handler;
  getTotalProductCount: Handler;
  updateProduct: Handler;
  getSortedProducts: Handler;
  getProductsByCategory: Handler;
  deleteProduct: Handler;
  deleteAllProducts: Handler;
};

/**
 * Builds the product handlers around one ProductService.
 *
 * Each handler binds its input, makes its service call(s) and maps a failed
 * call to that endpoint's fixed status through `createError`.
 */
export const createProductController = (productService: ProductService): ProductController => {
  const sorters: Record<SortCriteria, (order: SortOrder) => Promise<Product[]>> = {
    name: (order) => productService.sortProductsByName(order),
    category: (order) => productService.sortProductsByCategory(order),
    price: (order) => productService.sortProductsByPrice(order),
  };

  return {
    /**
     * POST /products
     */
    addProduct: async (req, res, next) => {
      const input = parseRequest(productBodySchema, req.body, next);
      if (!input) return;

      try {
        const product = await productService.addProduct(input);
        controllerLogger.info({ productId: product.id }, 'Product created');
        res.status(201).json({ success: true, data: product });
      } catch (error) {
        next(createError(500, 'Failed to add product', error));
      }
    },

    /**
     * GET /products
     */
    getAllProducts: async (req, res, next) => {
      try {
        const products = await productService.getAllProducts();
        res.status(200).json({ success: true, data: products });
      } catch (error) {
        next(createError(400, 'Failed to retrieve products', error));
      }
    },

    /**
     * GET /products/:id. A lookup failure is reported as not found.
     */
    getProductById: async (req, res, next) => {
      const params = parseRequest(productIdParamsSchema, req.params, next);
      if (!params) return;

      let product: Product | null;
      try {
        product = await productService.getProductById(params.id);
      } catch (error) {
        next(createError(404, 'Product not found', error));
        return;
      }

      if (!product) {
        next(createError(404, 'Product not found'));
        return;
      }

      res.status(200).json({ success: true, data: product });
    },

    /**
     * GET /products/search?name=
     */
    getProductsByName: async (req, res, next) => {
      const query = parseRequest(searchQuerySchema, req.query, next);
      if (!query) return;

      let products: Product[];
      try {
        products = await productService.getProductsByName(query.name);
      } catch (error) {
        next(createError(400, 'Failed to search products', error));
        return;
      }

      if (products.length === 0) {
        next(createError(400, `No products match name "${query.name}"`));
        return;
      }

      res.status(200).json({ success: true, data: products });
    },

    /**
     * GET /products/total-count
     */
    getTotalProductCount: async (req, res, next) => {
      try {
        const totalCount = await productService.getTotalProductCount();
        res.status(200).json({ success: true, data: totalCount });
      } catch (error) {
        next(createError(500, 'Failed to count products', error));
      }
    },

    /**
     * PUT /products/:id
     *
     * Overwrites name, description, price and category of the stored product.
     */
    updateProduct: async (req, res, next) => {
      const params = parseRequest(productIdParamsSchema, req.params, next);
      if (!params) return;
      const input = parseRequest(productBodySchema, req.body, next);
      if (!input) return;

      try {
        const product = await productService.getProductById(params.id);
        if (!product) {
          next(createError(404, 'Product not found'));
          return;
        }

        const updated = await productService.updateProduct({
          id: product.id,
          name: input.name,
          description: input.description,
          price: input.price,
          category: input.category,
        });
        if (!updated) {
          // Removed between the lookup and the write
          next(createError(404, 'Product not found'));
          return;
        }

        controllerLogger.info({ productId: product.id }, 'Product updated');
        res.status(204).end();
      } catch (error) {
        next(createError(500, 'Failed to update product', error));
      }
    },

    /**
     * GET /products/sort?criteria=name|category|price&order=asc|desc
     */
    getSortedProducts: async (req, res, next) => {
      const query = parseRequest(sortQuerySchema, req.query, next);
      if (!query) return;

      try {
        const products = await sorters[query.criteria](query.order);
        res.status(200).json({ success: true, data: products });
      } catch (error) {
        next(createError(500, 'Failed to sort products', error));
      }
    },

    /**
     * GET /products/category/:category
     */
    getProductsByCategory: async (req, res, next) => {
      const params = parseRequest(categoryParamsSchema, req.params, next);
      if (!params) return;

      let products: Product[];
      try {
        products = await productService.getProductsByCategory(params.category);
      } catch (error) {
        next(createError(400, 'Failed to retrieve products by category', error));
        return;
      }

      if (products.length === 0) {
        next(createError(404, `No products in category "${params.category}"`));
        return;
      }

      res.status(200).json({ success: true, data: products });
    },

    /**
     * DELETE /products/:id. Any failure, a missing product included, is a 404.
     */
    deleteProduct: async (req, res, next) => {
      const params = parseRequest(productIdParamsSchema, req.params, next);
      if (!params) return;

      try {
        const product = await productService.getProductById(params.id);
        if (!product) {
          next(createError(404, 'Product not found'));
          return;
        }

        const deleted = await productService.deleteProduct(params.id);
        if (!deleted) {
          // Removed between the lookup and the delete
          next(createError(404, 'Product not found'));
          return;
        }

        controllerLogger.info({ productId: params.id }, 'Product deleted');
        res.status(204).end();
      } catch (error) {
        next(createError(404, 'Product not found', error));
      }
    },

    /**
     * DELETE /products
     */
    deleteAllProducts: async (req, res, next) => {
      try {
        const removed = await productService.deleteAllProducts();
        controllerLogger.info({ removed }, 'All products deleted');
        res.status(204).end();
      } catch (error) {
        next(createError(500, 'Failed to delete products', error));
      }
    },
  };
};
