import type { QueryResult, QueryResultRow } from 'pg';

import logger from '@/utils/logger';
import type {
  Product,
  ProductInput,
  ProductService,
  SortCriteria,
  SortOrder,
} from '@/types/products.types';

const serviceLogger = logger.child({ module: 'products-service', store: 'postgres' });

/**
 * The part of a pg `Pool` / `PoolClient` this service needs.
 */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
}

// NUMERIC comes back from pg as a string.
type ProductRow = {
  id: number;
  name: string;
  description: string;
  price: string | number;
  category: string;
};

const SORT_COLUMNS: Record<SortCriteria, string> = {
  name: 'name',
  category: 'category',
  price: 'price',
};

const toProduct = (row: ProductRow): Product => ({
  id: row.id,
  name: row.name,
  description: row.description,
  price: Number(row.price),
  category: row.category,
});

// Escapes LIKE wildcards so a search for "100%" matches the literal text.
const toLikePattern = (term: string): string => `%${term.replace(/[\\%_]/g, '\\$&')}%`;

/**
 * PostgreSQL-backed product store.
 */
export class PgProductService implements ProductService {
  constructor(private readonly db: SqlClient) {}

  async addProduct(input: ProductInput): Promise<Product> {
    const { name, description, price, category } = input;
    const rows = await this.select(
      'addProduct',
      `
        INSERT INTO products (name, description, price, category)
        VALUES ($1, $2, $3, $4)
        RETURNING *;
      `,
      [name, description, price, category]
    );
    const created = rows[0];
    if (!created) {
      throw new Error('Insert returned no row');
    }
    return created;
  }

  async getAllProducts(): Promise<Product[]> {
    return this.select('getAllProducts', `SELECT * FROM products ORDER BY id;`);
  }

  async getProductById(id: number): Promise<Product | null> {
    const rows = await this.select('getProductById', `SELECT * FROM products WHERE id = $1;`, [id]);
    return rows[0] ?? null;
  }

  async getProductsByName(name: string): Promise<Product[]> {
    return this.select(
      'getProductsByName',
      `SELECT * FROM products WHERE name ILIKE $1 ORDER BY id;`,
      [toLikePattern(name)]
    );
  }

  async getTotalProductCount(): Promise<number> {
    const result = await this.run('getTotalProductCount', () =>
      this.db.query<{ count: number }>(`SELECT COUNT(*)::int AS count FROM products;`)
    );
    return result.rows[0]?.count ?? 0;
  }

  async updateProduct(product: Product): Promise<Product | null> {
    const { id, name, description, price, category } = product;
    const rows = await this.select(
      'updateProduct',
      `
        UPDATE products
        SET name = $1, description = $2, price = $3, category = $4
        WHERE id = $5
        RETURNING *;
      `,
      [name, description, price, category, id]
    );
    return rows[0] ?? null;
  }

  async sortProductsByName(order: SortOrder): Promise<Product[]> {
    return this.sortBy('name', order);
  }

  async sortProductsByCategory(order: SortOrder): Promise<Product[]> {
    return this.sortBy('category', order);
  }

  async sortProductsByPrice(order: SortOrder): Promise<Product[]> {
    return this.sortBy('price', order);
  }

  async getProductsByCategory(category: string): Promise<Product[]> {
    return this.select(
      'getProductsByCategory',
      `SELECT * FROM products WHERE LOWER(category) = LOWER($1) ORDER BY id;`,
      [category]
    );
  }

  async deleteProduct(id: number): Promise<boolean> {
    const result = await this.run('deleteProduct', () =>
      this.db.query(`DELETE FROM products WHERE id = $1;`, [id])
    );
    if (!result.rowCount) {
      serviceLogger.warn({ id }, 'Product not found for deletion');
      return false;
    }
    return true;
  }

  async deleteAllProducts(): Promise<number> {
    const result = await this.run('deleteAllProducts', () => this.db.query(`DELETE FROM products;`));
    return result.rowCount ?? 0;
  }

  private async sortBy(criteria: SortCriteria, order: SortOrder): Promise<Product[]> {
    // Column and direction come from fixed maps, never from the request.
    const direction = order === 'desc' ? 'DESC' : 'ASC';
    return this.select(
      'sortProducts',
      `SELECT * FROM products ORDER BY ${SORT_COLUMNS[criteria]} ${direction}, id ASC;`
    );
  }

  private async select(operation: string, text: string, values?: unknown[]): Promise<Product[]> {
    const result = await this.run(operation, () => this.db.query<ProductRow>(text, values));
    return result.rows.map(toProduct);
  }

  private async run<T>(operation: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      serviceLogger.error({ err: error, operation }, 'Product query failed');
      throw error;
    }
  }
}
