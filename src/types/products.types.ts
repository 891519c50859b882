export type Product = {
  id: number;
  name: string;
  description: string;
  price: number;
  category: string;
};

/**
 * Body accepted by create and update. Ids are assigned by the store.
 */
export type ProductInput = Omit<Product, 'id'>;

export const SORT_CRITERIA = ['name', 'category', 'price'] as const;
export type SortCriteria = (typeof SORT_CRITERIA)[number];

export type SortOrder = 'asc' | 'desc';

/**
 * Persistence collaborator behind the products API.
 *
 * The HTTP layer only talks to this interface; `PgProductService` and
 * `InMemoryProductService` are the two implementations shipped here.
 */
export interface ProductService {
  addProduct(input: ProductInput): Promise<Product>;
  getAllProducts(): Promise<Product[]>;
  getProductById(id: number): Promise<Product | null>;
  /** Case-insensitive substring match on the product name. */
  getProductsByName(name: string): Promise<Product[]>;
  getTotalProductCount(): Promise<number>;
  /** Overwrites the stored row with the same id. Resolves null when no such row exists. */
  updateProduct(product: Product): Promise<Product | null>;
  sortProductsByName(order: SortOrder): Promise<Product[]>;
  sortProductsByCategory(order: SortOrder): Promise<Product[]>;
  sortProductsByPrice(order: SortOrder): Promise<Product[]>;
  /** Case-insensitive exact match on the category. */
  getProductsByCategory(category: string): Promise<Product[]>;
  deleteProduct(id: number): Promise<boolean>;
  /** Resolves with the number of removed products. */
  deleteAllProducts(): Promise<number>;
}
