import type {
  Product,
  ProductInput,
  ProductService,
  SortCriteria,
  SortOrder,
} from '@/types/products.types';

const compareBy = (criteria: SortCriteria) => (a: Product, b: Product): number => {
  if (criteria === 'price') {
    return a.price - b.price;
  }
  return a[criteria].localeCompare(b[criteria]);
};

/**
 * Process-local product store. Selected with PRODUCT_STORE=memory and used
 * as the stand-in database in tests. Callers always receive copies.
 */
export class InMemoryProductService implements ProductService {
  private readonly products = new Map<number, Product>();
  private nextId = 1;

  constructor(seed: ProductInput[] = []) {
    for (const input of seed) {
      this.insert(input);
    }
  }

  async addProduct(input: ProductInput): Promise<Product> {
    return { ...this.insert(input) };
  }

  async getAllProducts(): Promise<Product[]> {
    return this.list();
  }

  async getProductById(id: number): Promise<Product | null> {
    const product = this.products.get(id);
    return product ? { ...product } : null;
  }

  async getProductsByName(name: string): Promise<Product[]> {
    const term = name.toLowerCase();
    return this.list().filter((product) => product.name.toLowerCase().includes(term));
  }

  async getTotalProductCount(): Promise<number> {
    return this.products.size;
  }

  async updateProduct(product: Product): Promise<Product | null> {
    if (!this.products.has(product.id)) {
      return null;
    }
    const stored = { ...product };
    this.products.set(product.id, stored);
    return { ...stored };
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
    const wanted = category.toLowerCase();
    return this.list().filter((product) => product.category.toLowerCase() === wanted);
  }

  async deleteProduct(id: number): Promise<boolean> {
    return this.products.delete(id);
  }

  async deleteAllProducts(): Promise<number> {
    const removed = this.products.size;
    this.products.clear();
    return removed;
  }

  private insert(input: ProductInput): Product {
    const product: Product = {
      id: this.nextId++,
      name: input.name,
      description: input.description,
      price: input.price,
      category: input.category,
    };
    this.products.set(product.id, product);
    return product;
  }

  // Ordered by id, like the SQL store.
  private list(): Product[] {
    return [...this.products.values()]
      .sort((a, b) => a.id - b.id)
      .map((product) => ({ ...product }));
  }

  private sortBy(criteria: SortCriteria, order: SortOrder): Product[] {
    const compare = compareBy(criteria);
    const direction = order === 'desc' ? -1 : 1;
    // list() is id-ordered and Array#sort is stable, so ties keep id order.
    return this.list().sort((a, b) => direction * compare(a, b));
  }
}
