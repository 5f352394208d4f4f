import { Order, Product, Review } from '../types/catalog';

/**
 * Document-store handle shared by every tool handler. Constructed once at
 * startup and passed in; nothing reaches for a global connection.
 */
export interface CatalogStore {
  listProducts(): Promise<Product[]>;
  findProductById(id: string): Promise<Product | null>;
  /** Case-insensitive match on the start of the product name. */
  findProductByNamePrefix(prefix: string): Promise<Product | null>;
  upsertProduct(product: Product): Promise<void>;

  listReviews(): Promise<Review[]>;
  findReviewsByProduct(productId: string): Promise<Review[]>;
  insertReview(review: Review): Promise<Review>;
  /** Replaces the review keyed by (productId, customerId), inserting if absent. */
  upsertReview(review: Review): Promise<void>;

  insertOrder(order: Order): Promise<Order>;
  findOrderById(orderId: string): Promise<Order | null>;

  dropCatalog(): Promise<void>;
}

export const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
