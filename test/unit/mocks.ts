/**
 * Test doubles: an in-memory catalog store and a scripted model.
 */
import { vi } from 'vitest';
import { CatalogStore, escapeRegExp } from '../../src/repositories/CatalogStore';
import {
  AIProvider,
  CompletionRequest,
  CompletionResult,
} from '../../src/types/ai-provider';
import { ConversationManager } from '../../src/services/ConversationManager';
import { Order, Product, Review } from '../../src/types/catalog';

export const makeProduct = (overrides: Partial<Product> & Pick<Product, 'id' | 'name'>): Product => ({
  price: 999,
  type: 'Foam',
  height: '10 inches',
  constructionLayers: ['2" comfort foam', '8" support foam'],
  keyFeatures: ['Pressure relief'],
  bestFor: ['Side sleepers'],
  availableSizes: ['Twin', 'Full', 'Queen', 'King'],
  warranty: '10 years',
  trialPeriod: '100 nights',
  ...overrides,
});

export const mockProducts: Product[] = [
  makeProduct({
    id: 'ultra-comfort-mattress',
    name: 'Ultra Comfort Mattress',
    price: 1299,
    type: 'Hybrid',
    availableSizes: ['Twin', 'Twin XL', 'Full', 'Queen', 'King', 'California King'],
  }),
  makeProduct({
    id: 'essential-plus',
    name: 'Essential Plus Mattress',
    price: 699,
    availableSizes: ['Twin', 'Twin XL', 'Full', 'Queen'],
  }),
  makeProduct({
    id: 'eco-green',
    name: 'Eco Green Mattress',
    price: 1199,
    type: 'Latex',
    availableSizes: ['Twin', 'Twin XL', 'Full', 'Queen', 'King'],
  }),
  makeProduct({
    id: 'dream-sleep',
    name: 'Dream Sleep Mattress',
    price: 899,
  }),
];

export const mockReviews: Review[] = [
  { productId: 'dream-sleep', customerId: 'test_a', rating: 5, content: 'Lovely.', verifiedPurchase: true },
  { productId: 'dream-sleep', customerId: 'test_b', rating: 4, content: 'Pretty good.', verifiedPurchase: false },
  { productId: 'dream-sleep', customerId: 'test_c', rating: 3, content: 'Average.', verifiedPurchase: true },
  { productId: 'dream-sleep', customerId: 'test_d', rating: 1, content: 'Too soft.', verifiedPurchase: true },
  { productId: 'eco-green', customerId: 'test_e', rating: 2, content: 'Too bouncy.', verifiedPurchase: true },
];

export class InMemoryCatalogStore implements CatalogStore {
  products: Product[];
  reviews: Review[];
  orders: Order[] = [];

  constructor(products: Product[] = mockProducts, reviews: Review[] = mockReviews) {
    this.products = products.map((product) => ({ ...product }));
    this.reviews = reviews.map((review) => ({ ...review }));
  }

  async listProducts(): Promise<Product[]> {
    return [...this.products];
  }

  async findProductById(id: string): Promise<Product | null> {
    return this.products.find((product) => product.id === id) ?? null;
  }

  async findProductByNamePrefix(prefix: string): Promise<Product | null> {
    const pattern = new RegExp(`^${escapeRegExp(prefix)}`, 'i');
    return this.products.find((product) => pattern.test(product.name)) ?? null;
  }

  async upsertProduct(product: Product): Promise<void> {
    this.products = [...this.products.filter((existing) => existing.id !== product.id), product];
  }

  async listReviews(): Promise<Review[]> {
    return [...this.reviews];
  }

  async findReviewsByProduct(productId: string): Promise<Review[]> {
    return this.reviews.filter((review) => review.productId === productId);
  }

  async insertReview(review: Review): Promise<Review> {
    this.reviews.push(review);
    return review;
  }

  async upsertReview(review: Review): Promise<void> {
    this.reviews = [
      ...this.reviews.filter(
        (existing) =>
          existing.productId !== review.productId || existing.customerId !== review.customerId
      ),
      review,
    ];
  }

  async insertOrder(order: Order): Promise<Order> {
    this.orders.push(order);
    return order;
  }

  async findOrderById(orderId: string): Promise<Order | null> {
    return this.orders.find((order) => order.orderId === orderId) ?? null;
  }

  async dropCatalog(): Promise<void> {
    this.products = [];
    this.reviews = [];
  }
}

export const text = (content: string): CompletionResult => ({ type: 'text', content });

export const toolCall = (name: string, args: unknown, id = 'call-1'): CompletionResult => ({
  type: 'tool_call',
  call: { id, name, arguments: typeof args === 'string' ? args : JSON.stringify(args) },
});

/** Replays queued results in order and records every request it receives. */
export class ScriptedAIProvider implements AIProvider {
  readonly requests: CompletionRequest[] = [];
  private readonly script: Array<CompletionResult | Error>;

  constructor(...script: Array<CompletionResult | Error>) {
    this.script = script;
  }

  complete = vi.fn(async (request: CompletionRequest): Promise<CompletionResult> => {
    this.requests.push({ ...request, messages: [...request.messages] });
    const next = this.script.shift();
    if (!next) {
      throw new Error('No scripted completion left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
}

/** A real ConversationManager whose router always picks product details and whose responder echoes. */
export const echoConversationManager = (): ConversationManager =>
  new ConversationManager({
    router: {
      route: vi.fn(async () => ({ responder: 'product_details' as const, confidence: 1, rationale: 'test' })),
    },
    createResponder: () => ({ respond: vi.fn(async (message: string) => `reply to ${message}`) }),
    responderWindow: 5,
    routingWindow: 3,
    maxSessions: 100,
  });
