import { z } from 'zod';
import { CatalogStore } from '../../repositories/CatalogStore';
import { Review } from '../../types/catalog';
import { invalidRating, productNotFound } from '../../utils/errors';
import { createComponentLogger } from '../../utils/logger';
import { ToolTable, defineTool, toolTable } from './defineTool';

const logger = createComponentLogger('tools.reviews');

export const REVIEW_FILTERS = ['positive', 'negative', 'all'] as const;

export type ReviewFilter = (typeof REVIEW_FILTERS)[number];

export const CHAT_CUSTOMER_ID = 'chat_customer';

export interface ReviewRecord {
  rating: number;
  content: string;
  verified_purchase: boolean;
  customer_id: string;
}

export interface ProductReviews {
  product_id: string;
  total_reviews: number;
  average_rating: number;
  filter_type: ReviewFilter;
  reviews: ReviewRecord[];
}

export type ReviewStats =
  | {
      product_id: string;
      total_reviews: number;
      average_rating: number;
      rating_distribution: Record<'5_star' | '4_star' | '3_star' | '2_star' | '1_star', number>;
      verified_purchases: number;
    }
  | { product_id: string; total_reviews: 0; message: string };

export interface CreatedReview {
  success: true;
  product_id: string;
  rating: number;
  content: string;
  message: string;
}

const matchesFilter = (review: Review, filter: ReviewFilter): boolean => {
  switch (filter) {
    case 'positive':
      return review.rating >= 4;
    case 'negative':
      return review.rating <= 2;
    case 'all':
      return true;
  }
};

const averageRating = (reviews: readonly Review[]): number =>
  reviews.length === 0
    ? 0
    : reviews.reduce((sum, review) => sum + review.rating, 0) / reviews.length;

const getProductReviewsSchema = z.object({
  product_id: z.string().min(1).describe('ID or name of the product to get reviews for'),
  filter_type: z
    .enum(REVIEW_FILTERS)
    .default('all')
    .describe('Type of reviews to retrieve: positive (4-5 stars), negative (1-2 stars) or all'),
});

const getReviewStatsSchema = z.object({
  product_id: z.string().min(1).describe('ID or name of the product to get statistics for'),
});

const createReviewSchema = z.object({
  product_id: z.string().min(1).describe('ID or name of the product being reviewed'),
  rating: z.number().describe('Rating from 1 to 5 stars, whole numbers only'),
  content: z.string().min(1).describe('Review text content'),
});

export class ReviewTools {
  readonly table: ToolTable;

  constructor(private readonly store: CatalogStore) {
    this.table = toolTable(
      defineTool(
        'get_product_reviews',
        'Get customer reviews for a specific product',
        getProductReviewsSchema,
        (args) => this.getProductReviews(args.product_id, args.filter_type)
      ),
      defineTool(
        'get_review_stats',
        'Get statistical information about product reviews',
        getReviewStatsSchema,
        (args) => this.getReviewStats(args.product_id)
      ),
      defineTool(
        'create_review',
        'Create a new review for a product',
        createReviewSchema,
        (args) => this.createReview(args.product_id, args.rating, args.content)
      )
    );
  }

  async getProductReviews(reference: string, filter: ReviewFilter = 'all'): Promise<ProductReviews> {
    logger.info({ reference, filter }, 'Getting product reviews');
    const reviews = (await this.reviewsFor(reference)).filter((review) =>
      matchesFilter(review, filter)
    );

    return {
      product_id: reference,
      total_reviews: reviews.length,
      average_rating: averageRating(reviews),
      filter_type: filter,
      reviews: reviews.map((review) => ({
        rating: review.rating,
        content: review.content,
        verified_purchase: review.verifiedPurchase,
        customer_id: review.customerId || 'anonymous',
      })),
    };
  }

  async getReviewStats(reference: string): Promise<ReviewStats> {
    logger.info({ reference }, 'Getting review statistics');
    const reviews = await this.reviewsFor(reference);
    if (reviews.length === 0) {
      return { product_id: reference, total_reviews: 0, message: 'No reviews found for this product' };
    }

    const countOf = (stars: number): number =>
      reviews.filter((review) => review.rating === stars).length;

    return {
      product_id: reference,
      total_reviews: reviews.length,
      average_rating: averageRating(reviews),
      rating_distribution: {
        '5_star': countOf(5),
        '4_star': countOf(4),
        '3_star': countOf(3),
        '2_star': countOf(2),
        '1_star': countOf(1),
      },
      verified_purchases: reviews.filter((review) => review.verifiedPurchase).length,
    };
  }

  async createReview(reference: string, rating: number, content: string): Promise<CreatedReview> {
    logger.info({ reference, rating }, 'Creating review');
    if (!Number.isInteger(rating) || rating < 1 || rating > 5) {
      throw invalidRating(rating);
    }

    const product =
      (await this.store.findProductById(reference)) ??
      (await this.store.findProductByNamePrefix(reference));
    if (!product) {
      throw productNotFound(reference);
    }

    await this.store.insertReview({
      productId: product.id,
      customerId: CHAT_CUSTOMER_ID,
      rating,
      content,
      verifiedPurchase: true,
      createdAt: new Date(),
    });

    return {
      success: true,
      product_id: product.id,
      rating,
      content,
      message: 'Review submitted successfully',
    };
  }

  /** Reviews keyed by the raw reference, falling back to a product-name prefix. */
  private async reviewsFor(reference: string): Promise<Review[]> {
    const direct = await this.store.findReviewsByProduct(reference);
    if (direct.length > 0) {
      return direct;
    }
    const product = await this.store.findProductByNamePrefix(reference);
    return product ? this.store.findReviewsByProduct(product.id) : [];
  }
}
