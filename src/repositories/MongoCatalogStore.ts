import ProductModel from '../models/Product';
import ReviewModel from '../models/Review';
import OrderModel from '../models/Order';
import { Order, Product, Review } from '../types/catalog';
import { CatalogStore, escapeRegExp } from './CatalogStore';
import { logger } from '../utils/logger';

const HIDDEN_FIELDS = '-_id -__v';

export class MongoCatalogStore implements CatalogStore {
  async listProducts(): Promise<Product[]> {
    return ProductModel.find().select(HIDDEN_FIELDS).lean<Product[]>().exec();
  }

  async findProductById(id: string): Promise<Product | null> {
    return ProductModel.findOne({ id }).select(HIDDEN_FIELDS).lean<Product>().exec();
  }

  async findProductByNamePrefix(prefix: string): Promise<Product | null> {
    return ProductModel.findOne({
      name: { $regex: `^${escapeRegExp(prefix)}`, $options: 'i' },
    })
      .select(HIDDEN_FIELDS)
      .lean<Product>()
      .exec();
  }

  async upsertProduct(product: Product): Promise<void> {
    await ProductModel.replaceOne({ id: product.id }, product, { upsert: true }).exec();
  }

  async listReviews(): Promise<Review[]> {
    return ReviewModel.find().select(HIDDEN_FIELDS).lean<Review[]>().exec();
  }

  async findReviewsByProduct(productId: string): Promise<Review[]> {
    return ReviewModel.find({ productId }).select(HIDDEN_FIELDS).lean<Review[]>().exec();
  }

  async insertReview(review: Review): Promise<Review> {
    const created = await ReviewModel.create(review);
    logger.debug({ productId: review.productId }, 'Review stored');
    return created.toObject<Review>();
  }

  async upsertReview(review: Review): Promise<void> {
    await ReviewModel.replaceOne(
      { productId: review.productId, customerId: review.customerId },
      review,
      { upsert: true, runValidators: true }
    ).exec();
  }

  async insertOrder(order: Order): Promise<Order> {
    const created = await OrderModel.create(order);
    logger.debug({ orderId: order.orderId }, 'Order stored');
    return created.toObject<Order>();
  }

  async findOrderById(orderId: string): Promise<Order | null> {
    return OrderModel.findOne({ orderId }).select(HIDDEN_FIELDS).lean<Order>().exec();
  }

  async dropCatalog(): Promise<void> {
    await Promise.all([ProductModel.deleteMany({}).exec(), ReviewModel.deleteMany({}).exec()]);
    logger.info('Catalog collections emptied');
  }
}
