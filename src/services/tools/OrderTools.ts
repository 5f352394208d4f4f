import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { CatalogStore } from '../../repositories/CatalogStore';
import {
  MATTRESS_SIZES,
  MattressSize,
  Order,
  OrderStatus,
  PAYMENT_METHODS,
  PaymentMethod,
} from '../../types/catalog';
import {
  ValidationError,
  orderNotFound,
  productNotFound,
  sizeUnavailable,
} from '../../utils/errors';
import { createComponentLogger } from '../../utils/logger';
import { ToolTable, defineTool, toolTable } from './defineTool';

const logger = createComponentLogger('tools.orders');

export const ESTIMATED_DELIVERY = '5-7 business days';

export interface CreateOrderInput {
  productId: string;
  size: MattressSize;
  deliveryAddress: string;
  paymentMethod: PaymentMethod;
  quantity?: number;
}

export interface OrderConfirmation {
  success: true;
  order_id: string;
  total: number;
  status: OrderStatus;
  delivery_address: string;
  payment_method: PaymentMethod;
  estimated_delivery: string;
}

export interface OrderSnapshot {
  order_id: string;
  product: string;
  size: MattressSize;
  quantity: number;
  total: number;
  status: OrderStatus;
  created_at: string;
  estimated_delivery: string;
}

/** Initials of the first two words of the product id: "eco-green" → "EG". */
export const productFamilyTag = (productId: string): string =>
  productId
    .split(/[-_\s]+/)
    .filter((word) => word.length > 0)
    .slice(0, 2)
    .map((word) => word[0].toUpperCase())
    .join('') || 'OR';

/**
 * `<family tag><HHMMSS><4 random hex>`. The random suffix keeps two orders
 * placed in the same second apart.
 */
export const generateOrderId = (
  productId: string,
  now: Date = new Date(),
  suffix: string = uuidv4().replace(/-/g, '').slice(0, 4).toUpperCase()
): string => {
  const clock = [now.getUTCHours(), now.getUTCMinutes(), now.getUTCSeconds()]
    .map((part) => String(part).padStart(2, '0'))
    .join('');
  return `${productFamilyTag(productId)}${clock}${suffix}`;
};

const createOrderSchema = z.object({
  product_id: z.string().min(1).describe('ID of the product being ordered'),
  size: z.enum(MATTRESS_SIZES).describe('Size of the mattress'),
  quantity: z.number().int().min(1).default(1).describe('Number of items to order'),
  delivery_address: z.string().min(1).describe("Customer's delivery address"),
  payment_method: z.enum(PAYMENT_METHODS).describe("Customer's payment method"),
});

const getOrderStatusSchema = z.object({
  order_id: z.string().min(1).describe('ID of the order to check'),
});

export interface OrderToolsOptions {
  now?: () => Date;
}

export class OrderTools {
  readonly table: ToolTable;
  private readonly now: () => Date;

  constructor(
    private readonly store: CatalogStore,
    options: OrderToolsOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.table = toolTable(
      defineTool(
        'create_order',
        'Create a new order for a product',
        createOrderSchema,
        (args) =>
          this.createOrder({
            productId: args.product_id,
            size: args.size,
            quantity: args.quantity,
            deliveryAddress: args.delivery_address,
            paymentMethod: args.payment_method,
          })
      ),
      defineTool(
        'get_order_status',
        'Get status information for an order',
        getOrderStatusSchema,
        (args) => this.getOrderStatus(args.order_id)
      )
    );
  }

  async createOrder(input: CreateOrderInput): Promise<OrderConfirmation> {
    const quantity = input.quantity ?? 1;
    logger.info({ productId: input.productId, size: input.size, quantity }, 'Creating order');
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new ValidationError(`Quantity must be a whole number of at least 1, got ${quantity}`, 'INVALID_INPUT');
    }

    const product = await this.store.findProductById(input.productId);
    if (!product) {
      throw productNotFound(input.productId);
    }
    if (!product.availableSizes.includes(input.size)) {
      throw sizeUnavailable(input.size, product.name);
    }

    const createdAt = this.now();
    const order: Order = {
      orderId: generateOrderId(product.id, createdAt),
      productId: product.id,
      productName: product.name,
      size: input.size,
      quantity,
      price: product.price,
      total: product.price * quantity,
      status: 'confirmed',
      deliveryAddress: input.deliveryAddress,
      paymentMethod: input.paymentMethod,
      createdAt,
    };
    await this.store.insertOrder(order);
    logger.info({ orderId: order.orderId, total: order.total }, 'Order created');

    return {
      success: true,
      order_id: order.orderId,
      total: order.total,
      status: order.status,
      delivery_address: order.deliveryAddress,
      payment_method: order.paymentMethod,
      estimated_delivery: ESTIMATED_DELIVERY,
    };
  }

  async getOrderStatus(orderId: string): Promise<OrderSnapshot> {
    logger.info({ orderId }, 'Checking order status');
    const order = await this.store.findOrderById(orderId);
    if (!order) {
      throw orderNotFound(orderId);
    }

    return {
      order_id: order.orderId,
      product: order.productName,
      size: order.size,
      quantity: order.quantity,
      total: order.total,
      status: order.status,
      created_at: new Date(order.createdAt).toISOString(),
      estimated_delivery: ESTIMATED_DELIVERY,
    };
  }
}
