export const MATTRESS_SIZES = [
  'Twin',
  'Twin XL',
  'Full',
  'Queen',
  'King',
  'California King',
] as const;

export type MattressSize = (typeof MATTRESS_SIZES)[number];

export const PAYMENT_METHODS = ['credit_card', 'debit_card', 'paypal'] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const ORDER_STATUSES = [
  'pending',
  'confirmed',
  'shipped',
  'completed',
  'cancelled',
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export interface Product {
  id: string;
  name: string;
  price: number;
  type: string;
  height: string;
  constructionLayers: string[];
  keyFeatures: string[];
  bestFor: string[];
  availableSizes: MattressSize[];
  warranty: string;
  trialPeriod: string;
  createdAt?: Date;
}

export interface Review {
  productId: string;
  customerId: string;
  rating: number;
  content: string;
  verifiedPurchase: boolean;
  createdAt?: Date;
}

export interface Order {
  orderId: string;
  productId: string;
  productName: string;
  size: MattressSize;
  quantity: number;
  price: number;
  total: number;
  status: OrderStatus;
  deliveryAddress: string;
  paymentMethod: PaymentMethod;
  createdAt: Date;
}
