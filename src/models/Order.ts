import mongoose from 'mongoose';
import { MATTRESS_SIZES, ORDER_STATUSES, Order, PAYMENT_METHODS } from '../types/catalog';

const OrderSchema = new mongoose.Schema<Order>(
  {
    orderId: { type: String, required: true, unique: true },
    productId: { type: String, required: true },
    productName: { type: String, required: true },
    size: { type: String, enum: MATTRESS_SIZES, required: true },
    quantity: { type: Number, required: true, min: 1 },
    price: { type: Number, required: true },
    total: { type: Number, required: true },
    status: { type: String, enum: ORDER_STATUSES, default: 'pending' },
    deliveryAddress: { type: String, required: true },
    paymentMethod: { type: String, enum: PAYMENT_METHODS, required: true },
    createdAt: { type: Date, default: Date.now },
  },
  { collection: 'orders' }
);

export default mongoose.model<Order>('Order', OrderSchema);
