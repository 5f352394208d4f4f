import mongoose from 'mongoose';
import { Review } from '../types/catalog';

const ReviewSchema = new mongoose.Schema<Review>(
  {
    productId: { type: String, required: true, index: true },
    customerId: { type: String, required: true },
    rating: {
      type: Number,
      required: true,
      min: 1,
      max: 5,
      validate: {
        validator: Number.isInteger,
        message: 'Rating must be a whole number',
      },
    },
    content: { type: String, required: true },
    verifiedPurchase: { type: Boolean, default: false },
  },
  { timestamps: { createdAt: true, updatedAt: false }, collection: 'reviews' }
);

export default mongoose.model<Review>('Review', ReviewSchema);
