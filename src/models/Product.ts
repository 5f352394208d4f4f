import mongoose from 'mongoose';
import { MATTRESS_SIZES, Product } from '../types/catalog';

const ProductSchema = new mongoose.Schema<Product>(
  {
    id: { type: String, required: true, unique: true },
    name: { type: String, required: true },
    price: { type: Number, required: true, min: 0 },
    type: { type: String, required: true },
    height: { type: String, required: true },
    constructionLayers: { type: [String], default: [] },
    keyFeatures: { type: [String], default: [] },
    bestFor: { type: [String], default: [] },
    availableSizes: { type: [String], enum: MATTRESS_SIZES, default: [] },
    warranty: { type: String, required: true },
    trialPeriod: { type: String, required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false }, collection: 'products' }
);

export default mongoose.model<Product>('Product', ProductSchema);
