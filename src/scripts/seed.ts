import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { connectDB, disconnectDB } from '../config/database';
import { MongoCatalogStore } from '../repositories/MongoCatalogStore';
import { CatalogStore } from '../repositories/CatalogStore';
import { MATTRESS_SIZES } from '../types/catalog';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

const seedSchema = z.object({
  products: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      price: z.number().nonnegative(),
      type: z.string(),
      height: z.string(),
      constructionLayers: z.array(z.string()),
      keyFeatures: z.array(z.string()),
      bestFor: z.array(z.string()),
      availableSizes: z.array(z.enum(MATTRESS_SIZES)),
      warranty: z.string(),
      trialPeriod: z.string(),
    })
  ),
  reviews: z.array(
    z.object({
      productId: z.string().min(1),
      customerId: z.string().min(1),
      rating: z.number().int().min(1).max(5),
      content: z.string(),
      verifiedPurchase: z.boolean(),
    })
  ),
});

export type SeedData = z.infer<typeof seedSchema>;

export const SEED_FILE = path.resolve(__dirname, '../../data/seed.json');

export const readSeedFile = async (file: string = SEED_FILE): Promise<SeedData> =>
  seedSchema.parse(JSON.parse(await fs.readFile(file, 'utf8')));

/** Empties products and reviews, then loads the seed. Orders are left alone. */
export const loadSeed = async (store: CatalogStore, seed: SeedData): Promise<void> => {
  await store.dropCatalog();
  const createdAt = new Date();
  for (const product of seed.products) {
    await store.upsertProduct({ ...product, createdAt });
  }
  for (const review of seed.reviews) {
    await store.upsertReview({ ...review, createdAt });
  }
  logger.info({ products: seed.products.length, reviews: seed.reviews.length }, 'Seed loaded');
};

const main = async (): Promise<void> => {
  await connectDB();
  try {
    await loadSeed(new MongoCatalogStore(), await readSeedFile());
  } finally {
    await disconnectDB();
  }
};

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error(describeError(error), 'Seeding failed');
    process.exit(1);
  });
}
