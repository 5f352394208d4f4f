import { describe, it, expect } from 'vitest';
import { loadSeed, readSeedFile } from '../../src/scripts/seed';
import { InMemoryCatalogStore } from './mocks';

describe('seed', () => {
  it('should read the bundled catalog', async () => {
    const seed = await readSeedFile();

    expect(seed.products).toHaveLength(6);
    expect(seed.reviews).toHaveLength(13);
    const ids = new Set(seed.products.map((product) => product.id));
    expect(seed.reviews.every((review) => ids.has(review.productId))).toBe(true);
  });

  it('should replace the catalog and stay stable across reloads', async () => {
    const store = new InMemoryCatalogStore();
    const seed = await readSeedFile();

    await loadSeed(store, seed);
    await loadSeed(store, seed);

    expect(store.products.map((product) => product.id).sort()).toEqual(
      seed.products.map((product) => product.id).sort()
    );
    expect(store.reviews).toHaveLength(13);
    expect(store.products.find((product) => product.id === 'dream-sleep')).toBeDefined();
  });

  it('should leave orders alone', async () => {
    const store = new InMemoryCatalogStore();
    store.orders.push({
      orderId: 'DS1200000000',
      productId: 'dream-sleep',
      productName: 'Dream Sleep Mattress',
      size: 'Queen',
      quantity: 1,
      price: 899,
      total: 899,
      status: 'confirmed',
      deliveryAddress: '1 Test Lane',
      paymentMethod: 'credit_card',
      createdAt: new Date('2024-01-01T00:00:00Z'),
    });

    await loadSeed(store, await readSeedFile());

    expect(store.orders).toHaveLength(1);
  });
});
