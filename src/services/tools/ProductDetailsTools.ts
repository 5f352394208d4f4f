import { z } from 'zod';
import { CatalogStore } from '../../repositories/CatalogStore';
import { Product } from '../../types/catalog';
import { productNotFound } from '../../utils/errors';
import { createComponentLogger } from '../../utils/logger';
import { resolveProductReference } from '../productResolver';
import { ToolTable, defineTool, toolTable } from './defineTool';

const logger = createComponentLogger('tools.product_details');

export interface ProductRecord {
  id: string;
  name: string;
  price: number;
  type: string;
  height: string;
  construction_layers: string[];
  key_features: string[];
  best_for: string[];
  available_sizes: string[];
  warranty: string;
  trial_period: string;
  created_at?: string;
}

export interface ProductComparison {
  total_products: number;
  products: ProductRecord[];
  not_found?: {
    products: string[];
    available_products: string[];
  };
}

export const toProductRecord = (product: Product): ProductRecord => ({
  id: product.id,
  name: product.name,
  price: product.price,
  type: product.type,
  height: product.height,
  construction_layers: product.constructionLayers,
  key_features: product.keyFeatures,
  best_for: product.bestFor,
  available_sizes: product.availableSizes,
  warranty: product.warranty,
  trial_period: product.trialPeriod,
  ...(product.createdAt ? { created_at: new Date(product.createdAt).toISOString() } : {}),
});

const getProductDetailsSchema = z.object({
  product_id: z.string().min(1).describe('Name or ID of the product to retrieve details for'),
});

const compareProductsSchema = z.object({
  product_ids: z
    .array(z.string().min(1))
    .min(1)
    .describe('Names or IDs of products to compare'),
});

export class ProductDetailsTools {
  readonly table: ToolTable;

  constructor(private readonly store: CatalogStore) {
    this.table = toolTable(
      defineTool(
        'get_product_details',
        'Get detailed information about a specific mattress product',
        getProductDetailsSchema,
        (args) => this.getProductDetails(args.product_id)
      ),
      defineTool(
        'compare_products',
        'Compare multiple mattress products side by side',
        compareProductsSchema,
        (args) => this.compareProducts(args.product_ids)
      )
    );
  }

  async getProductDetails(reference: string): Promise<ProductRecord> {
    logger.info({ reference }, 'Getting product details');
    const product =
      (await this.store.findProductById(reference)) ??
      (await this.store.findProductByNamePrefix(reference));
    if (!product) {
      throw productNotFound(reference);
    }
    return toProductRecord(product);
  }

  async compareProducts(references: string[]): Promise<ProductComparison> {
    logger.info({ references }, 'Comparing products');
    const catalog = await this.store.listProducts();
    const products: ProductRecord[] = [];
    const notFound: string[] = [];

    for (const reference of references) {
      const match = resolveProductReference(reference, catalog);
      if (match) {
        products.push(toProductRecord(match));
      } else {
        logger.warn({ reference }, 'No matching product for reference');
        notFound.push(reference);
      }
    }

    const comparison: ProductComparison = { total_products: products.length, products };
    if (notFound.length > 0) {
      comparison.not_found = {
        products: notFound,
        available_products: catalog.map((product) => product.name),
      };
    }
    return comparison;
  }
}
