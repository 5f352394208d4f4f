import { CatalogStore } from '../../repositories/CatalogStore';
import { ResponderKind } from '../../types/conversation';
import { OrderTools, OrderToolsOptions } from '../tools/OrderTools';
import { ProductDetailsTools } from '../tools/ProductDetailsTools';
import { ReviewTools } from '../tools/ReviewTools';
import { buildOrdersPrompt, buildProductDetailsPrompt, buildReviewsPrompt } from './prompts';
import { ResponderProfile } from './Responder';

export { APOLOGY_MESSAGE, Responder } from './Responder';
export type { ResponderOptions, ResponderProfile } from './Responder';

const assertNever = (value: never): never => {
  throw new Error(`Unhandled responder kind: ${String(value)}`);
};

export const createResponderProfile = (
  kind: ResponderKind,
  store: CatalogStore,
  orderOptions: OrderToolsOptions = {}
): ResponderProfile => {
  switch (kind) {
    case 'product_details':
      return {
        kind,
        name: 'Product Details',
        buildSystemPrompt: () => buildProductDetailsPrompt(store),
        tools: new ProductDetailsTools(store).table,
      };
    case 'reviews':
      return {
        kind,
        name: 'Reviews',
        buildSystemPrompt: () => buildReviewsPrompt(store),
        tools: new ReviewTools(store).table,
      };
    case 'orders':
      return {
        kind,
        name: 'Orders',
        buildSystemPrompt: () => buildOrdersPrompt(store),
        tools: new OrderTools(store, orderOptions).table,
      };
    default:
      return assertNever(kind);
  }
};
