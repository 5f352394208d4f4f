import { RESPONDER_KINDS, ResponderKind } from '../types/conversation';

export interface ResponderSettings {
  displayName: string;
  responsibilities: string[];
  keywords: string[];
}

export const RESPONDER_SETTINGS: Readonly<Record<ResponderKind, ResponderSettings>> = {
  product_details: {
    displayName: 'Product Details Agent',
    responsibilities: [
      'Product information, features, specifications',
      'Price inquiries',
      'Product comparisons',
      'Technical questions',
    ],
    keywords: ['features', 'specs', 'compare', 'difference', 'price', 'size', 'material'],
  },
  reviews: {
    displayName: 'Reviews Agent',
    responsibilities: [
      'Customer feedback and experiences',
      'Ratings and review analysis',
      'Customer satisfaction metrics',
      'Submitting a new review',
    ],
    keywords: ['reviews', 'ratings', 'feedback', 'customers say', 'experience', 'recommend'],
  },
  orders: {
    displayName: 'Orders Agent',
    responsibilities: [
      'Purchase processing',
      'Order status and tracking',
      'Shipping and delivery',
      'Payment handling',
    ],
    keywords: ['buy', 'order', 'purchase', 'delivery', 'shipping', 'payment', 'track'],
  },
};

export const enabledResponderKinds = (
  flags: Readonly<Record<ResponderKind, boolean>>
): ResponderKind[] => RESPONDER_KINDS.filter((kind) => flags[kind]);
