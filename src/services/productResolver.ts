import { Product } from '../types/catalog';

const tokenize = (value: string): Set<string> =>
  new Set(value.toLowerCase().split(/\s+/).filter((token) => token.length > 0));

const toKebab = (reference: string): string => {
  const kebab = reference.replace(/[\s_]+/g, '-');
  return kebab.endsWith('-mattress') ? kebab.slice(0, -'-mattress'.length) : kebab;
};

/**
 * Resolves a free-text product reference ("ultra comfort", "Eco Green
 * Mattress", "dream-sleep") against the catalog. First hit wins:
 * exact id, exact name, hyphenated containment in the id, then word overlap
 * covering at least half of the reference's words.
 */
export const resolveProductReference = <T extends Pick<Product, 'id' | 'name'>>(
  reference: string,
  products: readonly T[]
): T | undefined => {
  const normalized = reference.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }

  const byId = products.find((product) => product.id.toLowerCase() === normalized);
  if (byId) {
    return byId;
  }

  const byName = products.find((product) => product.name.toLowerCase() === normalized);
  if (byName) {
    return byName;
  }

  const kebab = toKebab(normalized);
  if (kebab) {
    const byIdFragment = products.find((product) => product.id.toLowerCase().includes(kebab));
    if (byIdFragment) {
      return byIdFragment;
    }
  }

  const referenceTokens = tokenize(normalized);
  return products.find((product) => {
    const nameTokens = tokenize(product.name);
    let shared = 0;
    for (const token of referenceTokens) {
      if (nameTokens.has(token)) {
        shared += 1;
      }
    }
    return shared > 0 && shared >= referenceTokens.size / 2;
  });
};
