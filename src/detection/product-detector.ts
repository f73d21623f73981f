import { PRODUCT_KEYWORDS, type ProductDefinition } from '../config/products';

export interface ProductMatch {
  product: string;
  score: number;
  matchedKeywords: string[];
}

/**
 * Score every known product by how many of its keywords occur in the text.
 * Returns the best match, or null when no keyword is present.
 */
export function matchProduct(
  text: string,
  products: readonly ProductDefinition[] = PRODUCT_KEYWORDS
): ProductMatch | null {
  const textLower = text.toLowerCase();
  let best: ProductMatch | null = null;

  for (const { name, keywords } of products) {
    const matchedKeywords = keywords.filter(keyword => textLower.includes(keyword));
    // strictly greater: ties keep the earlier product
    if (matchedKeywords.length > (best?.score ?? 0)) {
      best = { product: name, score: matchedKeywords.length, matchedKeywords };
    }
  }

  return best;
}

export function detectProduct(
  text: string,
  products: readonly ProductDefinition[] = PRODUCT_KEYWORDS
): string | null {
  return matchProduct(text, products)?.product ?? null;
}
