import type { ProductMention, SenderInfo } from '../shared/types/index.js';

export const SENDER_CONFIDENCE_THRESHOLD = 0.7;
export const PRODUCT_CONFIDENCE_THRESHOLD = 0.6;

export const GAP_MESSAGES = {
  unclearSender: 'Unclear sender information',
  noProducts: 'No products identified',
  missingQuantity: (name: string) => `Missing quantity for ${name}`,
  lowConfidence: (name: string) => `Low confidence in ${name} extraction`,
} as const;

/**
 * Derive the information gaps of an extraction. Entries repeat once per
 * offending product and are never deduplicated.
 */
export function identifyGaps(sender: SenderInfo, products: readonly ProductMention[]): string[] {
  const gaps: string[] = [];

  if (sender.confidence < SENDER_CONFIDENCE_THRESHOLD) {
    gaps.push(GAP_MESSAGES.unclearSender);
  }

  if (products.length === 0) {
    gaps.push(GAP_MESSAGES.noProducts);
    return gaps;
  }

  for (const product of products) {
    if (product.quantity === null) {
      gaps.push(GAP_MESSAGES.missingQuantity(product.name));
    }
    if (product.confidence < PRODUCT_CONFIDENCE_THRESHOLD) {
      gaps.push(GAP_MESSAGES.lowConfidence(product.name));
    }
  }

  return gaps;
}
