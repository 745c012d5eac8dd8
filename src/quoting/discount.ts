import type { DiscountTier } from '../shared/types/index.js';

/**
 * Rate of the first tier whose half-open range [min_amount, max_amount)
 * contains the subtotal. A subtotal no tier covers gets no discount.
 */
export function resolveDiscountRate(subtotal: number, tiers: readonly DiscountTier[]): number {
  const tier = tiers.find((t) => t.min_amount <= subtotal && subtotal < t.max_amount);
  return tier ? tier.discount : 0;
}
