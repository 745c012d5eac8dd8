import type { ProductMention } from './inquiry.types.js';

export interface PriceEntry {
  price: number;
  unit: string;
}

/**
 * Unit prices keyed by exact product name
 */
export type PriceCatalog = Record<string, PriceEntry>;

/**
 * Discount bracket over the half-open range [min_amount, max_amount)
 */
export interface DiscountTier {
  min_amount: number;
  max_amount: number;
  discount: number;
}

export interface QuoteSettings {
  tax_rate: number;
  default_currency: string;
  quote_validity_days: number;
}

export interface BusinessSettings extends QuoteSettings {
  sla_hours: number;
  company_name: string;
  contact_email: string;
}

export type QuoteStatus = 'complete' | 'pending';

export interface QuoteLineItem {
  product: string;
  quantity: number;
  unit_price: number;
  total: number;
  unit: string;
}

export interface Quote {
  email_id: string;
  timestamp: string;
  status: QuoteStatus;
  line_items: QuoteLineItem[];
  subtotal: number;
  discount: number;
  tax: number;
  total: number;
  currency: string;
  pending_reasons: string[];
  valid_until: string;
  discount_rate: number;
}

/**
 * The parts of a parsed event the quote engine reads
 */
export interface QuoteRequest {
  email_id: string;
  products: Array<Pick<ProductMention, 'name' | 'quantity'>>;
  currency?: string | null;
}
