import type {
  DiscountTier,
  PriceCatalog,
  PriceEntry,
  Quote,
  QuoteLineItem,
  QuoteRequest,
  QuoteSettings,
} from '../shared/types/index.js';
import { formatMoney, roundMoney, roundTo } from '../shared/utils/money.js';
import { resolveDiscountRate } from './discount.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const REQUIRED_FIELDS: ReadonlyArray<keyof Quote> = [
  'email_id',
  'timestamp',
  'status',
  'line_items',
  'subtotal',
  'discount',
  'tax',
  'total',
  'currency',
  'pending_reasons',
  'valid_until',
];

const SUBTOTAL_TOLERANCE = 0.01;

export const PENDING_REASONS = {
  noProducts: 'No products identified in the inquiry',
  unrecognized: (name: string) => `Unrecognized product: '${name}'`,
  missingQuantity: (name: string) => `Missing quantity for ${name}`,
} as const;

export interface QuoteEngineOptions {
  clock?: () => Date;
}

type QuotedProduct = QuoteRequest['products'][number];

interface PricedProducts {
  lineItems: QuoteLineItem[];
  reasons: string[];
}

/**
 * Prices a parsed inquiry against the catalog and discount tiers.
 *
 * An inquiry is either quoted in full or not at all: one unknown product or
 * missing quantity turns the whole quote pending, with every monetary field
 * at zero and one reason per problem.
 */
export class QuoteEngine {
  private readonly prices: ReadonlyMap<string, PriceEntry>;
  private readonly tiers: readonly DiscountTier[];
  private readonly settings: QuoteSettings;
  private readonly clock: () => Date;

  constructor(
    catalog: PriceCatalog,
    tiers: readonly DiscountTier[],
    settings: QuoteSettings,
    options: QuoteEngineOptions = {}
  ) {
    this.prices = new Map(Object.entries(catalog));
    this.tiers = [...tiers];
    this.settings = { ...settings };
    this.clock = options.clock ?? (() => new Date());
  }

  generate(request: QuoteRequest): Quote {
    const currency = request.currency ?? this.settings.default_currency;

    const { lineItems, reasons } = this.priceProducts(request.products);

    return reasons.length === 0
      ? this.buildCompleteQuote(request.email_id, lineItems, currency)
      : this.buildPendingQuote(request.email_id, reasons, currency);
  }

  /**
   * True when there is at least one product and every product is in the
   * catalog with a quantity
   */
  canQuote(products: readonly QuotedProduct[]): boolean {
    return (
      products.length > 0 &&
      products.every((product) => this.prices.has(product.name) && product.quantity !== null)
    );
  }

  /**
   * One-line human readable description of a quote
   */
  summarize(quote: Quote): string {
    if (quote.status === 'pending') {
      return `Quote pending: ${quote.pending_reasons.join(', ')}`;
    }

    const total = `${quote.currency} ${formatMoney(quote.total)}`;
    if (quote.line_items.length === 1) {
      const [item] = quote.line_items;
      return `${item.quantity} ${item.product} - ${total}`;
    }
    return `${quote.line_items.length} items - ${total}`;
  }

  /**
   * Consistency check of a quote record. Returns the violations found; an
   * empty list means the record is valid.
   */
  validate(quote: Partial<Quote>): string[] {
    const errors: string[] = [];

    for (const field of REQUIRED_FIELDS) {
      if (quote[field] === undefined) {
        errors.push(`Missing required field: ${field}`);
      }
    }

    const lineItems = quote.line_items ?? [];
    const total = quote.total ?? 0;

    if (quote.status === 'complete') {
      if (lineItems.length === 0) {
        errors.push('Complete quote must have line items');
      }
      if (total <= 0) {
        errors.push('Complete quote must have positive total');
      }
    } else if (quote.status === 'pending') {
      if (total !== 0) {
        errors.push('Pending quote must have zero total');
      }
      if (!quote.pending_reasons || quote.pending_reasons.length === 0) {
        errors.push('Pending quote must have pending reasons');
      }
    }

    if (quote.status === 'complete' && lineItems.length > 0) {
      const calculated = lineItems.reduce((sum, item) => sum + item.total, 0);
      if (Math.abs(calculated - (quote.subtotal ?? 0)) > SUBTOTAL_TOLERANCE) {
        errors.push('Subtotal calculation mismatch');
      }
    }

    return errors;
  }

  /**
   * Price every product the catalog knows and has a quantity for, and give
   * one reason per product that cannot be priced. No products at all is a
   * single reason of its own.
   */
  private priceProducts(products: readonly QuotedProduct[]): PricedProducts {
    if (products.length === 0) {
      return { lineItems: [], reasons: [PENDING_REASONS.noProducts] };
    }

    const lineItems: QuoteLineItem[] = [];
    const reasons: string[] = [];

    for (const product of products) {
      const price = this.prices.get(product.name);
      if (!price) {
        reasons.push(PENDING_REASONS.unrecognized(product.name));
      }
      if (product.quantity === null) {
        reasons.push(PENDING_REASONS.missingQuantity(product.name));
      }
      if (price && product.quantity !== null) {
        lineItems.push({
          product: product.name,
          quantity: product.quantity,
          unit_price: price.price,
          total: price.price * product.quantity,
          unit: price.unit,
        });
      }
    }

    return { lineItems, reasons };
  }

  private buildCompleteQuote(emailId: string, lineItems: QuoteLineItem[], currency: string): Quote {
    const subtotal = lineItems.reduce((sum, item) => sum + item.total, 0);
    const discountRate = resolveDiscountRate(subtotal, this.tiers);
    const discount = subtotal * discountRate;
    const taxable = subtotal - discount;
    const tax = taxable * this.settings.tax_rate;
    const now = this.clock();

    return {
      email_id: emailId,
      timestamp: now.toISOString(),
      status: 'complete',
      line_items: lineItems,
      subtotal: roundMoney(subtotal),
      discount: roundMoney(discount),
      tax: roundMoney(tax),
      total: roundMoney(taxable + tax),
      currency,
      pending_reasons: [],
      valid_until: this.validUntil(now),
      discount_rate: roundTo(discountRate * 100, 1),
    };
  }

  private buildPendingQuote(emailId: string, reasons: string[], currency: string): Quote {
    const now = this.clock();

    return {
      email_id: emailId,
      timestamp: now.toISOString(),
      status: 'pending',
      line_items: [],
      subtotal: 0,
      discount: 0,
      tax: 0,
      total: 0,
      currency,
      pending_reasons: reasons,
      valid_until: this.validUntil(now),
      discount_rate: 0,
    };
  }

  private validUntil(now: Date): string {
    return new Date(now.getTime() + this.settings.quote_validity_days * DAY_MS).toISOString();
  }
}
