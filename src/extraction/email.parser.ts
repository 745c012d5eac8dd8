import type { ParsedEvent, PriceCatalog } from '../shared/types/index.js';
import { cleanEmailContent } from './email-cleaner.js';
import { identifyGaps } from './gap.analyzer.js';
import { DEFAULT_QUANTITY_WINDOW, ProductExtractor } from './product.extractor.js';
import { extractSender } from './sender.extractor.js';
import { URGENCY_KEYWORDS, extractCurrency, extractUrgency } from './signal.extractor.js';

export interface EmailParserOptions {
  /** Characters searched on each side of a product name for its quantity */
  quantityWindow?: number;
  /** Urgency vocabulary; words outside the built-in tiers count as "low" */
  urgencyKeywords?: readonly string[];
  clock?: () => Date;
}

/**
 * Turns a raw inquiry email into a ParsedEvent.
 *
 * Parsing is total: text with nothing recognisable still yields an event,
 * with sentinel sender values and the corresponding gaps.
 */
export class EmailParser {
  private readonly productExtractor: ProductExtractor;
  private readonly urgencyKeywords: readonly string[];
  private readonly clock: () => Date;

  constructor(catalog: PriceCatalog, options: EmailParserOptions = {}) {
    this.productExtractor = new ProductExtractor(Object.keys(catalog), {
      quantityWindow: options.quantityWindow ?? DEFAULT_QUANTITY_WINDOW,
    });
    this.urgencyKeywords = options.urgencyKeywords ?? URGENCY_KEYWORDS;
    this.clock = options.clock ?? (() => new Date());
  }

  parse(content: string, emailId: string): ParsedEvent {
    const cleaned = cleanEmailContent(content);

    const sender = extractSender(cleaned);
    const products = this.productExtractor.extract(cleaned);

    return {
      email_id: emailId,
      timestamp: this.clock().toISOString(),
      sender,
      products,
      urgency: extractUrgency(cleaned, this.urgencyKeywords),
      currency: extractCurrency(cleaned),
      gaps: identifyGaps(sender, products),
      raw_content: content,
    };
  }
}
