import type { ProductMention } from '../shared/types/index.js';
import { roundTo } from '../shared/utils/money.js';

export const DEFAULT_QUANTITY_WINDOW = 50;

const UNIT_WORD = 'pcs?|pieces?|units?|kits?|packs?|boxes?|sets?';

// A number, optionally followed by a unit word: "10", "2.5", "5 pieces", "3kits"
const QUANTITY_PATTERN = new RegExp(`\\b(\\d+(?:\\.\\d+)?)\\s*(${UNIT_WORD})?\\b`, 'gi');

// A unit word written straight after the product name: "Widget Pro pieces"
const TRAILING_UNIT_PATTERN = new RegExp(`^\\s*(${UNIT_WORD})\\b`, 'i');

// Any unit word anywhere in a window
const UNIT_SEARCH_PATTERN = new RegExp(`\\b(${UNIT_WORD})\\b`, 'gi');

const UNIT_KEYWORDS: ReadonlyArray<{ pattern: RegExp; unit: string }> = [
  { pattern: /^(?:pcs?|pieces?)$/i, unit: 'piece' },
  { pattern: /^kits?$/i, unit: 'kit' },
  { pattern: /^packs?$/i, unit: 'pack' },
  { pattern: /^box(?:es)?$/i, unit: 'box' },
  { pattern: /^sets?$/i, unit: 'set' },
  { pattern: /^units?$/i, unit: 'unit' },
];

const BASE_CONFIDENCE = 0.5;
const CATALOG_MATCH_BONUS = 0.3;
const QUANTITY_BONUS = 0.2;
const CONTEXT_BONUS = 0.1;
const MIN_CONTEXT_LENGTH = 10;

interface ProductMatch {
  name: string;
  start: number;
  end: number;
}

interface QuantityMatch {
  quantity: number | null;
  unit: string | null;
}

export interface ProductExtractorOptions {
  quantityWindow?: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Map a unit word as written ("pcs", "Boxes") to its canonical unit
 */
export function normalizeUnit(word: string): string | null {
  const entry = UNIT_KEYWORDS.find(({ pattern }) => pattern.test(word));
  return entry ? entry.unit : null;
}

/**
 * Finds catalog products in inquiry text and associates each occurrence with
 * the nearest quantity inside a fixed character window.
 */
export class ProductExtractor {
  private readonly products: ReadonlyArray<{ name: string; pattern: RegExp }>;
  private readonly quantityWindow: number;

  constructor(productNames: readonly string[], options: ProductExtractorOptions = {}) {
    this.products = productNames
      .filter((name) => name.trim().length > 0)
      .map((name) => ({ name, pattern: new RegExp(escapeRegExp(name), 'gi') }));
    this.quantityWindow = options.quantityWindow ?? DEFAULT_QUANTITY_WINDOW;
  }

  /**
   * Extract mentions line by line, falling back to the whole text when no
   * single line contains a product name.
   */
  extract(content: string): ProductMention[] {
    const mentions: ProductMention[] = [];

    for (const rawLine of content.split('\n')) {
      const line = rawLine.trim();
      if (!line) continue;
      mentions.push(...this.extractFrom(line));
    }

    if (mentions.length === 0) {
      mentions.push(...this.extractFrom(content));
    }

    return mentions;
  }

  private extractFrom(text: string): ProductMention[] {
    return this.findProducts(text).map((match) => {
      const { quantity, unit } = this.findQuantity(text, match);
      return {
        name: match.name,
        quantity,
        unit,
        confidence: this.scoreMention(quantity, text),
        notes: describeMention(quantity, unit),
      };
    });
  }

  /**
   * Every case-insensitive occurrence of every catalog name, in text order
   */
  private findProducts(text: string): ProductMatch[] {
    const matches: ProductMatch[] = [];

    for (const product of this.products) {
      for (const match of text.matchAll(product.pattern)) {
        const start = match.index ?? 0;
        matches.push({ name: product.name, start, end: start + match[0].length });
      }
    }

    return matches.sort((a, b) => a.start - b.start);
  }

  private findQuantity(text: string, match: ProductMatch): QuantityMatch {
    const before = text.slice(Math.max(0, match.start - this.quantityWindow), match.start);
    const after = text.slice(match.end, match.end + this.quantityWindow);

    // The number closest to the product on its left wins over anything after it
    const beforeMatches = Array.from(before.matchAll(QUANTITY_PATTERN));
    const afterMatches = Array.from(after.matchAll(QUANTITY_PATTERN));
    const quantityBefore = beforeMatches.length > 0;
    const chosen: RegExpMatchArray | undefined = quantityBefore
      ? beforeMatches[beforeMatches.length - 1]
      : afterMatches[0];

    const trailingUnit = TRAILING_UNIT_PATTERN.exec(after)?.[1];
    const unitWord =
      chosen?.[2] ?? trailingUnit ?? this.findUnitWord(before, after, quantityBefore || !chosen);

    return {
      quantity: chosen ? Number.parseFloat(chosen[1]) : null,
      unit: unitWord ? normalizeUnit(unitWord) : null,
    };
  }

  /**
   * Unit word nearest the product in either window, searching the window the
   * quantity came from first. Catalog names are blanked out so that "Tool Kit"
   * never reads as a unit.
   */
  private findUnitWord(before: string, after: string, beforeFirst: boolean): string | undefined {
    const beforeWords = Array.from(this.maskProducts(before).matchAll(UNIT_SEARCH_PATTERN));
    const nearestBefore = beforeWords[beforeWords.length - 1]?.[1];
    const nearestAfter = Array.from(this.maskProducts(after).matchAll(UNIT_SEARCH_PATTERN))[0]?.[1];

    return beforeFirst ? nearestBefore ?? nearestAfter : nearestAfter ?? nearestBefore;
  }

  private maskProducts(text: string): string {
    return this.products.reduce(
      (masked, product) => masked.replace(product.pattern, (match) => ' '.repeat(match.length)),
      text
    );
  }

  private scoreMention(quantity: number | null, context: string): number {
    // Matching is literal against the catalog, so the catalog bonus always applies
    let confidence = BASE_CONFIDENCE + CATALOG_MATCH_BONUS;
    if (quantity !== null) confidence += QUANTITY_BONUS;
    if (context.trim().length > MIN_CONTEXT_LENGTH) confidence += CONTEXT_BONUS;

    return roundTo(Math.min(confidence, 1), 2);
  }
}

function describeMention(quantity: number | null, unit: string | null): string {
  const notes: string[] = [];
  if (quantity === null) notes.push('Quantity not specified');
  if (unit === null) notes.push('Unit not specified');

  return notes.length > 0 ? notes.join('; ') : 'Complete information extracted';
}
