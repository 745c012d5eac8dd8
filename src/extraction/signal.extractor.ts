import {
  type CurrencyCode,
  type UrgencyLevel,
  SUPPORTED_CURRENCIES,
} from '../shared/types/index.js';

const URGENCY_TIERS = new Map<string, UrgencyLevel>([
  ['asap', 'high'],
  ['urgent', 'high'],
  ['rush', 'high'],
  ['immediate', 'high'],
  ['quick', 'medium'],
  ['fast', 'medium'],
]);

export const URGENCY_KEYWORDS: readonly string[] = Array.from(URGENCY_TIERS.keys());

const CURRENCY_PATTERN = new RegExp(`\\b(${SUPPORTED_CURRENCIES.join('|')})\\b`, 'i');

function keywordPattern(keywords: readonly string[]): RegExp {
  const alternatives = keywords.map((k) => k.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
  return new RegExp(`\\b(${alternatives.join('|')})\\b`, 'i');
}

const DEFAULT_URGENCY_PATTERN = keywordPattern(URGENCY_KEYWORDS);

/**
 * Urgency is the tier of the first keyword occurrence in the text, not the
 * highest tier present: "quick turnaround, it's urgent" is "medium".
 * Vocabulary words without a tier of their own count as "low".
 */
export function extractUrgency(
  content: string,
  keywords: readonly string[] = URGENCY_KEYWORDS
): UrgencyLevel | null {
  if (keywords.length === 0) return null;

  const pattern = keywords === URGENCY_KEYWORDS ? DEFAULT_URGENCY_PATTERN : keywordPattern(keywords);
  const match = pattern.exec(content);
  if (!match) return null;

  return URGENCY_TIERS.get(match[1].toLowerCase()) ?? 'low';
}

export function extractCurrency(content: string): CurrencyCode | null {
  const match = CURRENCY_PATTERN.exec(content);
  if (!match) return null;

  const code = match[1].toUpperCase();
  return SUPPORTED_CURRENCIES.find((currency) => currency === code) ?? null;
}
