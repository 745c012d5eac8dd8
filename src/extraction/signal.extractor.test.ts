import { describe, it, expect } from 'vitest';
import { extractCurrency, extractUrgency } from './signal.extractor.js';

describe('extractUrgency', () => {
  it.each([
    ['Please send this ASAP', 'high'],
    ['This is a rush order', 'high'],
    ['We need immediate delivery', 'high'],
    ['A quick reply would help', 'medium'],
    ['Fast shipping please', 'medium'],
  ])('classifies "%s" as %s', (text, level) => {
    expect(extractUrgency(text)).toBe(level);
  });

  it('uses the tier of the first keyword in the text', () => {
    expect(extractUrgency('A quick turnaround would be great, it is urgent')).toBe('medium');
    expect(extractUrgency('Urgent: we need a fast answer')).toBe('high');
  });

  it('matches whole words only', () => {
    expect(extractUrgency('Breakfast is served')).toBeNull();
    expect(extractUrgency('The brush set')).toBeNull();
  });

  it('returns null without keywords', () => {
    expect(extractUrgency('Whenever convenient')).toBeNull();
    expect(extractUrgency('asap', [])).toBeNull();
  });
});

describe('extractCurrency', () => {
  it('returns the first supported code in upper case', () => {
    expect(extractCurrency('Prices in gbp or USD please')).toBe('GBP');
    expect(extractCurrency('Quote in JPY')).toBe('JPY');
  });

  it('ignores unsupported codes and partial words', () => {
    expect(extractCurrency('Quote in CHF')).toBeNull();
    expect(extractCurrency('The EURO zone')).toBeNull();
  });
});
