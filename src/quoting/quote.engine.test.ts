import { describe, it, expect } from 'vitest';
import { QuoteEngine } from './quote.engine.js';
import { resolveDiscountRate } from './discount.js';
import type { DiscountTier, PriceCatalog, Quote, QuoteSettings } from '../shared/types/index.js';

const catalog: PriceCatalog = {
  'Widget Pro': { price: 25.0, unit: 'piece' },
  'Gadget Basic': { price: 15.5, unit: 'piece' },
  'Tool Kit': { price: 45.0, unit: 'kit' },
};

const tiers: DiscountTier[] = [
  { min_amount: 0, max_amount: 100, discount: 0.05 },
  { min_amount: 100, max_amount: 500, discount: 0.1 },
  { min_amount: 500, max_amount: 1000, discount: 0.15 },
  { min_amount: 1000, max_amount: Number.POSITIVE_INFINITY, discount: 0.2 },
];

const settings: QuoteSettings = {
  tax_rate: 0.095,
  default_currency: 'USD',
  quote_validity_days: 7,
};

const clock = () => new Date('2024-01-15T10:30:00.000Z');

describe('QuoteEngine', () => {
  const engine = new QuoteEngine(catalog, tiers, settings, { clock });

  describe('generate', () => {
    it('builds a complete quote', () => {
      const quote = engine.generate({
        email_id: 'test123',
        products: [{ name: 'Widget Pro', quantity: 10 }],
        currency: 'USD',
      });

      expect(quote).toEqual({
        email_id: 'test123',
        timestamp: '2024-01-15T10:30:00.000Z',
        status: 'complete',
        line_items: [
          { product: 'Widget Pro', quantity: 10, unit_price: 25, total: 250, unit: 'piece' },
        ],
        subtotal: 250,
        discount: 25,
        tax: 21.38,
        total: 246.38,
        currency: 'USD',
        pending_reasons: [],
        valid_until: '2024-01-22T10:30:00.000Z',
        discount_rate: 10,
      });
    });

    it('goes pending on a missing quantity', () => {
      const quote = engine.generate({
        email_id: 'test456',
        products: [{ name: 'Widget Pro', quantity: null }],
        currency: 'USD',
      });

      expect(quote.status).toBe('pending');
      expect(quote.total).toBe(0);
      expect(quote.line_items).toEqual([]);
      expect(quote.pending_reasons).toEqual(['Missing quantity for Widget Pro']);
      expect(quote.valid_until).toBe('2024-01-22T10:30:00.000Z');
    });

    it('goes pending on an unrecognized product', () => {
      const quote = engine.generate({
        email_id: 'test789',
        products: [{ name: 'Custom Product', quantity: 5 }],
        currency: 'USD',
      });

      expect(quote.status).toBe('pending');
      expect(quote.pending_reasons).toEqual(["Unrecognized product: 'Custom Product'"]);
    });

    it('lists every problem of every product', () => {
      const quote = engine.generate({
        email_id: 'multi',
        products: [
          { name: 'Widget Pro', quantity: 2 },
          { name: 'Mystery Box', quantity: null },
          { name: 'Tool Kit', quantity: null },
        ],
      });

      expect(quote.pending_reasons).toEqual([
        "Unrecognized product: 'Mystery Box'",
        'Missing quantity for Mystery Box',
        'Missing quantity for Tool Kit',
      ]);
      expect([quote.subtotal, quote.discount, quote.tax, quote.total, quote.discount_rate]).toEqual([
        0, 0, 0, 0, 0,
      ]);
    });

    it.each([
      [[]],
      [[{ name: 'Widget Pro', quantity: 2 }]],
      [[{ name: 'Widget Pro', quantity: 2 }, { name: 'Mystery Box', quantity: 1 }]],
      [[{ name: 'Tool Kit', quantity: null }, { name: 'Gadget Basic', quantity: 3 }]],
    ])('returns a quote whose status agrees with canQuote for %j', (products) => {
      const quote = engine.generate({ email_id: 'mix', products });

      expect(quote.status).toBe(engine.canQuote(products) ? 'complete' : 'pending');
      expect(quote.status === 'pending').toBe(quote.pending_reasons.length > 0);
    });

    it('goes pending with a single reason when there are no products', () => {
      const quote = engine.generate({ email_id: 'test101', products: [], currency: 'USD' });

      expect(quote.status).toBe('pending');
      expect(quote.pending_reasons).toEqual(['No products identified in the inquiry']);
    });

    it.each([
      ['Gadget Basic', 5, 77.5, 5, 3.88, 6.99, 80.62],
      ['Widget Pro', 8, 200, 10, 20, 17.1, 197.1],
      ['Widget Pro', 25, 625, 15, 93.75, 50.47, 581.72],
      ['Widget Pro', 50, 1250, 20, 250, 95, 1095],
    ])(
      'applies the tier for %s x %i',
      (name, quantity, subtotal, rate, discount, tax, total) => {
        const quote = engine.generate({ email_id: 'tier', products: [{ name, quantity }] });

        expect(quote.subtotal).toBe(subtotal);
        expect(quote.discount_rate).toBe(rate);
        expect(quote.discount).toBe(discount);
        expect(quote.tax).toBe(tax);
        expect(quote.total).toBe(total);
      }
    );

    it('sums several line items', () => {
      const quote = engine.generate({
        email_id: 'test606',
        products: [
          { name: 'Widget Pro', quantity: 5 },
          { name: 'Tool Kit', quantity: 2 },
        ],
        currency: 'USD',
      });

      expect(quote.line_items.map((item) => [item.product, item.total, item.unit])).toEqual([
        ['Widget Pro', 125, 'piece'],
        ['Tool Kit', 90, 'kit'],
      ]);
      expect(quote.subtotal).toBe(215);
    });

    it('keeps the subtotal consistent with fractional quantities', () => {
      const quote = engine.generate({
        email_id: 'fraction',
        products: [
          { name: 'Gadget Basic', quantity: 1.333 },
          { name: 'Widget Pro', quantity: 2.5 },
          { name: 'Tool Kit', quantity: 0.7 },
        ],
      });

      const sum = quote.line_items.reduce((acc, item) => acc + item.total, 0);
      expect(Math.abs(sum - quote.subtotal)).toBeLessThan(0.01);
      expect(engine.validate(quote)).toEqual([]);
    });

    it('uses the currency of the request', () => {
      const quote = engine.generate({
        email_id: 'test707',
        products: [{ name: 'Widget Pro', quantity: 10 }],
        currency: 'EUR',
      });

      expect(quote.currency).toBe('EUR');
      expect(quote.status).toBe('complete');
    });

    it('falls back to the default currency', () => {
      const quote = engine.generate({
        email_id: 'nocurrency',
        products: [{ name: 'Widget Pro', quantity: 1 }],
        currency: null,
      });

      expect(quote.currency).toBe('USD');
    });

    it('prices the short urgent inquiry', () => {
      const flat = new QuoteEngine(
        catalog,
        [{ min_amount: 0, max_amount: 500, discount: 0.05 }],
        settings,
        { clock }
      );

      const quote = flat.generate({
        email_id: 'e2e',
        products: [{ name: 'Widget Pro', quantity: 10 }],
      });

      expect(quote.subtotal).toBe(250);
      expect(quote.discount).toBe(12.5);
      expect(quote.tax).toBe(22.56);
      expect(quote.total).toBe(260.06);
    });
  });

  describe('summarize', () => {
    it('describes a single item quote', () => {
      const quote = engine.generate({ email_id: 's1', products: [{ name: 'Tool Kit', quantity: 2 }] });

      // 90 - 4.5 discount = 85.5, + 8.1225 tax = 93.6225
      expect(engine.summarize(quote)).toBe('2 Tool Kit - USD 93.62');
    });

    it('describes a multi item quote', () => {
      const quote = engine.generate({
        email_id: 's2',
        products: [
          { name: 'Widget Pro', quantity: 5 },
          { name: 'Tool Kit', quantity: 2 },
        ],
        currency: 'GBP',
      });

      // 215 - 21.5 discount = 193.5, + 18.3825 tax = 211.8825
      expect(engine.summarize(quote)).toBe('2 items - GBP 211.88');
    });

    it('lists the reasons of a pending quote', () => {
      const quote = engine.generate({
        email_id: 's3',
        products: [
          { name: 'Widget Pro', quantity: null },
          { name: 'Nope', quantity: 1 },
        ],
      });

      expect(engine.summarize(quote)).toBe(
        "Quote pending: Missing quantity for Widget Pro, Unrecognized product: 'Nope'"
      );
    });
  });

  describe('validate', () => {
    const complete: Quote = {
      email_id: 'test808',
      timestamp: '2024-01-15T10:30:00Z',
      status: 'complete',
      line_items: [{ product: 'Widget Pro', quantity: 10, unit_price: 25, total: 250, unit: 'piece' }],
      subtotal: 250,
      discount: 12.5,
      tax: 22.56,
      total: 260.06,
      currency: 'USD',
      pending_reasons: [],
      valid_until: '2024-01-22T10:30:00Z',
      discount_rate: 5,
    };

    it('accepts a consistent complete quote', () => {
      expect(engine.validate(complete)).toEqual([]);
    });

    it('accepts a consistent pending quote', () => {
      const quote = engine.generate({ email_id: 'p', products: [{ name: 'Widget Pro', quantity: null }] });

      expect(engine.validate(quote)).toEqual([]);
    });

    it('reports missing fields and broken totals', () => {
      const errors = engine.validate({ email_id: 'test1010', status: 'complete', total: 0 });

      expect(errors).toEqual([
        'Missing required field: timestamp',
        'Missing required field: line_items',
        'Missing required field: subtotal',
        'Missing required field: discount',
        'Missing required field: tax',
        'Missing required field: currency',
        'Missing required field: pending_reasons',
        'Missing required field: valid_until',
        'Complete quote must have line items',
        'Complete quote must have positive total',
      ]);
    });

    it('reports a subtotal that does not match the line items', () => {
      expect(engine.validate({ ...complete, subtotal: 249.9 })).toEqual(['Subtotal calculation mismatch']);
    });

    it('reports a pending quote with money or without reasons', () => {
      const pending: Quote = { ...complete, status: 'pending', line_items: [], total: 5, pending_reasons: [] };

      expect(engine.validate(pending)).toEqual([
        'Pending quote must have zero total',
        'Pending quote must have pending reasons',
      ]);
    });
  });
});

describe('resolveDiscountRate', () => {
  it('treats tier ranges as half-open', () => {
    expect(resolveDiscountRate(99.99, tiers)).toBe(0.05);
    expect(resolveDiscountRate(100, tiers)).toBe(0.1);
    expect(resolveDiscountRate(1000, tiers)).toBe(0.2);
  });

  it('returns zero for an uncovered subtotal', () => {
    expect(resolveDiscountRate(50, [{ min_amount: 100, max_amount: 200, discount: 0.1 }])).toBe(0);
    expect(resolveDiscountRate(50, [])).toBe(0);
  });
});
