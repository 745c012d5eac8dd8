import { describe, it, expect } from 'vitest';
import { EmailParser } from './email.parser.js';
import type { PriceCatalog } from '../shared/types/index.js';

const catalog: PriceCatalog = {
  'Widget Pro': { price: 25.0, unit: 'piece' },
  'Gadget Basic': { price: 15.5, unit: 'piece' },
  'Tool Kit': { price: 45.0, unit: 'kit' },
};

const fixedClock = () => new Date('2024-01-15T10:30:00.000Z');

function email(...lines: string[]): string {
  return lines.join('\n');
}

describe('EmailParser', () => {
  const parser = new EmailParser(catalog, { clock: fixedClock });

  it('extracts a complete inquiry', () => {
    const content = email(
      'From: John Smith <john@example.com>',
      '',
      'Hi, I need 10 Widget Pro pieces for our project.',
      'Please quote in USD.'
    );

    const event = parser.parse(content, 'test123');

    expect(event.email_id).toBe('test123');
    expect(event.timestamp).toBe('2024-01-15T10:30:00.000Z');
    expect(event.sender).toEqual({ name: 'John Smith', email: 'john@example.com', confidence: 1 });
    expect(event.products).toEqual([
      {
        name: 'Widget Pro',
        quantity: 10,
        unit: 'piece',
        confidence: 1,
        notes: 'Complete information extracted',
      },
    ]);
    expect(event.currency).toBe('USD');
    expect(event.urgency).toBeNull();
    expect(event.gaps).toEqual([]);
    expect(event.raw_content).toBe(content);
  });

  it('reports a missing quantity', () => {
    const content = email(
      'From: Jane Doe <jane@example.com>',
      '',
      "I'm interested in Gadget Basic. Can you quote me?"
    );

    const event = parser.parse(content, 'test456');

    expect(event.products).toHaveLength(1);
    expect(event.products[0].name).toBe('Gadget Basic');
    expect(event.products[0].quantity).toBeNull();
    expect(event.products[0].unit).toBeNull();
    expect(event.products[0].confidence).toBe(0.9);
    expect(event.products[0].notes).toBe('Quantity not specified; Unit not specified');
    expect(event.gaps).toEqual(['Missing quantity for Gadget Basic']);
  });

  it('extracts several products on one line', () => {
    const event = parser.parse(
      email('From: Bob Wilson <bob@example.com>', '', 'Need 5 Widget Pro and 2 Tool Kit for our project.'),
      'test789'
    );

    expect(event.products.map((p) => [p.name, p.quantity, p.unit])).toEqual([
      ['Widget Pro', 5, null],
      ['Tool Kit', 2, null],
    ]);
  });

  it('orders mentions by their position in the text', () => {
    const event = parser.parse('Send 2 Tool Kit and 5 Widget Pro today', 'order');

    expect(event.products.map((p) => [p.name, p.quantity])).toEqual([
      ['Tool Kit', 2],
      ['Widget Pro', 5],
    ]);
  });

  it('keeps one mention per line when a product is repeated', () => {
    const event = parser.parse(
      email('Need 4 Widget Pro for the office.', 'Also add 6 Widget Pro for the warehouse.'),
      'repeat'
    );

    expect(event.products.map((p) => p.quantity)).toEqual([4, 6]);
    expect(event.products.every((p) => p.name === 'Widget Pro')).toBe(true);
  });

  it('matches product names case-insensitively', () => {
    const event = parser.parse('please send 3 widget pro units', 'lower');

    expect(event.products).toHaveLength(1);
    expect(event.products[0].name).toBe('Widget Pro');
    expect(event.products[0].quantity).toBe(3);
    expect(event.products[0].unit).toBe('unit');
  });

  it('detects urgency', () => {
    const event = parser.parse(
      email('From: Alice Brown <alice@example.com>', '', 'Need 3 Gadget Basic asap! This is urgent.'),
      'test101'
    );

    expect(event.urgency).toBe('high');
    expect(event.products[0].quantity).toBe(3);
  });

  it('finds no products when nothing in the catalog is mentioned', () => {
    const event = parser.parse(
      email('From: Charlie Davis <charlie@example.com>', '', 'I need 5 Custom Product units.'),
      'test202'
    );

    expect(event.products).toEqual([]);
    expect(event.gaps).toEqual(['No products identified']);
  });

  it('ignores quoted reply lines', () => {
    const event = parser.parse(
      email(
        'From: Diana Evans <diana@example.com>',
        '',
        '> On Mon, Jan 15, 2024 at 10:00 AM, Sales wrote:',
        '> > Thank you for your inquiry about 40 Widget Pro',
        '',
        'Hi, I need 2 Tool Kit for our workshop.'
      ),
      'test303'
    );

    expect(event.products).toHaveLength(1);
    expect(event.products[0].name).toBe('Tool Kit');
    expect(event.products[0].quantity).toBe(2);
  });

  it('ignores the signature block', () => {
    const event = parser.parse(
      email(
        'From: Frank Miller <frank@example.com>',
        '',
        'Please quote 10 Widget Pro.',
        '',
        '--',
        'Frank Miller',
        'Gadget Basic enthusiast',
        'Phone: (555) 123-4567'
      ),
      'test404'
    );

    expect(event.products.map((p) => [p.name, p.quantity])).toEqual([['Widget Pro', 10]]);
  });

  it('picks up other currencies', () => {
    const event = parser.parse(
      email('From: Grace Lee <grace@example.com>', '', 'Need 5 Gadget Basic. Please quote in eur.'),
      'test505'
    );

    expect(event.currency).toBe('EUR');
    expect(event.products[0].quantity).toBe(5);
  });

  it('flags an unclear sender', () => {
    const event = parser.parse('Need 2 Tool Kit for our project.', 'test707');

    expect(event.sender).toEqual({ name: 'Unknown', email: 'unknown@example.com', confidence: 0.5 });
    expect(event.gaps).toEqual(['Unclear sender information']);
  });

  it('reads explicit units next to quantities', () => {
    const event = parser.parse(
      email('From: Irene Clark <irene@example.com>', '', 'I need 5 pieces of Widget Pro and 2 kits of Tool Kit.'),
      'test808'
    );

    expect(event.products.map((p) => [p.name, p.quantity, p.unit])).toEqual([
      ['Widget Pro', 5, 'piece'],
      ['Tool Kit', 2, 'kit'],
    ]);
  });

  it('handles the short urgent inquiry end to end', () => {
    const event = parser.parse('Need 10 Widget Pro pieces, asap!', 'e2e');

    expect(event.products).toEqual([
      {
        name: 'Widget Pro',
        quantity: 10,
        unit: 'piece',
        confidence: 1,
        notes: 'Complete information extracted',
      },
    ]);
    expect(event.urgency).toBe('high');
    expect(event.gaps).toEqual(['Unclear sender information']);
  });

  it('returns a maximally gappy event for empty text', () => {
    const event = parser.parse('', 'empty');

    expect(event.products).toEqual([]);
    expect(event.urgency).toBeNull();
    expect(event.currency).toBeNull();
    expect(event.gaps).toEqual(['Unclear sender information', 'No products identified']);
  });

  it('uses the configured quantity window', () => {
    const narrow = new EmailParser(catalog, { quantityWindow: 5, clock: fixedClock });
    const content = 'Need 10 of the Widget Pro';

    expect(narrow.parse(content, 'narrow').products[0].quantity).toBeNull();
    expect(parser.parse(content, 'wide').products[0].quantity).toBe(10);
  });

  it('accepts an extended urgency vocabulary', () => {
    const extended = new EmailParser(catalog, { urgencyKeywords: ['soon', 'asap'] });

    expect(extended.parse('Need 2 Tool Kit soon', 'soon').urgency).toBe('low');
  });

  it('is deterministic apart from the timestamp', () => {
    let tick = 0;
    const ticking = new EmailParser(catalog, {
      clock: () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++)),
    });
    const content = email('From: Sam <sam@example.com>', 'Need 3 Tool Kit quick');

    const first = ticking.parse(content, 'same');
    const second = ticking.parse(content, 'same');

    expect(first.timestamp).not.toBe(second.timestamp);
    expect({ ...first, timestamp: '' }).toEqual({ ...second, timestamp: '' });
  });
});
