import { describe, it, expect } from 'vitest';
import { extractSender } from './sender.extractor.js';

describe('extractSender', () => {
  it('reads name and address from a From header', () => {
    expect(extractSender('From: Jane Doe <jane.doe@example.org>\nHello')).toEqual({
      name: 'Jane Doe',
      email: 'jane.doe@example.org',
      confidence: 1,
    });
  });

  it('reads a name without a bracketed address', () => {
    expect(extractSender('From: Jane Doe\nNeed 3 Tool Kit')).toEqual({
      name: 'Jane Doe',
      email: 'unknown@example.com',
      confidence: 0.8,
    });
  });

  it('finds an address anywhere in the text', () => {
    expect(extractSender('Please reply to buyer@example.com')).toEqual({
      name: 'Unknown',
      email: 'buyer@example.com',
      confidence: 0.7,
    });
  });

  it('falls back to sentinel values', () => {
    expect(extractSender('Hello there')).toEqual({
      name: 'Unknown',
      email: 'unknown@example.com',
      confidence: 0.5,
    });
  });

  it('treats an empty name as missing', () => {
    expect(extractSender('From: <sales@example.com>').name).toBe('Unknown');
  });
});
