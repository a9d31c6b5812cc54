import { describe, expect, it } from 'vitest';

import { applyTransform, findPriceTokens } from './transforms.js';

describe('text.collapse', () => {
  it('collapses whitespace by default', () => {
    expect(applyTransform('text.collapse', '  Acme \n\t Earbuds  ')).toBe('Acme Earbuds');
  });
});

describe('money.parse', () => {
  it('parses rupee amounts with Indian digit grouping', () => {
    expect(applyTransform('money.parse', '₹1,29,999')).toEqual({
      amount: 129999,
      currencyCode: 'INR',
      precision: 2,
      raw: '₹1,29,999'
    });
  });

  it('recognizes Rs. and decimal precision', () => {
    expect(applyTransform('money.parse', 'Rs. 1,299.50')).toEqual({
      amount: 1299.5,
      currencyCode: 'INR',
      precision: 2,
      raw: 'Rs. 1,299.50'
    });
  });

  it('recognizes suffixed currency codes', () => {
    const parsed = applyTransform('money.parse', '45.5 USD');

    expect(parsed.amount).toBe(45.5);
    expect(parsed.currencyCode).toBe('USD');
    expect(parsed.precision).toBe(1);
  });

  it('resolves a price range to its lower bound', () => {
    expect(applyTransform('money.parse', '₹999 - ₹499').amount).toBe(499);
    expect(applyTransform('money.parse', '₹499 to ₹999').amount).toBe(499);
  });

  it('uses the provided currency for bare numbers', () => {
    expect(applyTransform('money.parse', '1999', { currencyCode: 'INR' })).toEqual({
      amount: 1999,
      currencyCode: 'INR',
      precision: 2,
      raw: '1999'
    });
    expect(applyTransform('money.parse', 24.99, { currencyCode: 'usd' }).currencyCode).toBe('USD');
  });

  it('fails without any way to determine the currency', () => {
    expect(() => applyTransform('money.parse', '1999')).toThrow(/currency/);
    expect(() => applyTransform('money.parse', 1999)).toThrow(/currency/);
  });

  it('fails on text without a number or on zero amounts', () => {
    expect(() => applyTransform('money.parse', 'Out of stock', { currencyCode: 'INR' })).toThrow();
    expect(() => applyTransform('money.parse', '₹0')).toThrow();
  });
});

describe('findPriceTokens', () => {
  it('lists currency-marked amounts in document order', () => {
    const tokens = findPriceTokens('Deal: ₹1,299 instead of Rs 1,999. Ships in 2 days.');

    expect(tokens.map((token) => [token.amount, token.currencyCode, token.raw])).toEqual([
      [1299, 'INR', '₹1,299'],
      [1999, 'INR', 'Rs 1,999']
    ]);
  });

  it('ignores numbers without a currency marker and words ending in rs', () => {
    expect(findPriceTokens('Pack of 2, 4 colours, 12 hours battery')).toEqual([]);
    expect(findPriceTokens('Buyers 5 stars')).toEqual([]);
  });
});

describe('url.resolve', () => {
  it('resolves relative URLs and strips fragments', () => {
    expect(
      applyTransform('url.resolve', '/images/a.jpg#zoom', { baseUrl: 'https://shop.example.com/p/1' })
    ).toBe('https://shop.example.com/images/a.jpg');
  });
});
