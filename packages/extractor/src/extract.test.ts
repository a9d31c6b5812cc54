import { describe, expect, it } from 'vitest';

import { ExtractionFailure, recordsEqual } from '@shopscout/core';
import { listProductPageFixtures, loadProductPageFixture } from '@shopscout/fixtures';

import { extractProductRecord, inspectProductPage } from './extract.js';

const fixedNow = () => new Date('2026-03-01T08:00:00.000Z');

describe('extractProductRecord against fixtures', () => {
  for (const fixture of listProductPageFixtures()) {
    const { expected } = fixture;

    if (expected.extractionFails) {
      it(`rejects ${fixture.id}`, () => {
        expect(() => extractProductRecord(fixture.html, fixture.sourceUrl, { now: fixedNow })).toThrow(
          ExtractionFailure
        );
      });
      continue;
    }

    it(`extracts ${fixture.id}`, () => {
      const record = extractProductRecord(fixture.html, fixture.sourceUrl, { now: fixedNow });

      expect(record.sourceUrl).toBe(fixture.sourceUrl);
      expect(record.title).toBe(expected.title);
      expect(record.priceConfidence).toBe(expected.priceConfidence);
      expect(record.priceSource).toBe(expected.priceSource);
      if (expected.price) {
        expect(record.price?.amount).toBe(expected.price.amount);
        expect(record.price?.currencyCode).toBe(expected.price.currencyCode);
      } else {
        expect(record.price).toBeUndefined();
      }
      expect(record.images).toEqual(expected.images);
      expect(record.description).toBe(expected.description);
      expect(record.reviews).toHaveLength(expected.reviewCount ?? 0);
      expect(record.brand).toBe(expected.brand);
      expect(record.sku).toBe(expected.sku);
      expect(record.extractedAt).toBe('2026-03-01T08:00:00.000Z');
    });
  }
});

describe('extractProductRecord', () => {
  it('is idempotent for the same html and url', () => {
    const fixture = loadProductPageFixture('neckband-visible');

    const first = extractProductRecord(fixture.html, fixture.sourceUrl, { now: fixedNow });
    const second = extractProductRecord(fixture.html, fixture.sourceUrl, {
      now: () => new Date('2026-03-02T09:30:00.000Z')
    });

    expect(recordsEqual(first, second)).toBe(true);
    expect(first.extractedAt).not.toBe(second.extractedAt);
  });

  it('prefers structured metadata over a struck-through visible price', () => {
    const fixture = loadProductPageFixture('earbuds-structured');
    const record = extractProductRecord(fixture.html, fixture.sourceUrl, { now: fixedNow });

    expect(record.price).toEqual({ amount: 1999, currencyCode: 'INR', precision: 2, raw: '₹1999' });
    expect(record.priceConfidence).toBe('high');
  });

  it('picks the non-struck visible price when no structured data exists', () => {
    const fixture = loadProductPageFixture('neckband-visible');
    const report = inspectProductPage(fixture.html, fixture.sourceUrl);

    expect(report.evidence.priceCandidates).toEqual([
      { raw: '₹899', source: 'visible-price-element' },
      { raw: '₹1,299', source: 'list-price' },
      { raw: '₹899', source: 'heuristic-text-scan' }
    ]);
    expect(report.selection.price?.amount).toBe(899);
    expect(report.selection.confidence).toBe('medium');
  });

  it('keeps a record for pages without any price signal', () => {
    const fixture = loadProductPageFixture('throw-no-price');
    const record = extractProductRecord(fixture.html, fixture.sourceUrl, { now: fixedNow });

    expect(record.price).toBeUndefined();
    expect(record.priceConfidence).toBe('unknown');
    expect(record.title).toBe('Handwoven Cotton Throw');
    expect(record.images).toHaveLength(2);
  });

  it('reads reviews with rating and author', () => {
    const fixture = loadProductPageFixture('neckband-visible');
    const record = extractProductRecord(fixture.html, fixture.sourceUrl, { now: fixedNow });

    expect(record.reviews).toEqual([
      { text: 'Battery easily lasts two days.', rating: 4, author: 'Meera' },
      { text: 'Fit is loose during runs.', rating: 3 }
    ]);
  });

  it('uses the site profile for known hosts', () => {
    const fixture = loadProductPageFixture('amazon-watch');
    const report = inspectProductPage(fixture.html, fixture.sourceUrl);

    expect(report.evidence.strategies).toEqual(['site-profile', 'generic-heuristic']);
    expect(report.selection.price?.raw).toBe('₹3,499.00');
  });

  it('ignores prices of other products listed on the page', () => {
    const fixture = loadProductPageFixture('amazon-watch');
    const html = fixture.html.replace(
      '</body>',
      '<div id="sims-carousel"><div class="a-carousel-card"><span class="a-price"><span class="a-offscreen">₹299.00</span></span></div></div></body>'
    );

    const report = inspectProductPage(html, fixture.sourceUrl);

    expect(report.selection.price?.amount).toBe(3499);
    expect(report.evidence.priceCandidates.map((candidate) => candidate.raw)).not.toContain('₹299.00');
  });

  it('does not take an instalment figure for the price', () => {
    const html = `
      <html>
        <body>
          <h1>Zenbeat Neckband</h1>
          <span class="selling-price">₹899</span>
          <div class="emi-offer">No cost EMI from ₹150/month</div>
        </body>
      </html>
    `;

    const record = extractProductRecord(html, 'https://shop.example.com/p/neckband', { now: fixedNow });

    expect(record.price?.amount).toBe(899);
    expect(record.priceConfidence).toBe('medium');
  });

  it('does not take a delivery charge for the price', () => {
    const html = `
      <html>
        <body>
          <h1>Steel Water Bottle</h1>
          <span class="product-price">₹599</span>
          <span class="delivery-price">Delivery ₹40</span>
        </body>
      </html>
    `;

    const record = extractProductRecord(html, 'https://shop.example.com/p/bottle', { now: fixedNow });

    expect(record.price?.amount).toBe(599);
    expect(record.priceConfidence).toBe('medium');
  });

  it('copies brand, sku and review details from JSON-LD graphs', () => {
    const fixture = loadProductPageFixture('kettle-graph');
    const record = extractProductRecord(fixture.html, fixture.sourceUrl, { now: fixedNow });

    expect(record.price).toEqual({ amount: 2499, currencyCode: 'INR', precision: 2, raw: '2499.00' });
    expect(record.reviews).toEqual([{ text: 'Boils water in under three minutes.', rating: 5, author: 'Kavya' }]);
  });

  it('demotes structured data that names no price behind the heuristics', () => {
    const html = `
      <html>
        <head>
          <script type="application/ld+json">{"@type":"Product","name":"Short name","image":"https://cdn.example.com/ld.jpg"}</script>
        </head>
        <body>
          <h1>Full Product Name From Heading</h1>
          <span class="price">₹450</span>
        </body>
      </html>
    `;

    const record = extractProductRecord(html, 'https://shop.example.com/p/1', { now: fixedNow });

    expect(record.title).toBe('Full Product Name From Heading');
    expect(record.price?.amount).toBe(450);
    expect(record.priceConfidence).toBe('medium');
    expect(record.images).toEqual(['https://cdn.example.com/ld.jpg']);
  });

  it('prefers the longest title that is not truncated', () => {
    const html = `
      <html>
        <head>
          <title>Acme Trail Running Shoes for Men, Lightweight and Breathable | ShoeHub</title>
          <meta property="og:title" content="Acme Trail Running Shoes for Men, Lightweight and Breathable, Size 9 UK..." />
        </head>
        <body><h1>Acme Trail Running Shoes</h1></body>
      </html>
    `;

    const record = extractProductRecord(html, 'https://shoehub.example.com/p/trail', { now: fixedNow });

    expect(record.title).toBe('Acme Trail Running Shoes for Men, Lightweight and Breathable');
  });

  it('skips malformed JSON-LD blocks', () => {
    const html = `
      <html>
        <head>
          <script type="application/ld+json">{"@type": "Product", "name": </script>
          <script type="application/ld+json">{"@type":"Product","name":"Desk Lamp","offers":{"price":799,"priceCurrency":"INR"}}</script>
        </head>
        <body></body>
      </html>
    `;

    const record = extractProductRecord(html, 'https://shop.example.com/p/lamp', { now: fixedNow });

    expect(record.title).toBe('Desk Lamp');
    expect(record.price?.amount).toBe(799);
    expect(record.priceConfidence).toBe('high');
  });

  it('reads schema.org microdata', () => {
    const html = `
      <html>
        <body>
          <div itemscope itemtype="https://schema.org/Product">
            <h1 itemprop="name">Ceramic Mug Set</h1>
            <div itemprop="brand" itemscope itemtype="https://schema.org/Brand"><span itemprop="name">Potter &amp; Co</span></div>
            <div itemprop="offers" itemscope itemtype="https://schema.org/Offer">
              <meta itemprop="priceCurrency" content="INR" />
              <span itemprop="price" content="649">₹649</span>
            </div>
          </div>
        </body>
      </html>
    `;

    const record = extractProductRecord(html, 'https://shop.example.com/p/mugs', { now: fixedNow });

    expect(record.title).toBe('Ceramic Mug Set');
    expect(record.brand).toBe('Potter & Co');
    expect(record.price).toEqual({ amount: 649, currencyCode: 'INR', precision: 2, raw: '649' });
    expect(record.priceSource).toBe('structured-metadata');
  });

  it('records the raw snapshot reference', () => {
    const fixture = loadProductPageFixture('throw-no-price');
    const record = extractProductRecord(fixture.html, fixture.sourceUrl, {
      now: fixedNow,
      rawSnapshotRef: 'pages/loomcraft-example-products-handwoven-cotton-throw-1a2b3c4d.html'
    });

    expect(record.rawSnapshotRef).toBe('pages/loomcraft-example-products-handwoven-cotton-throw-1a2b3c4d.html');
  });

  it('rejects source URLs that are not absolute http(s)', () => {
    expect(() => extractProductRecord('<h1>Item</h1>', '/relative/path')).toThrow(ExtractionFailure);
  });
});
