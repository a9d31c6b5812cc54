import { describe, expect, it } from 'vitest';

import { getFixtureRoot, listProductPageFixtures, loadProductPageFixture } from './index.js';

describe('product page fixtures', () => {
  it('lists every fixture declared in the manifest', () => {
    expect(listProductPageFixtures().map((fixture) => fixture.id)).toEqual([
      'earbuds-structured',
      'neckband-visible',
      'throw-no-price',
      'empty-shell',
      'amazon-watch',
      'kettle-graph'
    ]);
  });

  it('loads html and memoizes the parsed manifest', () => {
    const first = loadProductPageFixture('neckband-visible');
    const second = loadProductPageFixture('neckband-visible');

    expect(first).toBe(second);
    expect(first.html).toContain('Zenbeat Bluetooth Neckband');
    expect(first.path.startsWith(getFixtureRoot())).toBe(true);
    expect(first.expected.extractionFails).toBe(false);
  });

  it('marks pages that must not yield a record', () => {
    expect(loadProductPageFixture('empty-shell').expected.extractionFails).toBe(true);
  });

  it('rejects unknown fixture ids', () => {
    expect(() => loadProductPageFixture('missing')).toThrow('Unknown product page fixture: missing');
  });
});
