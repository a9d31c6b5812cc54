import type { PriceCandidate, Review } from '@shopscout/core';

import type { StrategyResult, StrategyTag } from './types.js';

export interface MergedEvidence {
  readonly title?: string;
  readonly priceCandidates: readonly PriceCandidate[];
  readonly images: readonly string[];
  readonly description?: string;
  readonly reviews: readonly Review[];
  readonly brand?: string;
  readonly sku?: string;
  /** Strategies that produced a result, in precedence order. */
  readonly strategies: readonly StrategyTag[];
}

const TRUNCATED = /(?:\.\.\.|…)$/;

/**
 * Longest title that does not end in an ellipsis; falls back to the longest
 * truncated one. Ties keep the earlier candidate.
 */
export const pickTitle = (titles: readonly string[]): string | undefined => {
  const complete = titles.filter((title) => !TRUNCATED.test(title));
  const pool = complete.length > 0 ? complete : titles;
  return pool.reduce<string | undefined>(
    (best, title) => (best === undefined || title.length > best.length ? title : best),
    undefined
  );
};

/**
 * A consistent structured-data result goes first; an inconsistent one is
 * demoted behind every heuristic result. Other results keep their order.
 */
export const orderByPrecedence = (results: readonly StrategyResult[]): StrategyResult[] => {
  const isStructured = (result: StrategyResult) => result.strategy === 'structured-data';
  return [
    ...results.filter((result) => isStructured(result) && result.consistent),
    ...results.filter((result) => !isStructured(result)),
    ...results.filter((result) => isStructured(result) && !result.consistent)
  ];
};

const candidateKey = (candidate: PriceCandidate): string =>
  `${candidate.source}|${candidate.currency ?? ''}|${String(candidate.raw)}`;

const hasVisiblePrice = (result: StrategyResult): boolean =>
  result.evidence.priceCandidates.some((candidate) => candidate.source === 'visible-price-element');

/**
 * Price candidates from all results, pooled for the price engine. Once a
 * consistent result has offered a visible price, visible prices from the
 * results behind it are left out.
 */
export const poolPriceCandidates = (ordered: readonly StrategyResult[]): PriceCandidate[] => {
  const seen = new Set<string>();
  const pooled: PriceCandidate[] = [];
  let visibleSettled = false;

  for (const result of ordered) {
    for (const candidate of result.evidence.priceCandidates) {
      if (visibleSettled && candidate.source === 'visible-price-element') {
        continue;
      }
      const key = candidateKey(candidate);
      if (!seen.has(key)) {
        seen.add(key);
        pooled.push(candidate);
      }
    }
    if (result.consistent && hasVisiblePrice(result)) {
      visibleSettled = true;
    }
  }
  return pooled;
};

/** Every field comes from the highest-precedence result that has it. */
export const mergeStrategyResults = (results: readonly StrategyResult[]): MergedEvidence => {
  const ordered = orderByPrecedence(results);
  const first = <T>(pick: (result: StrategyResult) => T | undefined): T | undefined => {
    for (const result of ordered) {
      const value = pick(result);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  };
  const nonEmpty = <T>(values: readonly T[]): readonly T[] | undefined => (values.length > 0 ? values : undefined);

  const priceCandidates = poolPriceCandidates(ordered);

  return {
    title: first((result) => pickTitle(result.evidence.titles)),
    priceCandidates,
    images: first((result) => nonEmpty(result.evidence.images)) ?? [],
    description: first((result) => result.evidence.description || undefined),
    reviews: first((result) => nonEmpty(result.evidence.reviews)) ?? [],
    brand: first((result) => result.evidence.brand),
    sku: first((result) => result.evidence.sku),
    strategies: ordered.map((result) => result.strategy)
  };
};
