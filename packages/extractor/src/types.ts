import type { CheerioAPI } from 'cheerio';

import type { PriceCandidate, Review } from '@shopscout/core';

export type StrategyTag = 'structured-data' | 'site-profile' | 'generic-heuristic';

/**
 * Everything one strategy found on a page. Title candidates keep discovery
 * order; the merge step decides which one wins.
 */
export interface ProductEvidence {
  readonly titles: readonly string[];
  readonly priceCandidates: readonly PriceCandidate[];
  readonly images: readonly string[];
  readonly description?: string;
  readonly reviews: readonly Review[];
  readonly brand?: string;
  readonly sku?: string;
}

export interface StrategyResult {
  readonly strategy: StrategyTag;
  readonly evidence: ProductEvidence;
  /**
   * Whether the strategy produced a self-consistent description of the
   * product. Inconsistent results only fill gaps left by the others.
   */
  readonly consistent: boolean;
}

export interface ExtractionContext {
  readonly $: CheerioAPI;
  readonly sourceUrl: string;
  readonly host: string;
}

export interface ExtractionStrategy {
  readonly tag: StrategyTag;
  extract(context: ExtractionContext): StrategyResult | undefined;
}

export const emptyEvidence = (): ProductEvidence => ({
  titles: [],
  priceCandidates: [],
  images: [],
  reviews: []
});
