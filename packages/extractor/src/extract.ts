import { load } from 'cheerio';

import {
  ExtractionFailure,
  HttpUrlSchema,
  createProductRecord,
  selectTrustedPrice,
  type CurrencyCode,
  type PriceSelection,
  type ProductRecord
} from '@shopscout/core';

import { mergeStrategyResults, type MergedEvidence } from './merge.js';
import { genericHeuristicStrategy } from './strategies/generic-heuristic.js';
import { siteProfileStrategy } from './strategies/site-profile.js';
import { structuredDataStrategy } from './strategies/structured-data.js';
import type { ExtractionStrategy, StrategyResult } from './types.js';

export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  structuredDataStrategy,
  siteProfileStrategy,
  genericHeuristicStrategy
];

export interface ExtractOptions {
  readonly now?: () => Date;
  /** Store reference of the raw HTML this record was built from. */
  readonly rawSnapshotRef?: string;
  readonly defaultCurrency?: CurrencyCode;
  readonly maxReviews?: number;
  readonly maxImages?: number;
  readonly strategies?: readonly ExtractionStrategy[];
}

export interface ExtractionReport {
  readonly evidence: MergedEvidence;
  readonly selection: PriceSelection;
  readonly results: readonly StrategyResult[];
}

const parseSourceUrl = (sourceUrl: string): URL => {
  const parsed = HttpUrlSchema.safeParse(sourceUrl);
  if (!parsed.success) {
    throw new ExtractionFailure(`Cannot extract from "${sourceUrl}": not an absolute http(s) URL`, {
      subject: sourceUrl
    });
  }
  return new URL(parsed.data);
};

/**
 * Runs every strategy over the page and merges their evidence without
 * building a record. Useful for inspecting why a field was chosen.
 */
export function inspectProductPage(html: string, sourceUrl: string, options: ExtractOptions = {}): ExtractionReport {
  const url = parseSourceUrl(sourceUrl);
  const $ = load(html);
  const context = { $, sourceUrl: url.toString(), host: url.hostname };

  const results = (options.strategies ?? DEFAULT_STRATEGIES).flatMap((strategy) => {
    const result = strategy.extract(context);
    return result ? [result] : [];
  });
  const evidence = mergeStrategyResults(results);
  const selection = selectTrustedPrice(evidence.priceCandidates, {
    defaultCurrency: options.defaultCurrency ?? 'INR'
  });

  return { evidence, selection, results };
}

/**
 * Normalizes one fetched product page into a `ProductRecord`.
 *
 * A page without any price signal still yields a record (price `unknown`);
 * only a page with neither a title nor a price candidate is rejected with an
 * `ExtractionFailure`. The same HTML and URL always produce records that are
 * equal apart from `extractedAt`.
 */
export function extractProductRecord(html: string, sourceUrl: string, options: ExtractOptions = {}): ProductRecord {
  const { evidence, selection } = inspectProductPage(html, sourceUrl, options);

  if (evidence.title === undefined && evidence.priceCandidates.length === 0) {
    throw new ExtractionFailure(`No product title or price found at ${sourceUrl}`, { subject: sourceUrl });
  }

  const now = options.now ?? (() => new Date());

  return createProductRecord({
    sourceUrl,
    title: evidence.title,
    selection,
    images: evidence.images,
    description: evidence.description,
    reviews: evidence.reviews,
    brand: evidence.brand,
    sku: evidence.sku,
    rawSnapshotRef: options.rawSnapshotRef,
    extractedAt: now(),
    maxReviews: options.maxReviews,
    maxImages: options.maxImages ?? 12
  });
}
