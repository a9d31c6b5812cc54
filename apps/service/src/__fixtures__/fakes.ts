import { createProductRecord, type ProductRecord } from '@shopscout/core';

import type { Embedder } from '../indexing/embedder.js';
import type { ProductSearch, SearchOptions } from '../search.js';

export const FAKE_EMBEDDING_DIMENSION = 64;

const bucketFor = (token: string): number => {
  let hash = 0;
  for (const char of token) {
    hash = (hash * 31 + char.charCodeAt(0)) % 1_000_003;
  }
  return hash % FAKE_EMBEDDING_DIMENSION;
};

/** Bag-of-words embedder: texts sharing words land close together. */
export class HashingEmbedder implements Embedder {
  readonly calls: string[] = [];

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const vector = new Array<number>(FAKE_EMBEDDING_DIMENSION).fill(0);
    for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      const bucket = bucketFor(token);
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }
    return vector;
  }
}

export interface SampleRecordOptions {
  readonly amount?: number;
  readonly description?: string;
  readonly extractedAt?: string;
}

export const sampleRecord = (sourceUrl: string, title: string, options: SampleRecordOptions = {}): ProductRecord =>
  createProductRecord({
    sourceUrl,
    title,
    selection:
      options.amount === undefined
        ? { confidence: 'unknown', candidatesConsidered: 0 }
        : {
            price: { amount: options.amount, currencyCode: 'INR', precision: 2 },
            confidence: 'high',
            source: 'structured-metadata',
            candidatesConsidered: 1
          },
    description: options.description,
    extractedAt: new Date(options.extractedAt ?? '2026-03-01T08:00:00.000Z')
  });

/** Search stand-in with canned results; a query listed in `gates` waits for its promise. */
export class StaticSearch implements ProductSearch {
  readonly queries: string[] = [];

  constructor(
    private readonly results: Readonly<Record<string, readonly string[]>>,
    private readonly gates: Readonly<Record<string, Promise<void>>> = {}
  ) {}

  async search(query: string, _options?: SearchOptions): Promise<readonly string[]> {
    this.queries.push(query);
    await this.gates[query];
    return this.results[query] ?? [];
  }
}
