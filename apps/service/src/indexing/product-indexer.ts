import {
  EmbeddingFailure,
  IndexFailure,
  ProductRecordSchema,
  describeError,
  formatPrice,
  parseProductRecord,
  type ProductRecord
} from '@shopscout/core';

import { silentLogger, type ServiceLogger } from '../logger.js';
import type { Embedder } from './embedder.js';
import type { VectorIndex, VectorMatch } from './vector-index.js';

const MAX_EVIDENCE_REVIEWS = 5;

/** Text embedded for a record: only fields the record itself carries. */
export const evidenceTextFor = (record: ProductRecord): string => {
  const lines = [record.title];
  if (record.brand) {
    lines.push(`Brand: ${record.brand}`);
  }
  lines.push(`Price: ${formatPrice(record)}`);
  if (record.description) {
    lines.push(record.description);
  }
  for (const review of record.reviews.slice(0, MAX_EVIDENCE_REVIEWS)) {
    lines.push(`Review: ${review.text}`);
  }
  return lines.join('\n');
};

export interface RetrievedProduct {
  readonly record: ProductRecord;
  readonly score: number;
}

export interface ReindexFailure {
  readonly sourceUrl: string;
  readonly error: EmbeddingFailure | IndexFailure;
}

export interface ReindexResult {
  readonly indexed: number;
  readonly failures: readonly ReindexFailure[];
}

export interface ProductIndexerOptions {
  readonly embedder: Embedder;
  readonly index: VectorIndex;
  /** Expected embedding length; vectors of another length are rejected. */
  readonly dimension?: number;
  readonly logger?: ServiceLogger;
}

export class ProductIndexer {
  private readonly logger: ServiceLogger;

  constructor(private readonly options: ProductIndexerOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /** Embeds the record and writes vector and record together, keyed by source URL. */
  async index(record: ProductRecord): Promise<void> {
    const vector = await this.embed(evidenceTextFor(record), record.sourceUrl);
    try {
      await this.options.index.upsert([{ id: record.sourceUrl, vector, metadata: { ...record } }]);
    } catch (error) {
      throw new IndexFailure(`Failed to index ${record.sourceUrl}: ${describeError(error)}`, {
        subject: record.sourceUrl,
        cause: error
      });
    }
  }

  async search(query: string, topK = 3): Promise<RetrievedProduct[]> {
    const vector = await this.embed(query);
    let matches: VectorMatch[];
    try {
      matches = await this.options.index.query(vector, topK);
    } catch (error) {
      throw new IndexFailure(`Vector search failed: ${describeError(error)}`, { cause: error });
    }

    const products: RetrievedProduct[] = [];
    for (const match of matches) {
      const parsed = ProductRecordSchema.safeParse(match.metadata);
      if (!parsed.success) {
        this.logger.warn('Skipping index entry without a valid product record', { id: match.id });
        continue;
      }
      products.push({ record: parseProductRecord(parsed.data), score: match.score });
    }
    return products;
  }

  /** Re-embeds every record; one failing record does not stop the rest. */
  async reindex(records: readonly ProductRecord[]): Promise<ReindexResult> {
    const failures: ReindexFailure[] = [];
    let indexed = 0;

    for (const record of records) {
      try {
        await this.index(record);
        indexed += 1;
      } catch (error) {
        if (!(error instanceof EmbeddingFailure || error instanceof IndexFailure)) {
          throw error;
        }
        this.logger.warn('Failed to reindex product', { sourceUrl: record.sourceUrl, reason: error.message });
        failures.push({ sourceUrl: record.sourceUrl, error });
      }
    }

    this.logger.info('Reindex finished', { indexed, failed: failures.length });
    return { indexed, failures };
  }

  private async embed(text: string, subject?: string): Promise<number[]> {
    let vector: number[];
    try {
      vector = await this.options.embedder.embed(text);
    } catch (error) {
      throw new EmbeddingFailure(`Embedding failed: ${describeError(error)}`, { subject, cause: error });
    }

    const expected = this.options.dimension;
    if (expected !== undefined && vector.length !== expected) {
      throw new EmbeddingFailure(`Embedding has ${vector.length} dimensions, expected ${expected}`, { subject });
    }
    return vector;
  }
}
