import { LibSQLVector } from '@mastra/libsql';

import { cosineSimilarity } from './embedder.js';

export type VectorMetadata = Record<string, unknown>;

export interface VectorEntry {
  readonly id: string;
  readonly vector: readonly number[];
  readonly metadata: VectorMetadata;
}

export interface VectorMatch {
  readonly id: string;
  readonly score: number;
  readonly metadata?: VectorMetadata;
}

/** Key-addressed vector storage; `upsert` replaces entries with the same id. */
export interface VectorIndex {
  upsert(entries: readonly VectorEntry[]): Promise<void>;
  query(vector: readonly number[], topK: number): Promise<VectorMatch[]>;
}

export const PRODUCT_INDEX_NAME = 'shopscout_products';

export interface LibSqlVectorIndexOptions {
  readonly url: string;
  readonly authToken?: string;
  readonly dimension: number;
  readonly indexName?: string;
}

export class LibSqlVectorIndex implements VectorIndex {
  private readonly store: LibSQLVector;
  private readonly indexName: string;
  private ready: Promise<void> | undefined;

  constructor(private readonly options: LibSqlVectorIndexOptions) {
    this.store = new LibSQLVector({ connectionUrl: options.url, authToken: options.authToken });
    this.indexName = options.indexName ?? PRODUCT_INDEX_NAME;
  }

  async upsert(entries: readonly VectorEntry[]): Promise<void> {
    if (entries.length === 0) {
      return;
    }
    await this.ensureIndex();
    await this.store.upsert({
      indexName: this.indexName,
      ids: entries.map((entry) => entry.id),
      vectors: entries.map((entry) => [...entry.vector]),
      metadata: entries.map((entry) => entry.metadata)
    });
  }

  async query(vector: readonly number[], topK: number): Promise<VectorMatch[]> {
    await this.ensureIndex();
    const results = await this.store.query({
      indexName: this.indexName,
      queryVector: [...vector],
      topK
    });
    return results.map((result) => ({ id: result.id, score: result.score, metadata: result.metadata }));
  }

  private ensureIndex(): Promise<void> {
    if (!this.ready) {
      this.ready = this.store
        .createIndex({ indexName: this.indexName, dimension: this.options.dimension, metric: 'cosine' })
        .catch((error: unknown) => {
          this.ready = undefined;
          throw error;
        });
    }
    return this.ready;
  }
}

/** Process-local index used by tests and by `SHOPSCOUT_VECTOR_URL=memory`. */
export class InMemoryVectorIndex implements VectorIndex {
  private readonly entries = new Map<string, VectorEntry>();

  async upsert(entries: readonly VectorEntry[]): Promise<void> {
    for (const entry of entries) {
      this.entries.set(entry.id, { id: entry.id, vector: [...entry.vector], metadata: { ...entry.metadata } });
    }
  }

  async query(vector: readonly number[], topK: number): Promise<VectorMatch[]> {
    return [...this.entries.values()]
      .map((entry) => ({ id: entry.id, score: cosineSimilarity(vector, entry.vector), metadata: entry.metadata }))
      .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
      .slice(0, Math.max(0, topK));
  }

  get size(): number {
    return this.entries.size;
  }
}
