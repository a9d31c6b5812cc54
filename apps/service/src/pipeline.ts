import pLimit from 'p-limit';

import {
  AnswerGenerationFailure,
  EmbeddingFailure,
  IndexFailure,
  describeError,
  isShopScoutError,
  type ProductRecord,
  type ShopScoutErrorKind
} from '@shopscout/core';
import { extractProductRecord } from '@shopscout/extractor';
import type { RecordStore } from '@shopscout/record-store';

import type { PageFetcher } from './fetcher.js';
import type { ProductIndexer, ReindexResult } from './indexing/product-indexer.js';
import { silentLogger, type ServiceLogger } from './logger.js';
import { COULD_NOT_ANSWER_MESSAGE, type AnswerResult, type QaEngine } from './qa.js';
import type { ProductSearch, SearchOptions } from './search.js';

export type CandidateStage = 'fetch' | 'extract' | 'store';

export interface CandidateFailure {
  readonly sourceUrl: string;
  readonly stage: CandidateStage;
  readonly kind: ShopScoutErrorKind | 'unexpected';
  readonly message: string;
}

export interface PipelineWarning {
  readonly sourceUrl: string;
  readonly kind: 'embedding' | 'index';
  readonly message: string;
}

export interface PipelineProduct {
  /** Position of the URL in the search results. */
  readonly position: number;
  readonly record: ProductRecord;
  readonly indexed: boolean;
}

export type PipelineStatus = 'ok' | 'empty' | 'cancelled';

export interface PipelineResult {
  readonly query: string;
  readonly status: PipelineStatus;
  readonly candidates: readonly string[];
  readonly products: readonly PipelineProduct[];
  readonly failures: readonly CandidateFailure[];
  readonly warnings: readonly PipelineWarning[];
}

export interface RunOptions extends SearchOptions {
  readonly signal?: AbortSignal;
}

export interface IngestResult {
  readonly record: ProductRecord;
  readonly indexed: boolean;
  readonly warning?: PipelineWarning;
}

export interface AskOptions {
  /** Retrieval query; defaults to the question itself. */
  readonly productQuery?: string;
  /** Answer from these stored records instead of semantic search. */
  readonly urls?: readonly string[];
  readonly topK?: number;
}

export interface AskResult extends AnswerResult {
  readonly records: readonly ProductRecord[];
}

export interface ShoppingPipelineOptions {
  readonly search: ProductSearch;
  readonly fetcher: PageFetcher;
  readonly store: RecordStore;
  readonly indexer: ProductIndexer;
  readonly qa: QaEngine;
  readonly concurrency: number;
  readonly defaultCurrency?: string;
  readonly logger?: ServiceLogger;
  readonly now?: () => Date;
}

type CandidateOutcome =
  | { readonly kind: 'product'; readonly product: PipelineProduct; readonly warning?: PipelineWarning }
  | { readonly kind: 'failure'; readonly failure: CandidateFailure }
  | { readonly kind: 'cancelled' };

class CandidateError extends Error {
  constructor(
    readonly stage: CandidateStage,
    readonly original: unknown
  ) {
    super(describeError(original));
  }
}

const toWarning = (sourceUrl: string, error: EmbeddingFailure | IndexFailure): PipelineWarning => ({
  sourceUrl,
  kind: error.kind,
  message: error.message
});

/**
 * Interactive query pipeline: search, then fetch and extract every candidate
 * concurrently, persist raw page and record, and index the record. Indexing
 * of stored records is also available on its own through
 * `reindexStoredRecords`, which reads only from the record store.
 */
export class ShoppingPipeline {
  private readonly logger: ServiceLogger;
  private readonly now: () => Date;

  constructor(private readonly options: ShoppingPipelineOptions) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async run(query: string, options: RunOptions = {}): Promise<PipelineResult> {
    const { signal, ...searchOptions } = options;
    const cancelled = (candidates: readonly string[]): PipelineResult => ({
      query,
      status: 'cancelled',
      candidates,
      products: [],
      failures: [],
      warnings: []
    });

    if (signal?.aborted) {
      return cancelled([]);
    }

    const candidates = await this.options.search.search(query, searchOptions);
    this.logger.info('Search returned candidates', { query, candidates: candidates.length });
    if (signal?.aborted) {
      return cancelled(candidates);
    }

    const limit = pLimit(Math.max(1, this.options.concurrency));
    const outcomes = await Promise.all(
      candidates.map((url, position) => limit(() => this.processCandidate(url, position, signal)))
    );

    if (signal?.aborted) {
      this.logger.info('Query pipeline cancelled', { query });
      return cancelled(candidates);
    }

    const products: PipelineProduct[] = [];
    const failures: CandidateFailure[] = [];
    const warnings: PipelineWarning[] = [];
    for (const outcome of outcomes) {
      if (outcome.kind === 'product') {
        products.push(outcome.product);
        if (outcome.warning) {
          warnings.push(outcome.warning);
        }
      } else if (outcome.kind === 'failure') {
        failures.push(outcome.failure);
      }
    }

    const status: PipelineStatus = products.length === 0 ? 'empty' : 'ok';
    this.logger.info('Query pipeline finished', {
      query,
      status,
      products: products.length,
      failures: failures.length,
      warnings: warnings.length
    });
    return { query, status, candidates, products, failures, warnings };
  }

  /** Fetches, extracts, stores and indexes one URL. Fetch and extraction errors propagate. */
  async ingestUrl(url: string, options: { readonly signal?: AbortSignal } = {}): Promise<IngestResult> {
    let record: ProductRecord;
    try {
      record = await this.collect(url, options.signal);
    } catch (error) {
      throw error instanceof CandidateError ? error.original : error;
    }
    const warning = await this.indexRecord(record);
    return { record, indexed: warning === undefined, warning };
  }

  async ask(question: string, options: AskOptions = {}): Promise<AskResult> {
    let records: ProductRecord[];
    try {
      records = await this.retrieve(question, options);
    } catch (error) {
      if (!(error instanceof EmbeddingFailure || error instanceof IndexFailure)) {
        throw error;
      }
      this.logger.error('Product retrieval failed', { reason: error.message });
      return {
        status: 'failed',
        answer: COULD_NOT_ANSWER_MESSAGE,
        sources: [],
        records: [],
        error: new AnswerGenerationFailure(`Could not retrieve products: ${error.message}`, { cause: error })
      };
    }

    const result = await this.options.qa.answer({ question, records });
    return { ...result, records };
  }

  async reindexStoredRecords(): Promise<ReindexResult> {
    const records = await this.options.store.list();
    this.logger.info('Reindexing stored records', { records: records.length });
    return this.options.indexer.reindex(records);
  }

  private async retrieve(question: string, options: AskOptions): Promise<ProductRecord[]> {
    if (options.urls && options.urls.length > 0) {
      const stored = await Promise.all(options.urls.map((url) => this.options.store.getRecord(url)));
      return stored.filter((record): record is ProductRecord => record !== undefined);
    }
    const matches = await this.options.indexer.search(options.productQuery ?? question, options.topK ?? 3);
    return matches.map((match) => match.record);
  }

  private async processCandidate(url: string, position: number, signal?: AbortSignal): Promise<CandidateOutcome> {
    if (signal?.aborted) {
      return { kind: 'cancelled' };
    }

    let record: ProductRecord;
    try {
      record = await this.collect(url, signal);
    } catch (error) {
      if (signal?.aborted) {
        return { kind: 'cancelled' };
      }
      const stage = error instanceof CandidateError ? error.stage : 'extract';
      const original = error instanceof CandidateError ? error.original : error;
      const failure: CandidateFailure = {
        sourceUrl: url,
        stage,
        kind: isShopScoutError(original) ? original.kind : 'unexpected',
        message: describeError(original)
      };
      this.logger.warn('Dropping candidate', { ...failure });
      return { kind: 'failure', failure };
    }

    if (signal?.aborted) {
      return { kind: 'cancelled' };
    }

    const warning = await this.indexRecord(record);
    return { kind: 'product', product: { position, record, indexed: warning === undefined }, warning };
  }

  private async collect(url: string, signal?: AbortSignal): Promise<ProductRecord> {
    const page = await this.options.fetcher.fetchPage(url, { signal }).catch((error: unknown) => {
      throw new CandidateError('fetch', error);
    });
    if (signal?.aborted) {
      throw new CandidateError('fetch', signal.reason);
    }

    const stored = await this.options.store.savePage(url, page.html).catch((error: unknown) => {
      throw new CandidateError('store', error);
    });

    let record: ProductRecord;
    try {
      record = extractProductRecord(page.html, url, {
        now: this.now,
        rawSnapshotRef: stored.ref,
        defaultCurrency: this.options.defaultCurrency
      });
    } catch (error) {
      throw new CandidateError('extract', error);
    }

    await this.options.store.saveRecord(record).catch((error: unknown) => {
      throw new CandidateError('store', error);
    });
    this.logger.debug('Stored product record', { sourceUrl: url, priceConfidence: record.priceConfidence });
    return record;
  }

  private async indexRecord(record: ProductRecord): Promise<PipelineWarning | undefined> {
    try {
      await this.options.indexer.index(record);
      return undefined;
    } catch (error) {
      if (!(error instanceof EmbeddingFailure || error instanceof IndexFailure)) {
        throw error;
      }
      const warning = toWarning(record.sourceUrl, error);
      this.logger.warn('Record stored but not indexed', { ...warning });
      return warning;
    }
  }
}

/**
 * Holds at most one running query: submitting a new one aborts the previous
 * run, whose result then resolves as `cancelled`.
 */
export class QuerySession {
  private current: AbortController | undefined;

  constructor(private readonly pipeline: Pick<ShoppingPipeline, 'run'>) {}

  submit(query: string, options: SearchOptions = {}): Promise<PipelineResult> {
    this.current?.abort();
    const controller = new AbortController();
    this.current = controller;

    return this.pipeline.run(query, { ...options, signal: controller.signal }).finally(() => {
      if (this.current === controller) {
        this.current = undefined;
      }
    });
  }

  cancel(): void {
    this.current?.abort();
    this.current = undefined;
  }

  get active(): boolean {
    return this.current !== undefined;
  }
}
