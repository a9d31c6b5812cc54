import type { ProductRecord } from '@shopscout/core';

export interface StoredPage {
  readonly key: string;
  readonly sourceUrl: string;
  /** Path relative to the store root, suitable for `ProductRecord.rawSnapshotRef`. */
  readonly ref: string;
}

export interface RecordStoreLogger {
  warn(message: string, args?: Record<string, unknown>): void;
}

export interface RecordStore {
  savePage(sourceUrl: string, html: string): Promise<StoredPage>;
  readPage(sourceUrl: string): Promise<string | undefined>;
  /** Replaces any record previously stored for the same `sourceUrl`. */
  saveRecord(record: ProductRecord): Promise<void>;
  getRecord(sourceUrl: string): Promise<ProductRecord | undefined>;
  list(): Promise<readonly ProductRecord[]>;
}
