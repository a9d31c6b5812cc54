import { mkdir, readFile, readdir, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { describeError, parseProductRecord, type ProductRecord } from '@shopscout/core';

import { storageKeyFor } from './keys.js';
import type { RecordStore, RecordStoreLogger, StoredPage } from './types.js';

const PAGES_DIRECTORY = 'pages';
const PRODUCTS_DIRECTORY = 'products';

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export interface LocalFileSystemRecordStoreOptions {
  readonly directory: string;
  /** Told about record files `list()` had to skip. */
  readonly logger?: RecordStoreLogger;
}

/**
 * Keeps raw pages under `<directory>/pages/<key>.html` and normalized records
 * under `<directory>/products/<key>.json`. Writes go through a temporary file
 * and a rename, so readers never observe a half-written record.
 */
export class LocalFileSystemRecordStore implements RecordStore {
  private readonly directory: string;
  private readonly logger?: RecordStoreLogger;
  private ready?: Promise<void>;
  private writeCounter = 0;

  constructor(options: LocalFileSystemRecordStoreOptions) {
    this.directory = options.directory;
    this.logger = options.logger;
  }

  /** Creates the store directories on first use; a failed attempt is retried by the next call. */
  private ensureDirectories(): Promise<void> {
    if (!this.ready) {
      this.ready = Promise.all([
        mkdir(join(this.directory, PAGES_DIRECTORY), { recursive: true }),
        mkdir(join(this.directory, PRODUCTS_DIRECTORY), { recursive: true })
      ]).then(
        () => undefined,
        (error: unknown) => {
          this.ready = undefined;
          throw error;
        }
      );
    }
    return this.ready;
  }

  async savePage(sourceUrl: string, html: string): Promise<StoredPage> {
    await this.ensureDirectories();
    const key = storageKeyFor(sourceUrl);
    const ref = `${PAGES_DIRECTORY}/${key}.html`;
    await this.writeAtomically(join(this.directory, ref), html);
    return { key, sourceUrl, ref };
  }

  async readPage(sourceUrl: string): Promise<string | undefined> {
    await this.ensureDirectories();
    return this.readOptional(join(this.directory, PAGES_DIRECTORY, `${storageKeyFor(sourceUrl)}.html`));
  }

  async saveRecord(record: ProductRecord): Promise<void> {
    await this.ensureDirectories();
    const validated = parseProductRecord(record);
    const filePath = join(this.directory, PRODUCTS_DIRECTORY, `${storageKeyFor(validated.sourceUrl)}.json`);
    await this.writeAtomically(filePath, `${JSON.stringify(validated, null, 2)}\n`);
  }

  async getRecord(sourceUrl: string): Promise<ProductRecord | undefined> {
    await this.ensureDirectories();
    return this.readRecord(`${storageKeyFor(sourceUrl)}.json`);
  }

  /** Every readable record; files that fail to read or validate are skipped. */
  async list(): Promise<readonly ProductRecord[]> {
    await this.ensureDirectories();
    const entries = await readdir(join(this.directory, PRODUCTS_DIRECTORY), { withFileTypes: true });
    const records: ProductRecord[] = [];

    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith('.json')) {
        continue;
      }

      try {
        const record = await this.readRecord(entry.name);
        if (record) {
          records.push(record);
        }
      } catch (error) {
        this.logger?.warn('Skipping unreadable product record', { file: entry.name, reason: describeError(error) });
      }
    }

    return records.sort(
      (a, b) => a.extractedAt.localeCompare(b.extractedAt) || a.sourceUrl.localeCompare(b.sourceUrl)
    );
  }

  private async readRecord(fileName: string): Promise<ProductRecord | undefined> {
    const raw = await this.readOptional(join(this.directory, PRODUCTS_DIRECTORY, fileName));
    if (raw === undefined) {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Invalid product record in ${fileName}`, { cause: error });
    }
    return parseProductRecord(parsed);
  }

  private async readOptional(filePath: string): Promise<string | undefined> {
    try {
      return await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }
  }

  private async writeAtomically(filePath: string, contents: string): Promise<void> {
    this.writeCounter += 1;
    const temporaryPath = `${filePath}.${process.pid}.${this.writeCounter}.tmp`;
    await writeFile(temporaryPath, contents, 'utf-8');
    await rename(temporaryPath, filePath);
  }
}
