import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createProductRecord, recordsEqual, type ProductRecord } from '@shopscout/core';

import { storageKeyFor } from './keys.js';
import { LocalFileSystemRecordStore } from './local-file-system.js';

const buildRecord = (sourceUrl: string, amount: number, extractedAt: string): ProductRecord =>
  createProductRecord({
    sourceUrl,
    title: 'Steelbrew Electric Kettle',
    selection: {
      price: { amount, currencyCode: 'INR', precision: 2 },
      confidence: 'high',
      source: 'structured-metadata',
      candidatesConsidered: 1
    },
    images: ['https://cdn.homecart.example/kettle/1.jpg'],
    extractedAt: new Date(extractedAt)
  });

describe('storageKeyFor', () => {
  it('builds a readable slug with a short digest', () => {
    const key = storageKeyFor('https://www.homecart.example/kettles/steelbrew-1-5l?ref=home');

    expect(key).toMatch(/^homecart-example-kettles-steelbrew-1-5l-[0-9a-f]{10}$/);
  });

  it('keeps URLs that slug alike apart', () => {
    expect(storageKeyFor('https://shop.example.com/p/1?size=s')).not.toBe(
      storageKeyFor('https://shop.example.com/p/1?size=m')
    );
  });

  it('ignores the fragment', () => {
    expect(storageKeyFor('https://shop.example.com/p/1#reviews')).toBe(storageKeyFor('https://shop.example.com/p/1'));
  });
});

describe('LocalFileSystemRecordStore', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'record-store-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('stores raw pages under pages/ and returns a snapshot reference', async () => {
    const store = new LocalFileSystemRecordStore({ directory });
    const url = 'https://www.homecart.example/kettles/steelbrew-1-5l';

    const page = await store.savePage(url, '<html><h1>Kettle</h1></html>');

    expect(page.ref).toBe(`pages/${storageKeyFor(url)}.html`);
    expect(await readFile(join(directory, page.ref), 'utf-8')).toBe('<html><h1>Kettle</h1></html>');
    expect(await store.readPage(url)).toBe('<html><h1>Kettle</h1></html>');
    expect(await store.readPage('https://www.homecart.example/missing')).toBeUndefined();
  });

  it('round-trips records and overwrites on re-save', async () => {
    const store = new LocalFileSystemRecordStore({ directory });
    const url = 'https://www.homecart.example/kettles/steelbrew-1-5l';

    await store.saveRecord(buildRecord(url, 2499, '2026-01-01T00:00:00.000Z'));
    await store.saveRecord(buildRecord(url, 2299, '2026-01-02T00:00:00.000Z'));

    const stored = await store.getRecord(url);
    expect(stored?.price?.amount).toBe(2299);
    expect(stored && recordsEqual(stored, buildRecord(url, 2299, '2026-01-05T00:00:00.000Z'))).toBe(true);
    expect(Object.isFrozen(stored)).toBe(true);

    const files = await readdir(join(directory, 'products'));
    expect(files).toEqual([`${storageKeyFor(url)}.json`]);
  });

  it('lists records ordered by extraction time', async () => {
    const store = new LocalFileSystemRecordStore({ directory });

    await store.saveRecord(buildRecord('https://shop.example.com/p/b', 300, '2026-01-03T00:00:00.000Z'));
    await store.saveRecord(buildRecord('https://shop.example.com/p/a', 200, '2026-01-01T00:00:00.000Z'));

    const records = await store.list();
    expect(records.map((record) => record.sourceUrl)).toEqual([
      'https://shop.example.com/p/a',
      'https://shop.example.com/p/b'
    ]);
  });

  it('returns undefined for unknown records and rejects corrupted files', async () => {
    const store = new LocalFileSystemRecordStore({ directory });
    expect(await store.getRecord('https://shop.example.com/p/none')).toBeUndefined();

    const url = 'https://shop.example.com/p/broken';
    await writeFile(join(directory, 'products', `${storageKeyFor(url)}.json`), '{not json', 'utf-8');

    await expect(store.getRecord(url)).rejects.toThrow('Invalid product record');
  });

  it('keys a page fetched with a fragment like its record', async () => {
    const store = new LocalFileSystemRecordStore({ directory });

    const page = await store.savePage('https://shop.example.com/p/1#reviews', '<html></html>');
    await store.saveRecord(buildRecord('https://shop.example.com/p/1', 450, '2026-01-01T00:00:00.000Z'));

    expect(page.ref).toBe(`pages/${storageKeyFor('https://shop.example.com/p/1')}.html`);
    expect(await store.readPage('https://shop.example.com/p/1')).toBe('<html></html>');
  });

  it('skips unreadable record files when listing', async () => {
    const warn = vi.fn();
    const store = new LocalFileSystemRecordStore({ directory, logger: { warn } });
    await store.saveRecord(buildRecord('https://shop.example.com/p/a', 200, '2026-01-01T00:00:00.000Z'));
    await writeFile(join(directory, 'products', 'zz-broken.json'), '{not json', 'utf-8');
    await writeFile(join(directory, 'products', 'zz-partial.json'), '{"sourceUrl":"https://shop.example.com/p/z"}', 'utf-8');

    const records = await store.list();

    expect(records.map((record) => record.sourceUrl)).toEqual(['https://shop.example.com/p/a']);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith('Skipping unreadable product record', {
      file: 'zz-broken.json',
      reason: 'Invalid product record in zz-broken.json'
    });
    expect(warn).toHaveBeenCalledWith(
      'Skipping unreadable product record',
      expect.objectContaining({ file: 'zz-partial.json' })
    );
  });

  it('reports an unusable directory from the first call instead of on construction', async () => {
    const blocker = join(directory, 'blocker');
    await writeFile(blocker, 'not a directory', 'utf-8');

    const store = new LocalFileSystemRecordStore({ directory: join(blocker, 'data') });

    await expect(store.list()).rejects.toThrow('ENOTDIR');
    await expect(store.getRecord('https://shop.example.com/p/a')).rejects.toThrow('ENOTDIR');
  });
});
