import { readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { HttpUrlSchema, PriceConfidenceSchema, PriceSourceSchema } from '@shopscout/core';

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURE_ROOT = resolve(__dirname, '../../../fixtures');

const ExpectedExtractionSchema = z
  .object({
    title: z.string().min(1).optional(),
    price: z.object({ amount: z.number().positive(), currencyCode: z.string().length(3) }).strict().optional(),
    priceConfidence: PriceConfidenceSchema.optional(),
    priceSource: PriceSourceSchema.optional(),
    images: z.array(HttpUrlSchema).optional(),
    description: z.string().optional(),
    reviewCount: z.number().int().min(0).optional(),
    brand: z.string().optional(),
    sku: z.string().optional(),
    extractionFails: z.boolean().default(false)
  })
  .strict();

const FixtureEntrySchema = z
  .object({
    id: z.string().min(1),
    file: z.string().min(1),
    sourceUrl: HttpUrlSchema,
    expected: ExpectedExtractionSchema
  })
  .strict();

export type ExpectedExtraction = z.infer<typeof ExpectedExtractionSchema>;

export interface ProductPageFixture {
  readonly id: string;
  readonly path: string;
  readonly sourceUrl: string;
  readonly html: string;
  readonly expected: ExpectedExtraction;
}

let cachedFixtures: readonly ProductPageFixture[] | undefined;

const memoizeFixtures = (): readonly ProductPageFixture[] => {
  if (cachedFixtures) {
    return cachedFixtures;
  }

  const manifest = z
    .array(FixtureEntrySchema)
    .parse(JSON.parse(readFileSync(join(FIXTURE_ROOT, 'manifest.json'), 'utf-8')));

  cachedFixtures = Object.freeze(
    manifest.map((entry) => {
      const path = join(FIXTURE_ROOT, entry.file);
      return Object.freeze({
        id: entry.id,
        path,
        sourceUrl: entry.sourceUrl,
        html: readFileSync(path, 'utf-8'),
        expected: entry.expected
      });
    })
  );

  return cachedFixtures;
};

export const listProductPageFixtures = (): readonly ProductPageFixture[] => memoizeFixtures();

export const loadProductPageFixture = (id: string): ProductPageFixture => {
  const fixture = memoizeFixtures().find((entry) => entry.id === id);
  if (!fixture) {
    throw new Error(`Unknown product page fixture: ${id}`);
  }
  return fixture;
};

export const getFixtureRoot = (): string => FIXTURE_ROOT;
