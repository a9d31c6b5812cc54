import { applyTransform } from './transforms.js';
import {
  HttpUrlSchema,
  ProductRecordSchema,
  ReviewSchema,
  type Money,
  type PriceConfidence,
  type ProductRecord,
  type Review
} from './schemas.js';
import type { PriceSelection } from './price-accuracy.js';

export const UNTITLED_PRODUCT = 'Untitled product';
export const PRICE_UNAVAILABLE = 'price unavailable';
export const DEFAULT_MAX_REVIEWS = 5;

export interface ProductRecordInput {
  readonly sourceUrl: string;
  readonly title?: string;
  readonly selection: PriceSelection;
  readonly images?: readonly string[];
  readonly description?: string;
  readonly reviews?: readonly Review[];
  readonly brand?: string;
  readonly sku?: string;
  readonly rawSnapshotRef?: string;
  readonly extractedAt: Date;
  readonly maxReviews?: number;
  readonly maxImages?: number;
}

/**
 * Resolves an image reference against the page URL and returns it in the form
 * used for de-duplication: absolute, http(s), lower-cased host, no fragment.
 * Returns `undefined` for anything that is not a usable image URL.
 */
export function normalizeImageUrl(value: string, baseUrl?: string): string | undefined {
  const trimmed = value.trim();
  if (!trimmed || trimmed.startsWith('data:')) {
    return undefined;
  }

  let resolved: string;
  try {
    resolved = applyTransform('url.resolve', trimmed, { baseUrl, stripHash: true });
  } catch {
    return undefined;
  }

  return HttpUrlSchema.safeParse(resolved).success ? resolved : undefined;
}

const collapse = (value: string): string => applyTransform('text.collapse', value);

const dedupeImages = (images: readonly string[], baseUrl: string, limit: number): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const image of images) {
    const normalized = normalizeImageUrl(image, baseUrl);
    if (!normalized || seen.has(normalized)) {
      continue;
    }
    seen.add(normalized);
    result.push(normalized);
    if (result.length >= limit) {
      break;
    }
  }
  return result;
};

const dedupeReviews = (reviews: readonly Review[], limit: number): Review[] => {
  const seen = new Set<string>();
  const result: Review[] = [];
  for (const review of reviews) {
    const parsed = ReviewSchema.safeParse({ ...review, text: collapse(review.text) });
    if (!parsed.success) {
      continue;
    }
    const key = parsed.data.text.toLowerCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(parsed.data);
    if (result.length >= limit) {
      break;
    }
  }
  return result;
};

const optionalText = (value?: string): string | undefined => {
  if (value === undefined) {
    return undefined;
  }
  const collapsed = collapse(value);
  return collapsed.length > 0 ? collapsed : undefined;
};

const deepFreeze = (record: ProductRecord): ProductRecord => {
  if (record.price) {
    Object.freeze(record.price);
  }
  record.reviews.forEach((review) => Object.freeze(review));
  Object.freeze(record.images);
  Object.freeze(record.reviews);
  return Object.freeze(record);
};

/**
 * Builds a validated, frozen product record. Every record in the system is
 * created here so the price/confidence pairing and image rules hold for all of
 * them.
 */
export function createProductRecord(input: ProductRecordInput): ProductRecord {
  const sourceUrl = applyTransform('url.resolve', input.sourceUrl, { stripHash: true });
  const { price, confidence, source } = input.selection;

  const record = ProductRecordSchema.parse({
    sourceUrl,
    title: optionalText(input.title) ?? UNTITLED_PRODUCT,
    ...(price ? { price, priceSource: source } : {}),
    priceConfidence: price ? confidence : 'unknown',
    images: dedupeImages(input.images ?? [], sourceUrl, input.maxImages ?? Number.POSITIVE_INFINITY),
    description: collapse(input.description ?? ''),
    reviews: dedupeReviews(input.reviews ?? [], input.maxReviews ?? DEFAULT_MAX_REVIEWS),
    brand: optionalText(input.brand),
    sku: optionalText(input.sku),
    rawSnapshotRef: input.rawSnapshotRef,
    extractedAt: input.extractedAt.toISOString()
  });

  return deepFreeze(record);
}

/**
 * Re-validates a record read back from storage and freezes it.
 */
export function parseProductRecord(value: unknown): ProductRecord {
  return deepFreeze(ProductRecordSchema.parse(value));
}

const withoutTimestamp = ({ extractedAt: _extractedAt, ...rest }: ProductRecord) => rest;

/**
 * Structural equality that ignores `extractedAt`.
 */
export function recordsEqual(left: ProductRecord, right: ProductRecord): boolean {
  return JSON.stringify(withoutTimestamp(left)) === JSON.stringify(withoutTimestamp(right));
}

export function formatMoney(price: Money): string {
  return `${price.currencyCode} ${price.amount.toFixed(price.precision)}`;
}

const CONFIDENCE_LABEL: Record<Exclude<PriceConfidence, 'unknown'>, string> = {
  high: 'high confidence',
  medium: 'medium confidence',
  low: 'low confidence'
};

/**
 * Human-readable price line used in answers and listings, e.g.
 * `INR 1999.00 (high confidence)` or `price unavailable`.
 */
export function formatPrice(record: Pick<ProductRecord, 'price' | 'priceConfidence'>): string {
  if (!record.price || record.priceConfidence === 'unknown') {
    return PRICE_UNAVAILABLE;
  }
  return `${formatMoney(record.price)} (${CONFIDENCE_LABEL[record.priceConfidence]})`;
}
