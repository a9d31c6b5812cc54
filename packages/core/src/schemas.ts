import { z } from 'zod';

const ISO_4217_CURRENCY_CODE = /^[A-Z]{3}$/;

const nonEmptyString = z.string().trim().min(1, 'Value must not be empty');

export const HttpUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), {
    message: 'URL must use the http or https scheme'
  });

export const CurrencyCodeSchema = z
  .string()
  .trim()
  .transform((value) => value.toUpperCase())
  .refine((value) => ISO_4217_CURRENCY_CODE.test(value), {
    message: 'Currency code must be a valid ISO 4217 alpha code'
  });

export const MoneySchema = z
  .object({
    amount: z
      .number({ required_error: 'Amount is required' })
      .finite()
      .positive({ message: 'Amount must be greater than zero' }),
    currencyCode: CurrencyCodeSchema,
    precision: z
      .number()
      .int({ message: 'Precision must be an integer' })
      .min(0, { message: 'Precision cannot be negative' })
      .max(4, { message: 'Precision must be 4 or fewer decimal places' })
      .default(2),
    raw: z.string().trim().min(1).optional()
  })
  .strict();

export type CurrencyCode = z.infer<typeof CurrencyCodeSchema>;
export type Money = z.infer<typeof MoneySchema>;

export const PriceConfidenceSchema = z.enum(['high', 'medium', 'low', 'unknown']);

export type PriceConfidence = z.infer<typeof PriceConfidenceSchema>;

/**
 * Where a raw price candidate was found on the page. `list-price` covers
 * struck-through and "MRP" figures, which are never selected as the trusted
 * price.
 */
export const PriceSourceSchema = z.enum([
  'structured-metadata',
  'visible-price-element',
  'list-price',
  'heuristic-text-scan'
]);

export type PriceSource = z.infer<typeof PriceSourceSchema>;

export const ReviewSchema = z
  .object({
    text: nonEmptyString,
    rating: z
      .number()
      .finite()
      .min(0, { message: 'rating cannot be negative' })
      .max(5, { message: 'rating cannot be greater than 5' })
      .optional(),
    author: nonEmptyString.optional()
  })
  .strict();

export type Review = z.infer<typeof ReviewSchema>;

export const ProductRecordSchema = z
  .object({
    sourceUrl: HttpUrlSchema,
    title: nonEmptyString,
    price: MoneySchema.optional(),
    priceConfidence: PriceConfidenceSchema,
    priceSource: PriceSourceSchema.exclude(['list-price']).optional(),
    images: z.array(HttpUrlSchema).readonly(),
    description: z.string(),
    reviews: z.array(ReviewSchema).readonly(),
    brand: nonEmptyString.optional(),
    sku: nonEmptyString.optional(),
    rawSnapshotRef: nonEmptyString.optional(),
    extractedAt: z.string().datetime({ offset: true })
  })
  .strict()
  .refine((value) => (value.price === undefined) === (value.priceConfidence === 'unknown'), {
    message: 'priceConfidence must be "unknown" exactly when no price is present',
    path: ['priceConfidence']
  })
  .refine((value) => (value.price === undefined) === (value.priceSource === undefined), {
    message: 'priceSource must be present exactly when a price is present',
    path: ['priceSource']
  })
  .refine((value) => new Set(value.images).size === value.images.length, {
    message: 'images must not contain duplicates',
    path: ['images']
  });

export type ProductRecord = z.infer<typeof ProductRecordSchema>;
