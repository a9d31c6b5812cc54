import { z } from 'zod';

import { CurrencyCodeSchema, MoneySchema, type CurrencyCode, type Money } from './schemas.js';

/**
 * Built-in transforms must remain deterministic across environments and
 * refrain from relying on host locale settings. Amount parsing accepts comma
 * thousands separators in both western (`1,299.00`) and Indian (`1,29,999`)
 * grouping with a period decimal separator, and URLs are normalized using the
 * WHATWG URL API.
 */

export const TransformNameSchema = z.enum(['text.collapse', 'money.parse', 'url.resolve']);

export type TransformName = z.infer<typeof TransformNameSchema>;

const TextCollapseOptionsSchema = z.object({}).strict();

const MoneyParseOptionsSchema = z
  .object({
    currencyCode: CurrencyCodeSchema.optional(),
    fallbackPrecision: z.number().int().min(0).max(4).default(2)
  })
  .strict();

const UrlResolveOptionsSchema = z
  .object({
    baseUrl: z.string().url().optional(),
    stripHash: z.boolean().default(true)
  })
  .strict();

export type TextCollapseOptions = z.infer<typeof TextCollapseOptionsSchema>;
export type MoneyParseOptions = z.infer<typeof MoneyParseOptionsSchema>;
export type UrlResolveOptions = z.infer<typeof UrlResolveOptionsSchema>;

interface TransformOptionsByName {
  'text.collapse': TextCollapseOptions;
  'money.parse': MoneyParseOptions;
  'url.resolve': UrlResolveOptions;
}

interface TransformResultByName {
  'text.collapse': string;
  'money.parse': Money;
  'url.resolve': string;
}

const DEFAULT_TRANSFORM_OPTIONS: { [Name in TransformName]: TransformOptionsByName[Name] } = {
  'text.collapse': TextCollapseOptionsSchema.parse({}),
  'money.parse': MoneyParseOptionsSchema.parse({}),
  'url.resolve': UrlResolveOptionsSchema.parse({})
};

export type TransformOptionsInput<Name extends TransformName> = Partial<TransformOptionsByName[Name]>;

type NormalizedOptions<Name extends TransformName> = TransformOptionsByName[Name];

export function resolveTransformOptions<Name extends TransformName>(
  name: Name,
  options?: TransformOptionsInput<Name>
): NormalizedOptions<Name> {
  const defaults = DEFAULT_TRANSFORM_OPTIONS[name];
  if (!options) {
    return { ...defaults };
  }

  return { ...defaults, ...options };
}

const CURRENCY_BY_MARKER: Readonly<Record<string, CurrencyCode>> = {
  '₹': 'INR',
  rs: 'INR',
  'rs.': 'INR',
  inr: 'INR',
  $: 'USD',
  us$: 'USD',
  usd: 'USD',
  '€': 'EUR',
  eur: 'EUR',
  '£': 'GBP',
  gbp: 'GBP',
  '¥': 'JPY',
  jpy: 'JPY'
};

const AMOUNT_PATTERN = '\\d(?:[\\d,]*\\d)?(?:\\.\\d+)?';
const PREFIX_MARKER_PATTERN = '₹|(?<![A-Za-z])Rs\\.?|\\bINR\\b|US\\$|\\$|\\bUSD\\b|€|\\bEUR\\b|£|\\bGBP\\b|¥|\\bJPY\\b';
const SUFFIX_MARKER_PATTERN = '\\b(?:INR|USD|EUR|GBP|JPY)\\b';

export interface PriceToken {
  readonly amount: number;
  readonly amountText: string;
  readonly currencyCode: CurrencyCode;
  readonly index: number;
  readonly raw: string;
}

const lookupCurrency = (marker: string): CurrencyCode | undefined =>
  CURRENCY_BY_MARKER[marker.trim().toLowerCase()];

const parseAmountText = (value: string): number => Number.parseFloat(value.replace(/,/g, ''));

const precisionOf = (amountText: string, fallback: number): number => {
  const decimal = amountText.split('.')[1] ?? '';
  return decimal.length > 0 ? Math.min(decimal.length, 4) : fallback;
};

/**
 * Lists every amount in `text` that sits directly next to a currency symbol or
 * code, in document order.
 */
export function findPriceTokens(text: string): PriceToken[] {
  const pattern = new RegExp(
    `(${PREFIX_MARKER_PATTERN})\\s*(${AMOUNT_PATTERN})|(${AMOUNT_PATTERN})\\s*(${SUFFIX_MARKER_PATTERN})`,
    'gi'
  );
  const tokens: PriceToken[] = [];

  for (const match of text.matchAll(pattern)) {
    const marker = match[1] ?? match[4];
    const amountText = match[2] ?? match[3];
    if (!marker || !amountText) {
      continue;
    }

    const currencyCode = lookupCurrency(marker);
    const amount = parseAmountText(amountText);
    if (!currencyCode || !Number.isFinite(amount)) {
      continue;
    }

    tokens.push({
      amount,
      amountText,
      currencyCode,
      index: match.index ?? 0,
      raw: match[0].trim()
    });
  }

  return tokens;
}

const RANGE_SEPARATOR = /^\s*(?:-|–|—|to)\s*$/i;

function applyTextCollapse(value: unknown, _options: TextCollapseOptions): string {
  if (typeof value !== 'string') {
    throw new TypeError('text.collapse expects a string input');
  }

  return value.trim().replace(/\s+/g, ' ');
}

function applyMoneyParse(value: unknown, options: MoneyParseOptions): Money {
  if (typeof value === 'number') {
    if (!options.currencyCode) {
      throw new Error(`Unable to determine the currency of ${value}`);
    }
    return MoneySchema.parse({
      amount: value,
      currencyCode: options.currencyCode,
      precision: precisionOf(String(value), options.fallbackPrecision),
      raw: String(value)
    });
  }

  if (typeof value !== 'string') {
    throw new TypeError('money.parse expects a string or number input');
  }

  const raw = value.trim();
  const tokens = findPriceTokens(raw);
  const [first, second] = tokens;

  if (first) {
    // "₹499 - ₹999" style ranges resolve to their lower bound.
    const isRange =
      second !== undefined &&
      tokens.length === 2 &&
      RANGE_SEPARATOR.test(raw.slice(first.index + first.raw.length, second.index));
    const chosen = isRange && second.amount < first.amount ? second : first;

    return MoneySchema.parse({
      amount: chosen.amount,
      currencyCode: chosen.currencyCode,
      precision: precisionOf(chosen.amountText, options.fallbackPrecision),
      raw
    });
  }

  const bare = new RegExp(`^(${AMOUNT_PATTERN})$`).exec(raw.replace(/\s+/g, ''));
  if (!bare?.[1]) {
    throw new Error(`Unable to parse monetary value from "${value}"`);
  }

  if (!options.currencyCode) {
    throw new Error(`Unable to determine the currency of "${value}"`);
  }

  return MoneySchema.parse({
    amount: parseAmountText(bare[1]),
    currencyCode: options.currencyCode,
    precision: precisionOf(bare[1], options.fallbackPrecision),
    raw
  });
}

function applyUrlResolve(value: unknown, options: UrlResolveOptions): string {
  if (typeof value !== 'string') {
    throw new TypeError('url.resolve expects a string input');
  }

  const raw = value.trim();
  if (!raw) {
    throw new Error('url.resolve cannot operate on an empty string');
  }

  const resolved = options.baseUrl ? new URL(raw, options.baseUrl) : new URL(raw);

  if (options.stripHash) {
    resolved.hash = '';
  }

  return resolved.toString();
}

const TRANSFORMS: {
  [Name in TransformName]: (value: unknown, options: TransformOptionsByName[Name]) => TransformResultByName[Name];
} = {
  'text.collapse': applyTextCollapse,
  'money.parse': applyMoneyParse,
  'url.resolve': applyUrlResolve
};

export function applyTransform<Name extends TransformName>(
  name: Name,
  value: unknown,
  options?: TransformOptionsInput<Name>
): TransformResultByName[Name] {
  const transform = TRANSFORMS[name];
  return transform(value, resolveTransformOptions(name, options));
}
