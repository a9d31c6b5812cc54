import { applyTransform, findPriceTokens } from './transforms.js';
import { CurrencyCodeSchema, type CurrencyCode, type Money, type PriceConfidence, type PriceSource } from './schemas.js';

export interface PriceCandidate {
  readonly raw: string | number;
  readonly source: PriceSource;
  /** Currency declared next to the value, e.g. JSON-LD `priceCurrency`. */
  readonly currency?: string;
}

export type SelectedPriceSource = Exclude<PriceSource, 'list-price'>;

export interface PriceSelection {
  readonly price?: Money;
  readonly confidence: PriceConfidence;
  readonly source?: SelectedPriceSource;
  readonly candidatesConsidered: number;
}

export interface SelectTrustedPriceOptions {
  /**
   * Currency assumed for visible price elements that carry a bare number.
   * Structured metadata must declare its own currency.
   */
  readonly defaultCurrency?: CurrencyCode;
}

const tryParse = (raw: string | number, currencyCode?: CurrencyCode): Money | undefined => {
  try {
    return applyTransform('money.parse', raw, currencyCode ? { currencyCode } : undefined);
  } catch {
    return undefined;
  }
};

const recognizedCurrency = (value?: string): CurrencyCode | undefined => {
  if (value === undefined) {
    return undefined;
  }
  const parsed = CurrencyCodeSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
};

const parseStructured = (candidate: PriceCandidate): Money | undefined => {
  const declared = recognizedCurrency(candidate.currency);
  const parsed = tryParse(candidate.raw, declared);
  if (!parsed || !declared) {
    return parsed;
  }
  // A declared `priceCurrency` outranks any symbol inside the value.
  return { ...parsed, currencyCode: declared };
};

const parseVisible = (candidate: PriceCandidate, defaultCurrency?: CurrencyCode): Money | undefined =>
  tryParse(candidate.raw, recognizedCurrency(candidate.currency) ?? defaultCurrency);

const scanHeuristic = (candidate: PriceCandidate): Money | undefined => {
  const text = String(candidate.raw);
  const [token] = findPriceTokens(text);
  if (!token) {
    return undefined;
  }
  return tryParse(token.raw);
};

/**
 * Chooses the single trusted price for a product page out of every raw
 * candidate the extractor collected. Rules are applied in order and the first
 * one that yields a value wins:
 *
 * 1. the first structured-metadata candidate with a positive amount and a
 *    recognized currency (`high`);
 * 2. the only visible price element that parses cleanly (`medium`);
 * 3. the smallest of several visible price elements (`medium`);
 * 4. the first currency-marked token from the text scan (`low`);
 * 5. nothing (`unknown`).
 *
 * `list-price` candidates are never selected. The function never throws.
 */
export function selectTrustedPrice(
  candidates: readonly PriceCandidate[],
  options: SelectTrustedPriceOptions = {}
): PriceSelection {
  const candidatesConsidered = candidates.length;

  for (const candidate of candidates) {
    if (candidate.source !== 'structured-metadata') {
      continue;
    }
    const price = parseStructured(candidate);
    if (price) {
      return { price, confidence: 'high', source: 'structured-metadata', candidatesConsidered };
    }
  }

  const visible = candidates
    .filter((candidate) => candidate.source === 'visible-price-element')
    .map((candidate) => parseVisible(candidate, options.defaultCurrency))
    .filter((price): price is Money => price !== undefined);

  const [cheapest] = [...visible].sort((left, right) => left.amount - right.amount);
  if (cheapest) {
    return { price: cheapest, confidence: 'medium', source: 'visible-price-element', candidatesConsidered };
  }

  for (const candidate of candidates) {
    if (candidate.source !== 'heuristic-text-scan') {
      continue;
    }
    const price = scanHeuristic(candidate);
    if (price) {
      return { price, confidence: 'low', source: 'heuristic-text-scan', candidatesConsidered };
    }
  }

  return { confidence: 'unknown', candidatesConsidered };
}
