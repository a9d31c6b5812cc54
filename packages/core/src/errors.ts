export type ShopScoutErrorKind =
  | 'transport'
  | 'extraction'
  | 'embedding'
  | 'index'
  | 'answer-generation'
  | 'search'
  | 'configuration';

export interface ShopScoutErrorOptions {
  readonly cause?: unknown;
  /** URL or record id the failure relates to. */
  readonly subject?: string;
}

export abstract class ShopScoutError extends Error {
  abstract readonly kind: ShopScoutErrorKind;
  readonly subject?: string;

  constructor(message: string, options: ShopScoutErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.subject = options.subject;
  }
}

/** Network error, timeout or non-success HTTP status while fetching a page. */
export class TransportFailure extends ShopScoutError {
  readonly kind = 'transport' as const;
  readonly status?: number;

  constructor(message: string, options: ShopScoutErrorOptions & { readonly status?: number } = {}) {
    super(message, options);
    this.status = options.status;
  }
}

/** The page carried neither a title nor any price signal. */
export class ExtractionFailure extends ShopScoutError {
  readonly kind = 'extraction' as const;
}

export class EmbeddingFailure extends ShopScoutError {
  readonly kind = 'embedding' as const;
}

export class IndexFailure extends ShopScoutError {
  readonly kind = 'index' as const;
}

export class AnswerGenerationFailure extends ShopScoutError {
  readonly kind = 'answer-generation' as const;
}

export class SearchFailure extends ShopScoutError {
  readonly kind = 'search' as const;
}

export class ConfigurationError extends ShopScoutError {
  readonly kind = 'configuration' as const;
}

export const isShopScoutError = (value: unknown): value is ShopScoutError => value instanceof ShopScoutError;

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
