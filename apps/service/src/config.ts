import { z } from 'zod';

import { ConfigurationError, CurrencyCodeSchema } from '@shopscout/core';

export const DEFAULT_TRUSTED_DOMAINS = ['amazon.in', 'flipkart.com', 'myntra.com', 'nykaa.com', 'snapdeal.com'] as const;

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalSecret = z.preprocess(blankToUndefined, z.string().trim().min(1).optional());

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const DomainListSchema = z.preprocess(
  blankToUndefined,
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined) {
        return [...DEFAULT_TRUSTED_DOMAINS];
      }
      const domains = value
        .split(',')
        .map((entry) => entry.trim().toLowerCase().replace(/^www\./, ''))
        .filter((entry) => entry.length > 0);
      return [...new Set(domains)];
    })
    .pipe(z.array(z.string()).min(1, 'At least one trusted domain is required'))
);

const EnvironmentSchema = z.object({
  SERPAPI_KEY: optionalSecret,
  OPENAI_API_KEY: optionalSecret,
  SHOPSCOUT_DATA_DIR: z.preprocess(blankToUndefined, z.string().default('./data')),
  SHOPSCOUT_VECTOR_URL: z.preprocess(blankToUndefined, z.string().default('file:./shopscout-vectors.db')),
  SHOPSCOUT_VECTOR_AUTH_TOKEN: optionalSecret,
  DATABASE_URL: z.preprocess(blankToUndefined, z.string().default('file:./mastra.db')),
  DATABASE_AUTH_TOKEN: optionalSecret,
  SHOPSCOUT_TRUSTED_DOMAINS: DomainListSchema,
  SHOPSCOUT_FETCH_TIMEOUT_MS: positiveInt(20_000),
  SHOPSCOUT_FETCH_ATTEMPTS: positiveInt(2),
  SHOPSCOUT_FETCH_CONCURRENCY: positiveInt(5),
  SHOPSCOUT_SEARCH_LIMIT: positiveInt(5),
  SHOPSCOUT_ANSWER_MODEL: z.preprocess(blankToUndefined, z.string().default('gpt-4o-mini')),
  SHOPSCOUT_EMBEDDING_MODEL: z.preprocess(blankToUndefined, z.string().default('text-embedding-3-small')),
  SHOPSCOUT_EMBEDDING_DIMENSION: positiveInt(1536),
  SHOPSCOUT_ANSWER_TIMEOUT_MS: positiveInt(30_000),
  SHOPSCOUT_DEFAULT_CURRENCY: z.preprocess(blankToUndefined, CurrencyCodeSchema.default('INR')),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? blankToUndefined(value.toLowerCase()) : value),
    LogLevelSchema.default('info')
  )
});

export interface ShopScoutConfig {
  readonly serpApiKey?: string;
  readonly openAiApiKey?: string;
  readonly dataDirectory: string;
  /** libsql URL of the vector index, or `memory` for a process-local index. */
  readonly vectorUrl: string;
  readonly vectorAuthToken?: string;
  /** libsql URL of Mastra's own storage. */
  readonly storageUrl: string;
  readonly storageAuthToken?: string;
  readonly trustedDomains: readonly string[];
  readonly fetch: {
    readonly timeoutMs: number;
    readonly attempts: number;
    readonly concurrency: number;
  };
  readonly searchLimit: number;
  readonly answerModel: string;
  readonly answerTimeoutMs: number;
  readonly embeddingModel: string;
  readonly embeddingDimension: number;
  readonly defaultCurrency: string;
  readonly logLevel: LogLevel;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ShopScoutConfig => {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${details}`, { cause: parsed.error });
  }

  const values = parsed.data;
  return {
    serpApiKey: values.SERPAPI_KEY,
    openAiApiKey: values.OPENAI_API_KEY,
    dataDirectory: values.SHOPSCOUT_DATA_DIR,
    vectorUrl: values.SHOPSCOUT_VECTOR_URL,
    vectorAuthToken: values.SHOPSCOUT_VECTOR_AUTH_TOKEN,
    storageUrl: values.DATABASE_URL,
    storageAuthToken: values.DATABASE_AUTH_TOKEN,
    trustedDomains: values.SHOPSCOUT_TRUSTED_DOMAINS,
    fetch: {
      timeoutMs: values.SHOPSCOUT_FETCH_TIMEOUT_MS,
      attempts: values.SHOPSCOUT_FETCH_ATTEMPTS,
      concurrency: values.SHOPSCOUT_FETCH_CONCURRENCY
    },
    searchLimit: values.SHOPSCOUT_SEARCH_LIMIT,
    answerModel: values.SHOPSCOUT_ANSWER_MODEL,
    answerTimeoutMs: values.SHOPSCOUT_ANSWER_TIMEOUT_MS,
    embeddingModel: values.SHOPSCOUT_EMBEDDING_MODEL,
    embeddingDimension: values.SHOPSCOUT_EMBEDDING_DIMENSION,
    defaultCurrency: values.SHOPSCOUT_DEFAULT_CURRENCY,
    logLevel: values.LOG_LEVEL
  };
};
