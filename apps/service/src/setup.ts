import { resolve } from 'node:path';

import type { PinoLogger } from '@mastra/loggers';
import { ConfigurationError } from '@shopscout/core';
import { LocalFileSystemRecordStore, type RecordStore } from '@shopscout/record-store';

import { loadConfig, type ShopScoutConfig } from './config.js';
import { HttpPageFetcher } from './fetcher.js';
import { createOpenAiEmbedder, type Embedder } from './indexing/embedder.js';
import { ProductIndexer } from './indexing/product-indexer.js';
import { InMemoryVectorIndex, LibSqlVectorIndex, type VectorIndex } from './indexing/vector-index.js';
import { createLogger } from './logger.js';
import { createShoppingAssistantAgent } from './mastra/agents/shopping-assistant-agent.js';
import { createMastra, type ShopScoutMastra } from './mastra/index.js';
import { createStorage } from './mastra/stores.js';
import { ShoppingPipeline } from './pipeline.js';
import { MastraAnswerGenerator, QaEngine, type AnswerGenerator } from './qa.js';
import { SerpApiProductSearch } from './search.js';

export const IN_MEMORY_VECTOR_URL = 'memory';

export interface ShopScoutServices {
  readonly config: ShopScoutConfig;
  readonly logger: PinoLogger;
  readonly store: RecordStore;
  readonly pipeline: ShoppingPipeline;
  readonly mastra: ShopScoutMastra;
}

export interface CreateServicesOptions {
  readonly config?: ShopScoutConfig;
  readonly logger?: PinoLogger;
  readonly now?: () => Date;
}

/** Defers the missing-key error to the first call so search and listing still work without it. */
const missingOpenAiKey = () =>
  Promise.reject(new ConfigurationError('OPENAI_API_KEY is not configured. Set the key to enable answers and indexing.'));

const missingKeyEmbedder: Embedder = { embed: missingOpenAiKey };

const missingKeyGenerator: AnswerGenerator = { generate: missingOpenAiKey };

const createVectorIndex = (config: ShopScoutConfig): VectorIndex =>
  config.vectorUrl === IN_MEMORY_VECTOR_URL
    ? new InMemoryVectorIndex()
    : new LibSqlVectorIndex({
        url: config.vectorUrl,
        authToken: config.vectorAuthToken,
        dimension: config.embeddingDimension
      });

export const createServices = (options: CreateServicesOptions = {}): ShopScoutServices => {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger({ level: config.logLevel });

  const store = new LocalFileSystemRecordStore({ directory: resolve(process.cwd(), config.dataDirectory), logger });
  const fetcher = new HttpPageFetcher({
    timeoutMs: config.fetch.timeoutMs,
    attempts: config.fetch.attempts,
    logger
  });
  const search = new SerpApiProductSearch({
    apiKey: config.serpApiKey,
    trustedDomains: config.trustedDomains,
    defaultLimit: config.searchLimit,
    logger
  });

  const embedder = config.openAiApiKey
    ? createOpenAiEmbedder({ apiKey: config.openAiApiKey, model: config.embeddingModel })
    : missingKeyEmbedder;
  const indexer = new ProductIndexer({
    embedder,
    index: createVectorIndex(config),
    dimension: config.embeddingDimension,
    logger
  });

  const mastra = createMastra({
    agent: createShoppingAssistantAgent({ apiKey: config.openAiApiKey, modelName: config.answerModel }),
    logger,
    storage: createStorage({ url: config.storageUrl, authToken: config.storageAuthToken })
  });
  const generator = config.openAiApiKey
    ? new MastraAnswerGenerator(mastra.getAgent('shoppingAssistantAgent'))
    : missingKeyGenerator;
  const qa = new QaEngine({ generator, timeoutMs: config.answerTimeoutMs, logger });

  const pipeline = new ShoppingPipeline({
    search,
    fetcher,
    store,
    indexer,
    qa,
    concurrency: config.fetch.concurrency,
    defaultCurrency: config.defaultCurrency,
    logger,
    now: options.now
  });

  return { config, logger, store, pipeline, mastra };
};
