import { Command, InvalidArgumentError } from 'commander';

import { formatPrice, type ProductRecord } from '@shopscout/core';
import type { RecordStore } from '@shopscout/record-store';

import { createServer } from '../http/server.js';
import type { ShoppingPipeline } from '../pipeline.js';

const parsePositiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
};

const summarize = (record: ProductRecord) => ({
  sourceUrl: record.sourceUrl,
  title: record.title,
  price: formatPrice(record),
  images: record.images.length,
  reviews: record.reviews.length
});

export interface CreateCliOptions {
  readonly pipeline: ShoppingPipeline;
  readonly store: RecordStore;
  readonly stdout?: NodeJS.WritableStream;
  readonly stderr?: NodeJS.WritableStream;
}

export const createCli = (options: CreateCliOptions): Command => {
  const program = new Command();
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const { pipeline, store } = options;

  const writeJson = (value: unknown) => {
    const serialized = JSON.stringify(value, null, 2);
    stdout.write(`${serialized}\n`);
  };

  const handle = <T extends unknown[]>(runner: (...args: T) => Promise<void>) => {
    return async (...args: T) => {
      try {
        await runner(...args);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        stderr.write(`${message}\n`);
        throw error;
      }
    };
  };

  program.name('shopscout').description('Search trusted shops, normalize product pages and answer questions about them');

  program
    .command('search')
    .description('Search trusted domains, then fetch, extract, store and index the product pages found')
    .argument('<query...>', 'Free-text product query')
    .option('--domain <domain...>', 'Restrict the search to these trusted domains')
    .option('--limit <count>', 'Maximum number of candidate pages', parsePositiveInt)
    .action(
      handle(async (queryWords: string[], command: { domain?: string[]; limit?: number }) => {
        const result = await pipeline.run(queryWords.join(' '), { domains: command.domain, limit: command.limit });
        writeJson({
          query: result.query,
          status: result.status,
          products: result.products.map((product) => ({
            position: product.position,
            indexed: product.indexed,
            ...summarize(product.record)
          })),
          failures: result.failures,
          warnings: result.warnings
        });
      })
    );

  program
    .command('ingest <url>')
    .description('Fetch one product page and store its normalized record')
    .action(
      handle(async (url: string) => {
        const result = await pipeline.ingestUrl(url);
        writeJson({ ...summarize(result.record), indexed: result.indexed, warning: result.warning });
      })
    );

  program
    .command('ask')
    .description('Answer a question using only stored product records')
    .argument('<question...>', 'Question about the products')
    .option('--product <query>', 'Retrieval query used to find the products')
    .option('--url <url...>', 'Answer from these stored product URLs instead of semantic search')
    .option('--top-k <count>', 'Number of products to retrieve', parsePositiveInt)
    .action(
      handle(
        async (questionWords: string[], command: { product?: string; url?: string[]; topK?: number }) => {
          const result = await pipeline.ask(questionWords.join(' '), {
            productQuery: command.product,
            urls: command.url,
            topK: command.topK
          });
          writeJson({
            status: result.status,
            answer: result.answer,
            sources: result.sources,
            error: result.error?.message
          });
        }
      )
    );

  program
    .command('reindex')
    .description('Rebuild the vector index from the stored product records')
    .action(
      handle(async () => {
        const result = await pipeline.reindexStoredRecords();
        writeJson({
          indexed: result.indexed,
          failures: result.failures.map((failure) => ({ sourceUrl: failure.sourceUrl, message: failure.error.message }))
        });
      })
    );

  program
    .command('products')
    .description('List stored product records')
    .action(
      handle(async () => {
        const records = await store.list();
        writeJson(records.map(summarize));
      })
    );

  program
    .command('serve')
    .description('Start the HTTP API')
    .option('--port <port>', 'Port to listen on', parsePositiveInt, 3000)
    .option('--host <host>', 'Interface to bind', '127.0.0.1')
    .action(
      handle(async (command: { port: number; host: string }) => {
        const server = createServer({ pipeline, store });
        const address = await server.listen({ port: command.port, host: command.host });
        stdout.write(`ShopScout API listening on ${address}\n`);
      })
    );

  return program;
};
