import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';

import { ConfigurationError, HttpUrlSchema, formatPrice, type ProductRecord } from '@shopscout/core';
import type { RecordStore } from '@shopscout/record-store';

import { QuerySession, type PipelineResult, type ShoppingPipeline } from '../pipeline.js';

const QueryTextSchema = z.string().trim().min(1, 'Query must not be empty');

const SearchBodySchema = z
  .object({
    query: QueryTextSchema,
    domains: z.array(z.string().trim().min(1)).optional(),
    limit: z.number().int().positive().max(20).optional(),
    /** Requests sharing a session id cancel each other's earlier runs. */
    session: z.string().trim().min(1).optional()
  })
  .strict();

const IngestBodySchema = z.object({ url: HttpUrlSchema }).strict();

const AskBodySchema = z
  .object({
    question: QueryTextSchema,
    productQuery: z.string().trim().min(1).optional(),
    urls: z.array(HttpUrlSchema).optional(),
    topK: z.number().int().positive().max(10).optional()
  })
  .strict();

export interface CreateServerOptions {
  readonly pipeline: ShoppingPipeline;
  readonly store: RecordStore;
}

export const presentRecord = (record: ProductRecord) => ({
  ...record,
  priceLabel: formatPrice(record)
});

const presentResult = (result: PipelineResult) => ({
  ...result,
  products: result.products.map((product) => ({
    position: product.position,
    indexed: product.indexed,
    record: presentRecord(product.record)
  }))
});

export const createServer = (options: CreateServerOptions): FastifyInstance => {
  const app = Fastify({ logger: false });
  const { pipeline, store } = options;
  const sessions = new Map<string, QuerySession>();

  const sessionFor = (id: string): QuerySession => {
    const existing = sessions.get(id);
    if (existing) {
      return existing;
    }
    const created = new QuerySession(pipeline);
    sessions.set(id, created);
    return created;
  };

  app.post('/search', async (request, reply) => {
    const body = SearchBodySchema.parse(request.body ?? {});
    const searchOptions = { domains: body.domains, limit: body.limit };

    let result: PipelineResult;
    if (body.session) {
      const session = sessionFor(body.session);
      result = await session.submit(body.query, searchOptions);
      if (!session.active) {
        sessions.delete(body.session);
      }
    } else {
      result = await pipeline.run(body.query, searchOptions);
    }

    return reply.send(presentResult(result));
  });

  app.post('/products/ingest', async (request, reply) => {
    const body = IngestBodySchema.parse(request.body ?? {});
    const result = await pipeline.ingestUrl(body.url);

    return reply.send({
      record: presentRecord(result.record),
      indexed: result.indexed,
      warning: result.warning
    });
  });

  app.get('/products', async (_request, reply) => {
    const records = await store.list();
    return reply.send({ products: records.map(presentRecord) });
  });

  app.post('/ask', async (request, reply) => {
    const body = AskBodySchema.parse(request.body ?? {});
    const result = await pipeline.ask(body.question, {
      productQuery: body.productQuery,
      urls: body.urls,
      topK: body.topK
    });

    return reply.send({
      status: result.status,
      answer: result.answer,
      sources: result.sources,
      error: result.error?.message
    });
  });

  app.post('/index/rebuild', async (_request, reply) => {
    const result = await pipeline.reindexStoredRecords();
    return reply.send({
      indexed: result.indexed,
      failures: result.failures.map((failure) => ({
        sourceUrl: failure.sourceUrl,
        kind: failure.error.kind,
        message: failure.error.message
      }))
    });
  });

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof z.ZodError) {
      return reply.status(400).send({ error: error.issues.map((issue) => issue.message).join('; ') });
    }
    if (error instanceof ConfigurationError) {
      return reply.status(503).send({ error: error.message });
    }
    const statusCode = error.statusCode !== undefined && error.statusCode < 500 ? error.statusCode : 500;
    return reply.status(statusCode).send({ error: error.message });
  });

  return app;
};
