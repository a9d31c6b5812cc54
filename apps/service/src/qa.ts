import { setTimeout as delay } from 'node:timers/promises';

import { AnswerGenerationFailure, describeError, formatPrice, type ProductRecord } from '@shopscout/core';

import { silentLogger, type ServiceLogger } from './logger.js';
import type { ShoppingAssistantAgent } from './mastra/agents/shopping-assistant-agent.js';

export const DESCRIPTION_LIMIT = 800;
export const EVIDENCE_REVIEW_LIMIT = 5;

export const INSUFFICIENT_EVIDENCE_MESSAGE =
  'I could not find product data to answer that. Try another search or ingest more product pages.';
export const COULD_NOT_ANSWER_MESSAGE = 'Sorry, I could not answer that right now. Please try again.';

export type AnswerStatus = 'answered' | 'insufficient-evidence' | 'failed';

export interface AnswerResult {
  readonly status: AnswerStatus;
  readonly answer: string;
  /** Source URLs of the records offered as evidence. */
  readonly sources: readonly string[];
  readonly error?: AnswerGenerationFailure;
}

export interface AnswerGenerator {
  generate(prompt: string): Promise<string>;
}

/** Generates answers through the Mastra shopping assistant agent. */
export class MastraAnswerGenerator implements AnswerGenerator {
  constructor(private readonly agent: ShoppingAssistantAgent) {}

  async generate(prompt: string): Promise<string> {
    const result = await this.agent.generate(prompt);
    return result.text;
  }
}

export const truncateText = (value: string, limit: number): string => {
  if (value.length <= limit) {
    return value;
  }
  const cut = value.slice(0, Math.max(0, limit - 4));
  const boundary = cut.lastIndexOf(' ');
  return `${(boundary > limit / 2 ? cut.slice(0, boundary) : cut).trimEnd()} ...`;
};

const formatEvidenceBlock = (record: ProductRecord, position: number): string => {
  const lines = [`PRODUCT ${position}:`, `TITLE: ${record.title}`, `PRICE: ${formatPrice(record)}`];
  if (record.brand) {
    lines.push(`BRAND: ${record.brand}`);
  }
  if (record.description) {
    lines.push(`DESCRIPTION: ${truncateText(record.description, DESCRIPTION_LIMIT)}`);
  }
  const reviews = record.reviews.slice(0, EVIDENCE_REVIEW_LIMIT);
  if (reviews.length > 0) {
    lines.push('REVIEWS:');
    for (const review of reviews) {
      const rating = review.rating === undefined ? '' : `(${review.rating}/5) `;
      lines.push(`- ${rating}${review.text}`);
    }
  }
  lines.push(`URL: ${record.sourceUrl}`);
  return lines.join('\n');
};

/** Numbered evidence blocks holding only fields of the given records. */
export const buildEvidenceBundle = (records: readonly ProductRecord[]): string =>
  records.map((record, index) => formatEvidenceBlock(record, index + 1)).join('\n---\n');

export const buildAnswerPrompt = (question: string, records: readonly ProductRecord[]): string =>
  [
    `User question: ${question.trim()}`,
    '',
    'Use only the following product evidence. Do not invent facts. If the evidence does not answer the question, say so explicitly.',
    '',
    buildEvidenceBundle(records)
  ].join('\n');

export interface AnswerRequest {
  readonly question: string;
  readonly records: readonly ProductRecord[];
}

export interface QaEngineOptions {
  readonly generator: AnswerGenerator;
  readonly timeoutMs: number;
  readonly logger?: ServiceLogger;
}

export class QaEngine {
  private readonly logger: ServiceLogger;

  constructor(private readonly options: QaEngineOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async answer(request: AnswerRequest): Promise<AnswerResult> {
    const sources = request.records.map((record) => record.sourceUrl);
    if (request.records.length === 0) {
      return { status: 'insufficient-evidence', answer: INSUFFICIENT_EVIDENCE_MESSAGE, sources };
    }

    try {
      const text = (await this.generateWithTimeout(buildAnswerPrompt(request.question, request.records))).trim();
      if (!text) {
        throw new AnswerGenerationFailure('The language model returned an empty answer');
      }
      return { status: 'answered', answer: text, sources };
    } catch (error) {
      const failure =
        error instanceof AnswerGenerationFailure
          ? error
          : new AnswerGenerationFailure(`Answer generation failed: ${describeError(error)}`, { cause: error });
      this.logger.error('Could not generate an answer', { reason: failure.message });
      return { status: 'failed', answer: COULD_NOT_ANSWER_MESSAGE, sources, error: failure };
    }
  }

  private async generateWithTimeout(prompt: string): Promise<string> {
    const timer = new AbortController();
    const timeout = delay(this.options.timeoutMs, undefined, { signal: timer.signal }).then(() => {
      throw new AnswerGenerationFailure(`Answer generation timed out after ${this.options.timeoutMs}ms`);
    });

    try {
      return await Promise.race([this.options.generator.generate(prompt), timeout]);
    } finally {
      timer.abort();
    }
  }
}
