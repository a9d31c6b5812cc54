import { describe, expect, it, vi } from 'vitest';

import { AnswerGenerationFailure, createProductRecord } from '@shopscout/core';

import { sampleRecord } from './__fixtures__/fakes.js';
import {
  COULD_NOT_ANSWER_MESSAGE,
  INSUFFICIENT_EVIDENCE_MESSAGE,
  QaEngine,
  buildEvidenceBundle,
  truncateText,
  type AnswerGenerator
} from './qa.js';

const earbuds = createProductRecord({
  sourceUrl: 'https://www.flipkart.com/wireless-earbuds/p/itm100',
  title: 'Wireless Earbuds',
  selection: {
    price: { amount: 1999, currencyCode: 'INR', precision: 2 },
    confidence: 'high',
    source: 'structured-metadata',
    candidatesConsidered: 2
  },
  description: 'Bluetooth 5.3 earbuds with a charging case.',
  reviews: [{ text: 'Great bass.', rating: 4 }, { text: 'Case feels cheap.' }],
  extractedAt: new Date('2026-03-01T08:00:00.000Z')
});

const cottonThrow = sampleRecord('https://www.myntra.com/throw/p/itm200', 'Handwoven Cotton Throw');

describe('buildEvidenceBundle', () => {
  it('numbers blocks and marks missing prices', () => {
    expect(buildEvidenceBundle([earbuds, cottonThrow])).toBe(
      [
        'PRODUCT 1:',
        'TITLE: Wireless Earbuds',
        'PRICE: INR 1999.00 (high confidence)',
        'DESCRIPTION: Bluetooth 5.3 earbuds with a charging case.',
        'REVIEWS:',
        '- (4/5) Great bass.',
        '- Case feels cheap.',
        'URL: https://www.flipkart.com/wireless-earbuds/p/itm100',
        '---',
        'PRODUCT 2:',
        'TITLE: Handwoven Cotton Throw',
        'PRICE: price unavailable',
        'URL: https://www.myntra.com/throw/p/itm200'
      ].join('\n')
    );
  });

  it('truncates long descriptions on a word boundary', () => {
    const truncated = truncateText('word '.repeat(300).trim(), 800);

    expect(truncated.length).toBeLessThanOrEqual(800);
    expect(truncated.endsWith('word ...')).toBe(true);
    expect(truncateText('short', 800)).toBe('short');
  });
});

describe('QaEngine', () => {
  it('does not call the model without evidence', async () => {
    const generate = vi.fn<AnswerGenerator['generate']>();
    const engine = new QaEngine({ generator: { generate }, timeoutMs: 1000 });

    const result = await engine.answer({ question: 'Is it waterproof?', records: [] });

    expect(result).toEqual({ status: 'insufficient-evidence', answer: INSUFFICIENT_EVIDENCE_MESSAGE, sources: [] });
    expect(generate).not.toHaveBeenCalled();
  });

  it('answers from the evidence bundle', async () => {
    const generate = vi.fn<AnswerGenerator['generate']>().mockResolvedValue('  They cost INR 1999.  ');
    const engine = new QaEngine({ generator: { generate }, timeoutMs: 1000 });

    const result = await engine.answer({ question: 'How much are the earbuds?', records: [earbuds] });

    expect(result).toEqual({
      status: 'answered',
      answer: 'They cost INR 1999.',
      sources: ['https://www.flipkart.com/wireless-earbuds/p/itm100']
    });
    const prompt = generate.mock.calls[0]?.[0] ?? '';
    expect(prompt.startsWith('User question: How much are the earbuds?\n')).toBe(true);
    expect(prompt).toContain('PRICE: INR 1999.00 (high confidence)');
  });

  it('reports model failures instead of guessing', async () => {
    const engine = new QaEngine({
      generator: { generate: () => Promise.reject(new Error('quota exceeded')) },
      timeoutMs: 1000
    });

    const result = await engine.answer({ question: 'Is it good?', records: [earbuds] });

    expect(result.status).toBe('failed');
    expect(result.answer).toBe(COULD_NOT_ANSWER_MESSAGE);
    expect(result.error).toBeInstanceOf(AnswerGenerationFailure);
    expect(result.error?.message).toBe('Answer generation failed: quota exceeded');
  });

  it('treats a slow model as a failure', async () => {
    const engine = new QaEngine({
      generator: { generate: () => new Promise<string>(() => undefined) },
      timeoutMs: 10
    });

    const result = await engine.answer({ question: 'Is it good?', records: [earbuds] });

    expect(result.status).toBe('failed');
    expect(result.error?.message).toBe('Answer generation timed out after 10ms');
  });

  it('treats an empty reply as a failure', async () => {
    const engine = new QaEngine({ generator: { generate: () => Promise.resolve('   ') }, timeoutMs: 1000 });

    const result = await engine.answer({ question: 'Is it good?', records: [earbuds] });

    expect(result.status).toBe('failed');
    expect(result.error?.message).toBe('The language model returned an empty answer');
  });
});
