import { createOpenAI } from '@ai-sdk/openai';
import { embed, type EmbeddingModel } from 'ai';

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export interface AiSdkEmbedderOptions {
  readonly model: EmbeddingModel<string>;
}

/** Embeds text through any AI SDK embedding model. */
export class AiSdkEmbedder implements Embedder {
  constructor(private readonly options: AiSdkEmbedderOptions) {}

  async embed(text: string): Promise<number[]> {
    const { embedding } = await embed({ model: this.options.model, value: text });
    return embedding;
  }
}

export interface OpenAiEmbedderOptions {
  readonly apiKey: string;
  readonly model: string;
}

export const createOpenAiEmbedder = (options: OpenAiEmbedderOptions): Embedder => {
  const openai = createOpenAI({ apiKey: options.apiKey });
  return new AiSdkEmbedder({ model: openai.embedding(options.model) });
};

export const cosineSimilarity = (left: readonly number[], right: readonly number[]): number => {
  const length = Math.min(left.length, right.length);
  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let index = 0; index < length; index += 1) {
    const a = left[index] ?? 0;
    const b = right[index] ?? 0;
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }
  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
};
