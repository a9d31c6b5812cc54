import { createOpenAI } from '@ai-sdk/openai';
import { Agent, type MastraLanguageModel } from '@mastra/core/agent';

export const SHOPPING_ASSISTANT_INSTRUCTIONS = [
  'You are a concise, honest shopping assistant.',
  'You receive a user question and numbered product evidence blocks taken from stored product records.',
  'Only state facts that appear in the evidence: title, price, description, reviews and source URL.',
  'A price marked "price unavailable" is unknown; never estimate or invent one.',
  'If the evidence does not answer the question, say explicitly that the available product data is insufficient.',
  'Answer in 2-4 sentences and end with the source URL of every product you relied on.'
].join('\n');

export interface ShoppingAssistantAgentOptions {
  /** Overrides the OpenAI model, such as a mock model in tests. */
  readonly model?: MastraLanguageModel;
  readonly modelName?: string;
  readonly apiKey?: string;
}

export type ShoppingAssistantAgent = Agent<'shoppingAssistantAgent'>;

export const createShoppingAssistantAgent = (options: ShoppingAssistantAgentOptions = {}): ShoppingAssistantAgent => {
  const model = options.model ?? createOpenAI({ apiKey: options.apiKey })(options.modelName ?? 'gpt-4o-mini');

  return new Agent({
    id: 'shoppingAssistantAgent',
    name: 'shoppingAssistantAgent',
    instructions: SHOPPING_ASSISTANT_INSTRUCTIONS,
    model
  });
};
