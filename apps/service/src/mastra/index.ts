import { Mastra } from '@mastra/core/mastra';
import type { PinoLogger } from '@mastra/loggers';
import type { LibSQLStore } from '@mastra/libsql';

import type { ShoppingAssistantAgent } from './agents/shopping-assistant-agent.js';

export interface CreateMastraOptions {
  readonly agent: ShoppingAssistantAgent;
  readonly logger: PinoLogger;
  readonly storage?: LibSQLStore;
}

export const createMastra = (options: CreateMastraOptions) =>
  new Mastra({
    agents: {
      shoppingAssistantAgent: options.agent
    },
    storage: options.storage,
    telemetry: {
      enabled: false,
      disableLocalExport: true
    },
    logger: options.logger
  } satisfies ConstructorParameters<typeof Mastra>[0]);

export type ShopScoutMastra = ReturnType<typeof createMastra>;
