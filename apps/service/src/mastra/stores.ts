import { LibSQLStore } from '@mastra/libsql';

export interface CreateStorageOptions {
  readonly url: string;
  readonly authToken?: string;
}

/** Mastra's own storage (agent runs and traces), separate from the product vector index. */
export const createStorage = (options: CreateStorageOptions): LibSQLStore =>
  new LibSQLStore({
    url: options.url,
    authToken: options.authToken
  });
