import { PinoLogger } from '@mastra/loggers';

import type { LogLevel } from './config.js';

/** The logging surface the service components depend on. */
export interface ServiceLogger {
  debug(message: string, args?: Record<string, unknown>): void;
  info(message: string, args?: Record<string, unknown>): void;
  warn(message: string, args?: Record<string, unknown>): void;
  error(message: string, args?: Record<string, unknown>): void;
}

export interface CreateLoggerOptions {
  readonly name?: string;
  readonly level?: LogLevel;
}

export const createLogger = (options: CreateLoggerOptions = {}): PinoLogger =>
  new PinoLogger({
    name: options.name ?? 'ShopScout',
    level: options.level ?? 'info'
  });

const noop = (): void => undefined;

export const silentLogger: ServiceLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop
};
