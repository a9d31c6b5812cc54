export * from './types.js';
export * from './keys.js';
export * from './local-file-system.js';
