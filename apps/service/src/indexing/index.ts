export * from './embedder.js';
export * from './vector-index.js';
export * from './product-indexer.js';
