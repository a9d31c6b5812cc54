export * from './schemas.js';
export * from './transforms.js';
export * from './price-accuracy.js';
export * from './record.js';
export * from './errors.js';
