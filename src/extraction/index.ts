export * from './types.js';
export * from './field-extractor.js';
export * from './field-filters.js';
export * from './snapshot-extractor.js';
