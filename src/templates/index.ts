export * from './types.js';
export * from './template-parser.js';
export * from './template-resolver.js';
export * from './template-registry.js';
export * from './yaml-store.js';
