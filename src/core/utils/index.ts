// Re-export everything from sub-modules
export * from './string.js';
export * from './ref.js';
export * from './decimal.js';
export * from './schema-kind.js';
export * from './type-resolver.js';
export * from './example-generator.js';
export * from './type-display.js';
