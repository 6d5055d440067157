export * from './markup.js';
export * from './definition-resolver.js';
export * from './document-context.js';
