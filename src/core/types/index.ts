export * from './openapi.js';
export * from './descriptor.js';
export * from './collaborators.js';
export * from './config.js';
export * from './describer.js';
