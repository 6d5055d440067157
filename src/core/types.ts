// src/core/types.ts

/**
 * @fileoverview
 * Central entry point for the types shared across the package: the OpenAPI schema shapes
 * consumed, the type descriptors produced, the collaborator contracts and the configuration.
 */
export * from './types/index.js';
