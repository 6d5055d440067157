// src/core/utils.ts

/**
 * @fileoverview
 * Barrel for the pure helpers the adapter and describer are built from: reference names,
 * decimal bounds, kind detection, type resolution, example synthesis and type display.
 */
export * from './utils/index.js';
