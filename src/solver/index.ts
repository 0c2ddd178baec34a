/**
 * Solver module exports
 */

export * from './search-node.js';
export * from './move-generator.js';
export * from './path-reconstructor.js';
export * from './uniform-cost.js';
export * from './solver.js';
