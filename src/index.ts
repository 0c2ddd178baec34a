/**
 * Rush Hour Solver
 *
 * Finds minimum-cost move sequences for the Rush Hour sliding-block puzzle
 * using uniform-cost search over canonicalized puzzle states.
 */

// Domain exports
export * from './domain/types.js';
export * from './domain/constants.js';
export * from './domain/errors.js';

// State exports
export * from './state/puzzle-state.js';
export * from './state/state-hash.js';

// Constraint exports
export * from './constraints/validator.js';

// Solver exports
export * from './solver/index.js';

// I/O exports
export * from './io/state-parser.js';
export * from './io/solution-formatter.js';
