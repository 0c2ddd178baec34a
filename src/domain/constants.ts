/**
 * Constants for the Rush Hour solver
 */

import type { Direction, SolverOptions } from './types.js';

// Board marker for a free cell
export const EMPTY_CELL = '.';

// Vehicle ids are a single letter or digit
export const VEHICLE_ID_PATTERN = /^[A-Za-z0-9]$/;

export const DIRECTION_DELTAS: Record<Direction, { dRow: number; dCol: number }> = {
  left: { dRow: 0, dCol: -1 },
  right: { dRow: 0, dCol: 1 },
  up: { dRow: -1, dCol: 0 },
  down: { dRow: 1, dCol: 0 },
};

// Default solver options
export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  unitCost: 1,
  targetVehicle: 'X',
  maxIterations: 1_000_000,
  maxTime: 60_000, // 60 seconds
  verifyStates: false,
};
