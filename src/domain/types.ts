/**
 * Core type definitions for the Rush Hour solver
 */

import type { PuzzleState } from '../state/puzzle-state.js';

// Axis a vehicle slides along
export type Orientation = 'horizontal' | 'vertical';

// Single-cell move direction
export type Direction = 'left' | 'right' | 'up' | 'down';

// Coordinate on the grid (zero-based)
export interface Cell {
  row: number;
  col: number;
}

// A vehicle and the cells it covers, ordered head-to-tail along its axis
export interface Vehicle {
  readonly id: string;
  readonly cells: readonly Cell[];
  readonly orientation: Orientation;
}

// One single-cell slide of one vehicle
export interface Move {
  vehicleId: string;
  direction: Direction;
  cost: number; // incremental cost of this move
}

// Validation result
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// Solution step for display
export interface SolutionStep {
  stepNumber: number;
  vehicleId: string;
  direction: Direction;
  cost: number;
  cumulativeCost: number;
}

export type SearchStatus = 'SOLVED' | 'NO_SOLUTION' | 'LIMIT_REACHED' | 'CANCELLED';

// Search statistics
export interface SearchStats {
  nodesExplored: number;
  nodesGenerated: number;
  statesStored: number;
  timeTaken: number;
  optimalityGuarantee: boolean;
}

// Solver options
export interface SolverOptions {
  unitCost: number;
  targetVehicle: string;
  exitRow?: number;    // defaults to the middle row
  exitColumn?: number; // defaults to the rightmost column
  maxIterations: number;
  maxTime: number;
  verifyStates: boolean;
  shouldCancel?: () => boolean;
}

// Complete search result
export interface Solution {
  found: boolean;
  status: SearchStatus;
  moves: Move[];
  steps: SolutionStep[];
  totalCost: number; // Infinity unless found
  finalState: PuzzleState | null;
  stats: SearchStats;
  summary: string;
}

// Helper for cell keys
export function cellKey(c: Cell): string {
  return `${c.row},${c.col}`;
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.row === b.row && a.col === b.col;
}

export function isInBounds(size: number, cell: Cell): boolean {
  return Number.isInteger(cell.row) && Number.isInteger(cell.col) &&
    cell.row >= 0 && cell.row < size && cell.col >= 0 && cell.col < size;
}

export function formatCell(c: Cell): string {
  return `(${c.row}, ${c.col})`;
}
