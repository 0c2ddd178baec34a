/**
 * Main Solver Interface
 */

import type { Cell, Move, Orientation, Solution, SolverOptions } from '../domain/types.js';
import { DEFAULT_SOLVER_OPTIONS, EMPTY_CELL } from '../domain/constants.js';
import { MalformedInputError } from '../domain/errors.js';
import { type PuzzleState, isGoalState, resolveExit } from '../state/puzzle-state.js';
import { validateSolverOptions } from '../constraints/validator.js';
import { parseTextGrid } from '../io/state-parser.js';
import { uniformCostSearch } from './uniform-cost.js';
import { generateLegalMoves } from './move-generator.js';

/**
 * Main Rush Hour solver class
 */
export class RushHourSolver {
  constructor(private readonly defaults: Partial<SolverOptions> = {}) {}

  /**
   * Solve a puzzle from the given state
   */
  solve(initialState: PuzzleState, options: Partial<SolverOptions> = {}): Solution {
    return uniformCostSearch(initialState, { ...this.defaults, ...options });
  }

  /**
   * Solver whose moves all cost `unitCost` per cell of vehicle length
   */
  static withUnitCost(unitCost: number): RushHourSolver {
    return new RushHourSolver({ unitCost });
  }
}

/**
 * Quick solve for an ASCII grid such as:
 * ```
 * ..B...
 * ..B...
 * XXB...
 * ```
 */
export function quickSolve(
  gridText: string,
  options: Partial<SolverOptions> & { allowGaps?: boolean } = {}
): Solution {
  const { allowGaps, ...solverOptions } = options;
  const state = parseTextGrid(gridText, {
    allowGaps,
    targetVehicle: solverOptions.targetVehicle ?? DEFAULT_SOLVER_OPTIONS.targetVehicle,
  });

  return new RushHourSolver().solve(state, solverOptions);
}

export interface PuzzleAnalysis {
  size: number;
  vehicleCount: number;
  target: { id: string; orientation: Orientation; cells: readonly Cell[] } | null;
  exit: Cell;
  solved: boolean;
  blockingVehicles: string[];
  legalMoves: Move[];
  suggestions: string[];
}

/**
 * Analyze a puzzle state without solving
 */
export function analyzePuzzle(
  state: PuzzleState,
  options: Partial<SolverOptions> = {}
): PuzzleAnalysis {
  const opts: SolverOptions = { ...DEFAULT_SOLVER_OPTIONS, ...options };
  const validation = validateSolverOptions(opts);
  if (!validation.valid) {
    throw new MalformedInputError(validation.errors);
  }
  const exit = resolveExit(state, opts);
  const target = state.vehicles.get(opts.targetVehicle) ?? null;
  const solved = isGoalState(state, opts.targetVehicle, exit.col);

  const blockingVehicles: string[] = [];
  const suggestions: string[] = [];

  if (!target) {
    suggestions.push(`Target vehicle ${opts.targetVehicle} is not on the board`);
  } else if (target.orientation === 'vertical') {
    suggestions.push(`Target vehicle ${opts.targetVehicle} is vertical and can never reach the exit`);
  } else {
    // Scan the target's row from just past its tail to the exit column
    const row = target.cells[0].row;
    const tail = target.cells[target.cells.length - 1].col;
    for (let col = tail + 1; col <= exit.col; col++) {
      const content = state.board[row][col];
      if (content !== EMPTY_CELL && !blockingVehicles.includes(content)) {
        blockingVehicles.push(content);
      }
    }

    if (row !== exit.row) {
      suggestions.push(
        `Target vehicle ${opts.targetVehicle} sits on row ${row}, not the exit row ${exit.row}`
      );
    }
    if (!solved && blockingVehicles.length > 0) {
      suggestions.push(`Clear ${blockingVehicles.join(', ')} from row ${row}`);
    }
  }

  return {
    size: state.size,
    vehicleCount: state.vehicles.size,
    target: target
      ? { id: target.id, orientation: target.orientation, cells: target.cells }
      : null,
    exit,
    solved,
    blockingVehicles,
    legalMoves: generateLegalMoves(state, opts.unitCost),
    suggestions,
  };
}
