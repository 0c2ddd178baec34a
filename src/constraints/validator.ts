/**
 * Validation for puzzle input, solver options and generated states
 */

import type { Cell, SolverOptions, ValidationResult, Vehicle } from '../domain/types.js';
import { cellKey, formatCell, isInBounds } from '../domain/types.js';
import { EMPTY_CELL, VEHICLE_ID_PATTERN } from '../domain/constants.js';
import { InvariantViolationError } from '../domain/errors.js';
import type { PuzzleState } from '../state/puzzle-state.js';

export interface PuzzleValidationOptions {
  allowGaps?: boolean;
  targetVehicle?: string;
}

/**
 * Validate a board grid against a vehicle table
 */
export function validatePuzzle(
  grid: readonly (readonly string[])[],
  vehicles: readonly Vehicle[],
  options: PuzzleValidationOptions = {}
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const size = grid.length;

  // Check 1: Board is a non-empty square
  if (size === 0) {
    errors.push('Board has no rows');
    return { valid: false, errors, warnings };
  }
  grid.forEach((row, r) => {
    if (row.length !== size) {
      errors.push(`Board must be square: row ${r} has ${row.length} cells, expected ${size}`);
    }
  });
  if (errors.length > 0) {
    return { valid: false, errors, warnings };
  }

  // Check 2: Cell tokens
  grid.forEach((row, r) => {
    row.forEach((token, c) => {
      if (token !== EMPTY_CELL && !VEHICLE_ID_PATTERN.test(token)) {
        errors.push(`Board cell ${formatCell({ row: r, col: c })} holds invalid token '${token}'`);
      }
    });
  });

  // Check 3: Vehicle table on its own
  errors.push(...validateVehicleTable(size, vehicles, options.allowGaps ?? false));

  // Check 4: The board agrees with the table
  const claimedBy = new Map<string, string>();
  for (const vehicle of vehicles) {
    for (const cell of vehicle.cells) {
      if (!isInBounds(size, cell)) continue;

      const key = cellKey(cell);
      const owner = claimedBy.get(key);
      // Overlaps are reported by the table check
      if (owner !== undefined && owner !== vehicle.id) continue;
      claimedBy.set(key, vehicle.id);

      const token = grid[cell.row][cell.col];
      if (token !== vehicle.id) {
        errors.push(`Board cell ${formatCell(cell)} shows '${token}' but vehicle ${vehicle.id} occupies it`);
      }
    }
  }

  grid.forEach((row, r) => {
    row.forEach((token, c) => {
      if (token === EMPTY_CELL || !VEHICLE_ID_PATTERN.test(token)) return;
      if (!claimedBy.has(cellKey({ row: r, col: c }))) {
        errors.push(`Board cell ${formatCell({ row: r, col: c })} shows '${token}' but no vehicle ${token} occupies it`);
      }
    });
  });

  // Target vehicle warnings
  if (options.targetVehicle !== undefined) {
    const target = vehicles.find(v => v.id === options.targetVehicle);
    if (!target) {
      warnings.push(`Target vehicle ${options.targetVehicle} is not on the board; the puzzle has no solution`);
    } else if (target.orientation === 'vertical') {
      warnings.push(`Target vehicle ${options.targetVehicle} is vertical and can never reach the exit`);
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Check a vehicle table against a board size: unique ids, vehicle shapes and
 * no two vehicles on the same cell
 */
export function validateVehicleTable(
  size: number,
  vehicles: Iterable<Vehicle>,
  allowGaps: boolean
): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(size) || size < 1) {
    return [`Board size must be a positive integer, got ${size}`];
  }

  const seenIds = new Set<string>();
  const claimedBy = new Map<string, string>();
  for (const vehicle of vehicles) {
    if (seenIds.has(vehicle.id)) {
      errors.push(`Vehicle ${vehicle.id} is declared more than once`);
    }
    seenIds.add(vehicle.id);
    errors.push(...checkVehicleShape(vehicle, size, allowGaps));

    for (const cell of vehicle.cells) {
      if (!isInBounds(size, cell)) continue;

      const key = cellKey(cell);
      const owner = claimedBy.get(key);
      if (owner !== undefined && owner !== vehicle.id) {
        errors.push(`Cell ${formatCell(cell)} is claimed by both ${owner} and ${vehicle.id}`);
      } else {
        claimedBy.set(key, vehicle.id);
      }
    }
  }

  return errors;
}

/**
 * Check a single vehicle: id, bounds, axis alignment, ordering and contiguity
 */
export function checkVehicleShape(vehicle: Vehicle, size: number, allowGaps: boolean): string[] {
  const errors: string[] = [];
  const { id, cells, orientation } = vehicle;

  if (!VEHICLE_ID_PATTERN.test(id)) {
    errors.push(`Vehicle id '${id}' must be a single letter or digit`);
  }
  if (orientation !== 'horizontal' && orientation !== 'vertical') {
    errors.push(`Vehicle ${id} has unknown orientation '${String(orientation)}'`);
    return errors;
  }
  if (cells.length === 0) {
    errors.push(`Vehicle ${id} occupies no cells`);
    return errors;
  }

  for (const cell of cells) {
    if (!Number.isInteger(cell.row) || !Number.isInteger(cell.col)) {
      errors.push(`Vehicle ${id} cell ${formatCell(cell)} is not an integer coordinate`);
    } else if (!isInBounds(size, cell)) {
      errors.push(`Vehicle ${id} cell ${formatCell(cell)} is outside the ${size}x${size} board`);
    }
  }
  if (errors.length > 0) return errors;

  const fixed = (c: Cell) => (orientation === 'horizontal' ? c.row : c.col);
  const travel = (c: Cell) => (orientation === 'horizontal' ? c.col : c.row);

  if (cells.some(c => fixed(c) !== fixed(cells[0]))) {
    errors.push(`Vehicle ${id} is ${orientation} but its cells span more than one ${orientation === 'horizontal' ? 'row' : 'column'}`);
    return errors;
  }

  for (let i = 1; i < cells.length; i++) {
    const step = travel(cells[i]) - travel(cells[i - 1]);
    if (step <= 0) {
      errors.push(`Vehicle ${id} cells are not ordered head-to-tail`);
      break;
    }
    if (step > 1 && !allowGaps) {
      errors.push(`Vehicle ${id} cells are not contiguous`);
      break;
    }
  }

  return errors;
}

/**
 * Validate merged solver options
 */
export function validateSolverOptions(options: SolverOptions): ValidationResult {
  const errors: string[] = [];

  if (!Number.isFinite(options.unitCost) || options.unitCost < 0) {
    errors.push(`Unit cost must be a finite non-negative number, got ${options.unitCost}`);
  }
  if (!VEHICLE_ID_PATTERN.test(options.targetVehicle)) {
    errors.push(`Target vehicle id '${options.targetVehicle}' must be a single letter or digit`);
  }
  if (Number.isNaN(options.maxIterations) || options.maxIterations < 0) {
    errors.push(`Max iterations must be non-negative, got ${options.maxIterations}`);
  }
  if (Number.isNaN(options.maxTime) || options.maxTime < 0) {
    errors.push(`Max time must be non-negative, got ${options.maxTime}`);
  }

  return { valid: errors.length === 0, errors, warnings: [] };
}

/**
 * Collect every way a state breaks the board/vehicle invariants
 */
export function findStateViolations(state: PuzzleState): string[] {
  const violations: string[] = [];
  let occupied = 0;

  if (state.board.length !== state.size || state.board.some(row => row.length !== state.size)) {
    return [`Board is not ${state.size}x${state.size}`];
  }

  for (const id of state.vehicleIds) {
    const vehicle = state.vehicles.get(id);
    if (!vehicle) {
      violations.push(`Vehicle ${id} is listed but missing from the table`);
      continue;
    }

    // Gaps are allowed here: a moved vehicle keeps whatever shape it was loaded with
    const shapeErrors = checkVehicleShape(vehicle, state.size, true);
    if (shapeErrors.length > 0) {
      violations.push(...shapeErrors);
      continue;
    }

    for (const cell of vehicle.cells) {
      const token = state.board[cell.row][cell.col];
      if (token !== id) {
        violations.push(`Board cell ${formatCell(cell)} shows '${token}' but vehicle ${id} occupies it`);
      }
      occupied++;
    }
  }
  if (violations.length > 0) return violations;

  const marked = state.board.reduce(
    (count, row) => count + row.split('').filter(token => token !== EMPTY_CELL).length,
    0
  );
  if (marked !== occupied) {
    violations.push(`Board marks ${marked} occupied cells but vehicles cover ${occupied}`);
  }

  return violations;
}

/**
 * Abort loudly if a state breaks the board/vehicle invariants
 */
export function assertStateInvariants(state: PuzzleState): void {
  const violations = findStateViolations(state);
  if (violations.length > 0) {
    throw new InvariantViolationError(violations.join('; '));
  }
}
