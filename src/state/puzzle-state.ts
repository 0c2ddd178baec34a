/**
 * Puzzle state representation and management
 */

import {
  type Cell,
  type Direction,
  type Orientation,
  type SolverOptions,
  type Vehicle,
  isInBounds,
} from '../domain/types.js';
import { DIRECTION_DELTAS, EMPTY_CELL } from '../domain/constants.js';
import { InvariantViolationError, MalformedInputError } from '../domain/errors.js';
import { validateVehicleTable } from '../constraints/validator.js';

/**
 * One configuration of the puzzle. Never mutated after creation: moves produce
 * a new state that shares every untouched row string and Vehicle with its parent.
 */
export interface PuzzleState {
  readonly size: number;
  readonly board: readonly string[];
  readonly vehicles: ReadonlyMap<string, Vehicle>;
  readonly vehicleIds: readonly string[];
}

export interface PuzzleStateOptions {
  allowGaps?: boolean; // accept vehicles whose cells skip over others
}

/**
 * Create a state from a vehicle table. The board is derived from vehicle
 * occupancy. A table that breaks the vehicle rules (shape, bounds, overlap)
 * is rejected before any state exists.
 */
export function createPuzzleState(
  size: number,
  vehicles: Iterable<Vehicle>,
  options: PuzzleStateOptions = {}
): PuzzleState {
  const table = [...vehicles];
  const errors = validateVehicleTable(size, table, options.allowGaps ?? false);
  if (errors.length > 0) {
    throw new MalformedInputError(errors);
  }

  const grid: string[][] = [];
  for (let row = 0; row < size; row++) {
    grid.push(new Array<string>(size).fill(EMPTY_CELL));
  }

  const byId = new Map<string, Vehicle>();
  for (const vehicle of table) {
    byId.set(vehicle.id, vehicle);
    for (const cell of vehicle.cells) {
      grid[cell.row][cell.col] = vehicle.id;
    }
  }

  return {
    size,
    board: grid.map(row => row.join('')),
    vehicles: byId,
    vehicleIds: [...byId.keys()].sort(compareIds),
  };
}

/**
 * Code-unit ordering, independent of locale
 */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Get the content of a cell: EMPTY_CELL, a vehicle id, or null off the board
 */
export function getCell(state: PuzzleState, cell: Cell): string | null {
  if (!isInBounds(state.size, cell)) {
    return null;
  }
  return state.board[cell.row][cell.col];
}

export function isCellEmpty(state: PuzzleState, cell: Cell): boolean {
  return getCell(state, cell) === EMPTY_CELL;
}

export function getVehicle(state: PuzzleState, vehicleId: string): Vehicle | null {
  return state.vehicles.get(vehicleId) ?? null;
}

export function vehicleLength(vehicle: Vehicle): number {
  return vehicle.cells.length;
}

/**
 * Check whether a vehicle may cover every cell in a destination set. Cells the
 * vehicle already covers count as free.
 */
export function canOccupy(state: PuzzleState, vehicleId: string, cells: readonly Cell[]): boolean {
  for (const cell of cells) {
    const content = getCell(state, cell);
    if (content === null) return false;
    if (content !== EMPTY_CELL && content !== vehicleId) return false;
  }
  return true;
}

/**
 * Goal test: the target vehicle is horizontal and any of its cells sits in
 * the exit column.
 */
export function isGoalState(state: PuzzleState, targetVehicle: string, exitColumn: number): boolean {
  const target = state.vehicles.get(targetVehicle);
  if (!target || target.orientation !== 'horizontal') {
    return false;
  }
  return target.cells.some(cell => cell.col === exitColumn);
}

export function directionsFor(orientation: Orientation): readonly [Direction, Direction] {
  return orientation === 'horizontal' ? ['left', 'right'] : ['up', 'down'];
}

export function shiftCells(cells: readonly Cell[], direction: Direction): Cell[] {
  const { dRow, dCol } = DIRECTION_DELTAS[direction];
  return cells.map(cell => ({ row: cell.row + dRow, col: cell.col + dCol }));
}

/**
 * Slide a vehicle one cell. Legality is the caller's job (see canOccupy).
 */
export function moveVehicle(state: PuzzleState, vehicleId: string, direction: Direction): PuzzleState {
  const vehicle = state.vehicles.get(vehicleId);
  if (!vehicle) {
    throw new InvariantViolationError(`Vehicle ${vehicleId} is not on the board`);
  }
  if (!directionsFor(vehicle.orientation).includes(direction)) {
    throw new InvariantViolationError(
      `Vehicle ${vehicleId} is ${vehicle.orientation} and cannot move ${direction}`
    );
  }

  const moved: Vehicle = { ...vehicle, cells: shiftCells(vehicle.cells, direction) };

  // Only the rows the vehicle leaves or enters are rebuilt
  const touched = new Map<number, string[]>();
  const rowChars = (row: number): string[] => {
    let chars = touched.get(row);
    if (!chars) {
      chars = state.board[row].split('');
      touched.set(row, chars);
    }
    return chars;
  };

  for (const cell of vehicle.cells) {
    rowChars(cell.row)[cell.col] = EMPTY_CELL;
  }
  for (const cell of moved.cells) {
    rowChars(cell.row)[cell.col] = vehicleId;
  }

  const board = state.board.slice();
  for (const [row, chars] of touched) {
    board[row] = chars.join('');
  }

  const vehicles = new Map(state.vehicles);
  vehicles.set(vehicleId, moved);

  return {
    size: state.size,
    board,
    vehicles,
    vehicleIds: state.vehicleIds,
  };
}

/**
 * Resolve the exit cell for a board, applying the defaults: the middle row
 * and the rightmost column
 */
export function resolveExit(
  state: PuzzleState,
  options: Pick<SolverOptions, 'exitRow' | 'exitColumn'>
): Cell {
  const exit: Cell = {
    row: options.exitRow ?? Math.floor(state.size / 2),
    col: options.exitColumn ?? state.size - 1,
  };

  const errors: string[] = [];
  if (!Number.isInteger(exit.row) || exit.row < 0 || exit.row >= state.size) {
    errors.push(`Exit row ${exit.row} is outside the ${state.size}x${state.size} board`);
  }
  if (!Number.isInteger(exit.col) || exit.col < 0 || exit.col >= state.size) {
    errors.push(`Exit column ${exit.col} is outside the ${state.size}x${state.size} board`);
  }
  if (errors.length > 0) {
    throw new MalformedInputError(errors);
  }

  return exit;
}
