/**
 * Parse puzzle state from JSON vehicle tables and ASCII grids
 */

import type { Cell, Orientation, Vehicle } from '../domain/types.js';
import { VEHICLE_ID_PATTERN } from '../domain/constants.js';
import { MalformedInputError } from '../domain/errors.js';
import { type PuzzleState, createPuzzleState } from '../state/puzzle-state.js';
import { validatePuzzle } from '../constraints/validator.js';

/**
 * Vehicle entry: (row, col) pairs head-to-tail plus the axis of travel
 */
export interface VehicleInput {
  positions: [number, number][];
  orientation: Orientation;
}

/**
 * Input format for a puzzle. Rows are compact ("AAXXC."), space-separated
 * ("A A X X C .") or arrays of one-character cells. Without a vehicle table,
 * vehicles are derived from the board.
 */
export interface PuzzleInput {
  board: (string | string[])[];
  vehicles?: Record<string, VehicleInput>;
}

export interface ParseOptions {
  allowGaps?: boolean;     // accept vehicles whose cells skip over others
  targetVehicle?: string;  // only used for warnings
}

export interface LoadedPuzzle {
  state: PuzzleState;
  warnings: string[];
}

/**
 * Validate input and build the initial state
 */
export function loadPuzzle(input: PuzzleInput, options: ParseOptions = {}): LoadedPuzzle {
  const grid = input.board.map(row => (typeof row === 'string' ? splitRow(row) : [...row]));

  const derived = input.vehicles
    ? { vehicles: vehiclesFromTable(input.vehicles), errors: [] }
    : deriveVehicles(grid);
  if (derived.errors.length > 0) {
    throw new MalformedInputError(derived.errors);
  }

  const validation = validatePuzzle(grid, derived.vehicles, options);
  if (!validation.valid) {
    throw new MalformedInputError(validation.errors);
  }

  return {
    state: createPuzzleState(grid.length, derived.vehicles, { allowGaps: options.allowGaps }),
    warnings: validation.warnings,
  };
}

/**
 * Create a puzzle state from structured input
 */
export function createPuzzleFromInput(input: PuzzleInput, options: ParseOptions = {}): PuzzleState {
  return loadPuzzle(input, options).state;
}

/**
 * Parse JSON input into a puzzle state
 */
export function parsePuzzleFromJSON(json: string, options: ParseOptions = {}): PuzzleState {
  return loadPuzzle(readPuzzleJSON(json), options).state;
}

/**
 * Parse a plain text grid, one row per line, '.' for empty cells:
 * ```
 * ......
 * ..B.C.
 * AAXXC.
 * ```
 * Vehicles are derived from runs of the same letter.
 */
export function parseTextGrid(text: string, options: ParseOptions = {}): PuzzleState {
  return loadPuzzle(readTextGrid(text), options).state;
}

/**
 * Read a text grid into the structured input format
 */
export function readTextGrid(text: string): PuzzleInput {
  const board = text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);

  return { board };
}

/**
 * Read and shape-check JSON input
 */
export function readPuzzleJSON(json: string): PuzzleInput {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new MalformedInputError([`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return readPuzzleInput(raw);
}

/**
 * Narrow an arbitrary value to PuzzleInput, collecting every shape problem
 */
export function readPuzzleInput(value: unknown): PuzzleInput {
  if (!isRecord(value)) {
    throw new MalformedInputError(['Puzzle input must be a JSON object']);
  }

  const errors: string[] = [];
  const board: (string | string[])[] = [];

  if (!Array.isArray(value.board)) {
    errors.push('"board" must be an array of rows');
  } else {
    const rows: unknown[] = value.board;
    rows.forEach((row, r) => {
      if (typeof row === 'string') {
        board.push(row);
      } else if (Array.isArray(row) && row.every((cell): cell is string => typeof cell === 'string')) {
        board.push(row);
      } else {
        errors.push(`Board row ${r} must be a string or an array of strings`);
      }
    });
  }

  // Kept as entries so a "__proto__" key stays an own property
  let vehicles: [string, VehicleInput][] | undefined;
  if (value.vehicles !== undefined) {
    if (!isRecord(value.vehicles)) {
      errors.push('"vehicles" must be an object keyed by vehicle id');
    } else {
      vehicles = [];
      for (const [id, entry] of Object.entries(value.vehicles)) {
        const vehicle = readVehicleInput(id, entry, errors);
        if (vehicle) {
          vehicles.push([id, vehicle]);
        }
      }
    }
  }

  if (errors.length > 0) {
    throw new MalformedInputError(errors);
  }

  return vehicles ? { board, vehicles: Object.fromEntries(vehicles) } : { board };
}

function readVehicleInput(id: string, entry: unknown, errors: string[]): VehicleInput | null {
  if (!isRecord(entry)) {
    errors.push(`Vehicle ${id} must be an object with positions and orientation`);
    return null;
  }

  const { orientation } = entry;
  if (!isOrientation(orientation)) {
    errors.push(`Vehicle ${id} orientation must be "horizontal" or "vertical"`);
    return null;
  }

  if (!Array.isArray(entry.positions)) {
    errors.push(`Vehicle ${id} positions must be an array of [row, col] pairs`);
    return null;
  }

  const positions: [number, number][] = [];
  const rawPositions: unknown[] = entry.positions;
  for (const position of rawPositions) {
    if (!isCellPair(position)) {
      errors.push(`Vehicle ${id} positions must be an array of [row, col] pairs`);
      return null;
    }
    positions.push([position[0], position[1]]);
  }

  return { positions, orientation };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOrientation(value: unknown): value is Orientation {
  return value === 'horizontal' || value === 'vertical';
}

function isCellPair(value: unknown): value is [number, number] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number'
  );
}

function splitRow(row: string): string[] {
  const trimmed = row.trim();
  return /\s/.test(trimmed) ? trimmed.split(/\s+/) : trimmed.split('');
}

function vehiclesFromTable(table: Record<string, VehicleInput>): Vehicle[] {
  return Object.entries(table).map(([id, entry]) => ({
    id,
    orientation: entry.orientation,
    cells: entry.positions.map(([row, col]) => ({ row, col })),
  }));
}

/**
 * Group board cells by vehicle id. Row-major scanning leaves each vehicle's
 * cells ordered head-to-tail.
 */
function deriveVehicles(grid: readonly (readonly string[])[]): { vehicles: Vehicle[]; errors: string[] } {
  const cellsById = new Map<string, Cell[]>();

  grid.forEach((row, r) => {
    row.forEach((token, c) => {
      if (!VEHICLE_ID_PATTERN.test(token)) return;
      const cells = cellsById.get(token) ?? [];
      cells.push({ row: r, col: c });
      cellsById.set(token, cells);
    });
  });

  const vehicles: Vehicle[] = [];
  const errors: string[] = [];

  for (const [id, cells] of cellsById) {
    if (cells.length < 2) {
      errors.push(`Vehicle ${id} occupies a single cell; its orientation is ambiguous`);
    } else if (cells.every(c => c.row === cells[0].row)) {
      vehicles.push({ id, cells, orientation: 'horizontal' });
    } else if (cells.every(c => c.col === cells[0].col)) {
      vehicles.push({ id, cells, orientation: 'vertical' });
    } else {
      errors.push(`Vehicle ${id} cells are not in a single row or column`);
    }
  }

  return { vehicles, errors };
}

/**
 * Export state to JSON format
 */
export function exportPuzzleToJSON(state: PuzzleState): string {
  const vehicles: Record<string, VehicleInput> = {};

  for (const id of state.vehicleIds) {
    const vehicle = state.vehicles.get(id);
    if (!vehicle) continue;
    vehicles[id] = {
      positions: vehicle.cells.map((c): [number, number] => [c.row, c.col]),
      orientation: vehicle.orientation,
    };
  }

  const output: PuzzleInput = { board: [...state.board], vehicles };
  return JSON.stringify(output, null, 2);
}
