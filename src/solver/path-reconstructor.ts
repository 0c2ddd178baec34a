/**
 * Turn expansions into a readable move list
 */

import type { Cell, Direction, Move, SolutionStep, Vehicle } from '../domain/types.js';
import { cellsEqual, formatCell } from '../domain/types.js';
import { InvariantViolationError, MalformedInputError } from '../domain/errors.js';
import {
  type PuzzleState,
  canOccupy,
  directionsFor,
  moveVehicle,
  shiftCells,
} from '../state/puzzle-state.js';

/**
 * Name the move that turns a parent state into a direct child by diffing
 * vehicle positions. Exactly one vehicle may differ, by exactly one cell.
 */
export function diffStates(parent: PuzzleState, child: PuzzleState, cost: number): Move {
  const changed: Vehicle[] = [];

  for (const id of parent.vehicleIds) {
    const before = parent.vehicles.get(id);
    const after = child.vehicles.get(id);
    if (!before || !after) {
      throw new InvariantViolationError(`Vehicle ${id} is missing from one side of a transition`);
    }
    // Untouched vehicles are shared between parent and child
    if (before !== after && !sameCells(before.cells, after.cells)) {
      changed.push(before);
    }
  }

  if (changed.length !== 1) {
    throw new InvariantViolationError(
      `Expected exactly one vehicle to move between states, found ${changed.length}`
    );
  }

  const [vehicle] = changed;
  const after = child.vehicles.get(vehicle.id);
  if (!after) {
    throw new InvariantViolationError(`Vehicle ${vehicle.id} vanished during a transition`);
  }

  return { vehicleId: vehicle.id, direction: headDirection(vehicle, after.cells[0]), cost };
}

function sameCells(a: readonly Cell[], b: readonly Cell[]): boolean {
  return a.length === b.length && a.every((cell, i) => cellsEqual(cell, b[i]));
}

function headDirection(vehicle: Vehicle, newHead: Cell): Direction {
  const oldHead = vehicle.cells[0];
  const dRow = newHead.row - oldHead.row;
  const dCol = newHead.col - oldHead.col;

  if (vehicle.orientation === 'horizontal' && dRow === 0 && Math.abs(dCol) === 1) {
    return dCol > 0 ? 'right' : 'left';
  }
  if (vehicle.orientation === 'vertical' && dCol === 0 && Math.abs(dRow) === 1) {
    return dRow > 0 ? 'down' : 'up';
  }

  throw new InvariantViolationError(
    `Vehicle ${vehicle.id} head moved from ${formatCell(oldHead)} to ${formatCell(newHead)}, not one cell along its axis`
  );
}

/**
 * Number moves and accumulate their costs
 */
export function buildSteps(moves: readonly Move[]): SolutionStep[] {
  const steps: SolutionStep[] = [];
  let cumulativeCost = 0;

  moves.forEach((move, i) => {
    cumulativeCost += move.cost;
    steps.push({
      stepNumber: i + 1,
      vehicleId: move.vehicleId,
      direction: move.direction,
      cost: move.cost,
      cumulativeCost,
    });
  });

  return steps;
}

/**
 * Apply a move after checking it is legal from the given state
 */
export function applyMove(state: PuzzleState, move: Pick<Move, 'vehicleId' | 'direction'>): PuzzleState {
  const vehicle = state.vehicles.get(move.vehicleId);
  if (!vehicle) {
    throw new MalformedInputError([`Vehicle ${move.vehicleId} is not on the board`]);
  }
  if (!directionsFor(vehicle.orientation).includes(move.direction)) {
    throw new MalformedInputError([
      `Vehicle ${move.vehicleId} is ${vehicle.orientation} and cannot move ${move.direction}`,
    ]);
  }
  if (!canOccupy(state, vehicle.id, shiftCells(vehicle.cells, move.direction))) {
    throw new MalformedInputError([`Vehicle ${move.vehicleId} is blocked moving ${move.direction}`]);
  }

  return moveVehicle(state, move.vehicleId, move.direction);
}

/**
 * Replay a move list from a starting state
 */
export function replayMoves(
  state: PuzzleState,
  moves: readonly Pick<Move, 'vehicleId' | 'direction'>[]
): PuzzleState {
  return moves.reduce(applyMove, state);
}
