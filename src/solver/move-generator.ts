/**
 * Generate legal single-cell moves from the current state
 */

import type { Move, Vehicle } from '../domain/types.js';
import {
  type PuzzleState,
  canOccupy,
  directionsFor,
  moveVehicle,
  shiftCells,
  vehicleLength,
} from '../state/puzzle-state.js';

export interface Successor {
  state: PuzzleState;
  cost: number;
}

/**
 * Cost of one move: every slide costs the vehicle's full length times the unit cost
 */
export function moveCost(vehicle: Vehicle, unitCost: number): number {
  return vehicleLength(vehicle) * unitCost;
}

/**
 * Generate all legal moves, in vehicle id order, each vehicle trying
 * left/right or up/down
 */
export function generateLegalMoves(state: PuzzleState, unitCost: number): Move[] {
  const moves: Move[] = [];

  for (const id of state.vehicleIds) {
    const vehicle = state.vehicles.get(id);
    if (!vehicle) continue;

    for (const direction of directionsFor(vehicle.orientation)) {
      if (canOccupy(state, id, shiftCells(vehicle.cells, direction))) {
        moves.push({ vehicleId: id, direction, cost: moveCost(vehicle, unitCost) });
      }
    }
  }

  return moves;
}

/**
 * Generate every state one move away, paired with the move's cost
 */
export function generateSuccessors(state: PuzzleState, unitCost: number): Successor[] {
  return generateLegalMoves(state, unitCost).map(move => ({
    state: moveVehicle(state, move.vehicleId, move.direction),
    cost: move.cost,
  }));
}
