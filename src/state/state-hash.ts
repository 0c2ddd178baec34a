/**
 * Canonical state keys for duplicate detection during search
 */

import type { Vehicle } from '../domain/types.js';
import type { PuzzleState } from './puzzle-state.js';

/**
 * Create the canonical key for a puzzle state.
 *
 * Vehicles are listed in id order as `<id><h|v><r,c;r,c...>`, joined by `|`,
 * followed by `#` and the board rows joined by `/`. Equal keys mean equal
 * configurations regardless of the order the vehicle table was built in.
 */
export function hashState(state: PuzzleState): string {
  const parts: string[] = [];

  for (const id of state.vehicleIds) {
    const vehicle = state.vehicles.get(id);
    if (vehicle) {
      parts.push(hashVehicle(vehicle));
    }
  }

  return `${parts.join('|')}#${hashBoard(state)}`;
}

function hashVehicle(vehicle: Vehicle): string {
  const axis = vehicle.orientation === 'horizontal' ? 'h' : 'v';
  const cells = vehicle.cells.map(c => `${c.row},${c.col}`).join(';');
  return `${vehicle.id}${axis}${cells}`;
}

/**
 * Board contents alone. Not a dedup key on its own: identity needs the vehicle table too.
 */
export function hashBoard(state: PuzzleState): string {
  return state.board.join('/');
}
