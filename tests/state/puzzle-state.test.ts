/**
 * Tests for puzzle state management
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  createPuzzleState,
  getCell,
  isCellEmpty,
  canOccupy,
  isGoalState,
  moveVehicle,
  resolveExit,
  directionsFor,
  shiftCells,
} from '../../src/state/puzzle-state.js';
import type { Vehicle } from '../../src/domain/types.js';
import { InvariantViolationError, MalformedInputError } from '../../src/domain/errors.js';

const X: Vehicle = { id: 'X', orientation: 'horizontal', cells: [{ row: 2, col: 2 }, { row: 2, col: 3 }] };
const A: Vehicle = { id: 'A', orientation: 'horizontal', cells: [{ row: 2, col: 0 }, { row: 2, col: 1 }] };
const B: Vehicle = { id: 'B', orientation: 'vertical', cells: [{ row: 0, col: 2 }, { row: 1, col: 2 }] };
const C: Vehicle = {
  id: 'C',
  orientation: 'vertical',
  cells: [{ row: 2, col: 4 }, { row: 3, col: 4 }, { row: 4, col: 4 }],
};

function malformedWith(...expected: string[]) {
  return (err: unknown) => {
    assert.ok(err instanceof MalformedInputError);
    assert.deepEqual(err.errors, expected);
    return true;
  };
}

function sampleState() {
  return createPuzzleState(6, [X, A, B, C]);
}

describe('Puzzle State Creation', () => {
  it('should derive the board from vehicle occupancy', () => {
    const state = sampleState();

    assert.deepEqual(state.board, [
      '..B...',
      '..B...',
      'AAXXC.',
      '....C.',
      '....C.',
      '......',
    ]);
  });

  it('should reject overlapping vehicles', () => {
    const X4: Vehicle = { id: 'X', orientation: 'horizontal', cells: [{ row: 1, col: 0 }, { row: 1, col: 1 }] };
    const A4: Vehicle = { id: 'A', orientation: 'vertical', cells: [{ row: 1, col: 1 }, { row: 2, col: 1 }] };

    assert.throws(
      () => createPuzzleState(4, [X4, A4]),
      malformedWith('Cell (1, 1) is claimed by both X and A')
    );
  });

  it('should reject a vehicle below the board', () => {
    const low: Vehicle = { id: 'X', orientation: 'horizontal', cells: [{ row: 7, col: 0 }, { row: 7, col: 1 }] };

    assert.throws(
      () => createPuzzleState(4, [low]),
      malformedWith(
        'Vehicle X cell (7, 0) is outside the 4x4 board',
        'Vehicle X cell (7, 1) is outside the 4x4 board'
      )
    );
  });

  it('should reject a vehicle past the right edge', () => {
    const wide: Vehicle = { id: 'X', orientation: 'horizontal', cells: [{ row: 1, col: 4 }, { row: 1, col: 5 }] };

    assert.throws(
      () => createPuzzleState(4, [wide]),
      malformedWith(
        'Vehicle X cell (1, 4) is outside the 4x4 board',
        'Vehicle X cell (1, 5) is outside the 4x4 board'
      )
    );
  });

  it('should reject cells off the vehicle axis', () => {
    const bent: Vehicle = { id: 'X', orientation: 'horizontal', cells: [{ row: 1, col: 0 }, { row: 2, col: 1 }] };

    assert.throws(
      () => createPuzzleState(4, [bent]),
      malformedWith('Vehicle X is horizontal but its cells span more than one row')
    );
  });

  it('should accept gapped vehicles only when allowed', () => {
    const gapped: Vehicle = { id: 'B', orientation: 'vertical', cells: [{ row: 0, col: 1 }, { row: 2, col: 1 }] };

    assert.throws(() => createPuzzleState(3, [gapped]), malformedWith('Vehicle B cells are not contiguous'));
    assert.deepEqual(createPuzzleState(3, [gapped], { allowGaps: true }).board, ['.B.', '...', '.B.']);
  });

  it('should reject an empty board size', () => {
    assert.throws(() => createPuzzleState(0, []), malformedWith('Board size must be a positive integer, got 0'));
  });

  it('should list vehicle ids in sorted order', () => {
    const state = sampleState();

    assert.deepEqual(state.vehicleIds, ['A', 'B', 'C', 'X']);
    assert.equal(state.vehicles.size, 4);
  });
});

describe('Cell Operations', () => {
  it('should return null for out-of-bounds cells', () => {
    const state = sampleState();

    assert.equal(getCell(state, { row: -1, col: 0 }), null);
    assert.equal(getCell(state, { row: 0, col: 6 }), null);
    assert.equal(getCell(state, { row: 6, col: 0 }), null);
  });

  it('should return cell contents', () => {
    const state = sampleState();

    assert.equal(getCell(state, { row: 2, col: 2 }), 'X');
    assert.equal(getCell(state, { row: 0, col: 0 }), '.');
  });

  it('should identify empty cells', () => {
    const state = sampleState();

    assert.equal(isCellEmpty(state, { row: 5, col: 5 }), true);
    assert.equal(isCellEmpty(state, { row: 2, col: 2 }), false);
    assert.equal(isCellEmpty(state, { row: 9, col: 9 }), false);
  });
});

describe('Occupancy', () => {
  it('should reject a destination held by another vehicle', () => {
    const state = sampleState();

    assert.equal(canOccupy(state, 'X', [{ row: 2, col: 3 }, { row: 2, col: 4 }]), false);
  });

  it('should accept cells the moving vehicle already covers', () => {
    const state = sampleState();

    assert.equal(canOccupy(state, 'C', [{ row: 3, col: 4 }, { row: 4, col: 4 }, { row: 5, col: 4 }]), true);
    assert.equal(canOccupy(state, 'C', [{ row: 1, col: 4 }, { row: 2, col: 4 }, { row: 3, col: 4 }]), true);
  });

  it('should reject cells off the board', () => {
    const state = sampleState();

    assert.equal(canOccupy(state, 'A', [{ row: 2, col: -1 }, { row: 2, col: 0 }]), false);
  });
});

describe('Goal Test', () => {
  it('should not treat the initial state as solved', () => {
    assert.equal(isGoalState(sampleState(), 'X', 5), false);
  });

  it('should accept a target whose cells reach the exit column', () => {
    const solved: Vehicle = { ...X, cells: [{ row: 2, col: 4 }, { row: 2, col: 5 }] };
    const state = createPuzzleState(6, [solved, A]);

    assert.equal(isGoalState(state, 'X', 5), true);
  });

  it('should accept a target whose tail, not head, is in the exit column', () => {
    const longTarget: Vehicle = {
      id: 'X',
      orientation: 'horizontal',
      cells: [{ row: 2, col: 3 }, { row: 2, col: 4 }, { row: 2, col: 5 }],
    };
    const state = createPuzzleState(6, [longTarget]);

    assert.equal(isGoalState(state, 'X', 5), true);
  });

  it('should never accept a vertical target', () => {
    const vertical: Vehicle = {
      id: 'X',
      orientation: 'vertical',
      cells: [{ row: 1, col: 5 }, { row: 2, col: 5 }],
    };
    const state = createPuzzleState(6, [vertical]);

    assert.equal(isGoalState(state, 'X', 5), false);
  });

  it('should not accept a board without the target', () => {
    const state = createPuzzleState(6, [A, C]);

    assert.equal(isGoalState(state, 'X', 5), false);
  });

  it('should honour a custom exit column', () => {
    assert.equal(isGoalState(sampleState(), 'X', 3), true);
  });
});

describe('Vehicle Movement', () => {
  it('should produce a new state and leave the parent untouched', () => {
    const state = sampleState();
    const next = moveVehicle(state, 'C', 'down');

    assert.deepEqual(next.board, [
      '..B...',
      '..B...',
      'AAXX..',
      '....C.',
      '....C.',
      '....C.',
    ]);
    assert.deepEqual(next.vehicles.get('C')?.cells, [
      { row: 3, col: 4 },
      { row: 4, col: 4 },
      { row: 5, col: 4 },
    ]);

    assert.equal(state.board[2], 'AAXXC.');
    assert.deepEqual(state.vehicles.get('C')?.cells, C.cells);
  });

  it('should share untouched vehicles with the parent', () => {
    const state = sampleState();
    const next = moveVehicle(state, 'C', 'up');

    assert.equal(next.vehicles.get('X'), state.vehicles.get('X'));
    assert.equal(next.vehicles.get('A'), state.vehicles.get('A'));
    assert.notEqual(next.vehicles.get('C'), state.vehicles.get('C'));
    assert.equal(next.vehicleIds, state.vehicleIds);
  });

  it('should refuse a move across the vehicle axis', () => {
    assert.throws(() => moveVehicle(sampleState(), 'X', 'up'), InvariantViolationError);
  });

  it('should refuse an unknown vehicle', () => {
    assert.throws(() => moveVehicle(sampleState(), 'Z', 'left'), InvariantViolationError);
  });
});

describe('Direction Helpers', () => {
  it('should map orientations to their axis directions', () => {
    assert.deepEqual(directionsFor('horizontal'), ['left', 'right']);
    assert.deepEqual(directionsFor('vertical'), ['up', 'down']);
  });

  it('should shift every cell one step', () => {
    assert.deepEqual(shiftCells(A.cells, 'right'), [{ row: 2, col: 1 }, { row: 2, col: 2 }]);
    assert.deepEqual(shiftCells(B.cells, 'up'), [{ row: -1, col: 2 }, { row: 0, col: 2 }]);
  });
});

describe('Exit Resolution', () => {
  it('should default to the middle row and rightmost column', () => {
    assert.deepEqual(resolveExit(sampleState(), {}), { row: 3, col: 5 });
  });

  it('should accept an explicit exit', () => {
    assert.deepEqual(resolveExit(sampleState(), { exitRow: 2, exitColumn: 4 }), { row: 2, col: 4 });
  });

  it('should reject an exit off the board', () => {
    assert.throws(
      () => resolveExit(sampleState(), { exitColumn: 9 }),
      (err: unknown) =>
        err instanceof MalformedInputError &&
        err.errors[0] === 'Exit column 9 is outside the 6x6 board'
    );
  });
});
