/**
 * Error types raised by the solver
 */

/**
 * Puzzle input or solver options that cannot be searched.
 * Raised before the search starts.
 */
export class MalformedInputError extends Error {
  constructor(public readonly errors: string[]) {
    super(`Malformed puzzle input: ${errors.join('; ')}`);
    this.name = 'MalformedInputError';
  }
}

/**
 * A generated state broke the board/vehicle invariants. Indicates a solver bug.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}
