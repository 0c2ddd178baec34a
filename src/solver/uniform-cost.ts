/**
 * Uniform-cost search for Rush Hour
 */

import type { SearchStats, SearchStatus, Solution, SolverOptions } from '../domain/types.js';
import { DEFAULT_SOLVER_OPTIONS } from '../domain/constants.js';
import { InvariantViolationError, MalformedInputError } from '../domain/errors.js';
import { type PuzzleState, isGoalState, resolveExit } from '../state/puzzle-state.js';
import { hashState } from '../state/state-hash.js';
import { assertStateInvariants, findStateViolations, validateSolverOptions } from '../constraints/validator.js';
import {
  type SearchNode,
  PriorityQueue,
  compareSearchNodes,
  createSearchNode,
  extractMovePath,
} from './search-node.js';
import { generateSuccessors } from './move-generator.js';
import { buildSteps, diffStates } from './path-reconstructor.js';

/**
 * Find a minimum-cost move sequence that brings the target vehicle to the exit column.
 *
 * Expands the cheapest unexplored state first, so the first goal popped is optimal.
 * Frontier ties are broken by canonical key. Running out of frontier is a normal
 * NO_SOLUTION result; limits and cancellation stop the search without a verdict.
 */
export function uniformCostSearch(
  initialState: PuzzleState,
  options: Partial<SolverOptions> = {}
): Solution {
  const opts: SolverOptions = { ...DEFAULT_SOLVER_OPTIONS, ...options };

  const validation = validateSolverOptions(opts);
  if (!validation.valid) {
    throw new MalformedInputError(validation.errors);
  }
  const exit = resolveExit(initialState, opts);

  // A hand-built root is checked like parsed input, before any expansion
  const violations = findStateViolations(initialState);
  if (violations.length > 0) {
    throw new MalformedInputError(violations);
  }

  const startTime = Date.now();

  const repository = new Map<string, PuzzleState>();
  const explored = new Set<string>();
  const bestCost = new Map<string, number>();
  const frontier = new PriorityQueue<SearchNode>(compareSearchNodes);

  const rootKey = hashState(initialState);
  repository.set(rootKey, initialState);
  bestCost.set(rootKey, 0);
  frontier.push(createSearchNode(rootKey, null, null, 0));

  let nodesExplored = 0;
  let nodesGenerated = 0;

  const stats = (optimalityGuarantee: boolean): SearchStats => ({
    nodesExplored,
    nodesGenerated,
    statesStored: repository.size,
    timeTaken: Date.now() - startTime,
    optimalityGuarantee,
  });

  while (!frontier.isEmpty()) {
    if (opts.shouldCancel?.()) {
      return buildFailure('CANCELLED', stats(false));
    }

    // Check time limit
    if (Date.now() - startTime > opts.maxTime) {
      return buildFailure('LIMIT_REACHED', stats(false));
    }

    // Check iteration limit
    if (nodesExplored >= opts.maxIterations) {
      return buildFailure('LIMIT_REACHED', stats(false));
    }

    const current = frontier.pop();
    if (!current) break;

    // Stale duplicate: only the first pop of a key counts
    if (explored.has(current.key)) continue;
    explored.add(current.key);

    const state = repository.get(current.key);
    if (!state) {
      throw new InvariantViolationError(`State ${current.key} is missing from the repository`);
    }
    nodesExplored++;

    if (isGoalState(state, opts.targetVehicle, exit.col)) {
      return buildSolution(current, state, stats(true));
    }

    for (const successor of generateSuccessors(state, opts.unitCost)) {
      nodesGenerated++;

      if (opts.verifyStates) {
        assertStateInvariants(successor.state);
      }

      const key = hashState(successor.state);
      if (explored.has(key)) continue;

      const newCost = current.cost + successor.cost;
      const known = bestCost.get(key);
      if (known !== undefined && known <= newCost) continue;
      bestCost.set(key, newCost);

      if (!repository.has(key)) {
        repository.set(key, successor.state);
      }

      const move = diffStates(state, successor.state, successor.cost);
      frontier.push(createSearchNode(key, current, move, newCost));
    }
  }

  return buildFailure('NO_SOLUTION', stats(true));
}

/**
 * Build a Solution from the goal node
 */
function buildSolution(node: SearchNode, finalState: PuzzleState, stats: SearchStats): Solution {
  const moves = extractMovePath(node);

  return {
    found: true,
    status: 'SOLVED',
    moves,
    steps: buildSteps(moves),
    totalCost: node.cost,
    finalState,
    stats,
    summary: `Solved in ${moves.length} moves with total cost ${node.cost}`,
  };
}

function buildFailure(status: Exclude<SearchStatus, 'SOLVED'>, stats: SearchStats): Solution {
  return {
    found: false,
    status,
    moves: [],
    steps: [],
    totalCost: Infinity,
    finalState: null,
    stats,
    summary: generateFailureSummary(status, stats),
  };
}

function generateFailureSummary(status: Exclude<SearchStatus, 'SOLVED'>, stats: SearchStats): string {
  switch (status) {
    case 'NO_SOLUTION':
      return `No solution: all ${stats.nodesExplored} reachable states explored`;
    case 'LIMIT_REACHED':
      return `Search stopped after ${stats.nodesExplored} expansions without reaching the exit`;
    case 'CANCELLED':
      return `Search cancelled after ${stats.nodesExplored} expansions`;
  }
}
