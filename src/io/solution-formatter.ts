/**
 * Format solutions for human-readable output
 */

import type { SearchStats, Solution, SolutionStep } from '../domain/types.js';
import type { PuzzleState } from '../state/puzzle-state.js';

/**
 * Format a complete solution for console output
 */
export function formatSolution(solution: Solution): string {
  const lines: string[] = [];

  lines.push('=== RUSH HOUR SOLUTION ===');
  lines.push('');

  if (solution.found) {
    if (solution.steps.length === 0) {
      lines.push('The target vehicle already reaches the exit.');
    }
    for (const step of solution.steps) {
      lines.push(formatStep(step));
    }
  } else {
    lines.push(solution.summary);
  }
  lines.push('');

  lines.push('=== SEARCH STATISTICS ===');
  lines.push(formatStats(solution.stats));
  lines.push('');

  if (solution.found) {
    lines.push(`VERDICT: Solved with total cost ${solution.totalCost} in ${solution.steps.length} moves`);
  } else if (solution.status === 'NO_SOLUTION') {
    lines.push('VERDICT: No solution exists');
  } else {
    lines.push('VERDICT: Unknown - search stopped before a verdict');
  }

  return lines.join('\n');
}

/**
 * Format a single solution step
 */
export function formatStep(step: SolutionStep): string {
  return `Step ${step.stepNumber}: Move ${step.vehicleId} ${step.direction} (cost: ${step.cumulativeCost})`;
}

/**
 * Format search statistics
 */
export function formatStats(stats: SearchStats): string {
  const lines: string[] = [];

  lines.push(`Nodes Explored: ${stats.nodesExplored.toLocaleString('en-US')}`);
  lines.push(`Nodes Generated: ${stats.nodesGenerated.toLocaleString('en-US')}`);
  lines.push(`States Stored: ${stats.statesStored.toLocaleString('en-US')}`);
  lines.push(`Time Taken: ${stats.timeTaken}ms`);
  lines.push(`Optimality Guarantee: ${stats.optimalityGuarantee ? 'Yes' : 'No (search stopped early)'}`);

  return lines.join('\n');
}

/**
 * Format a puzzle state as a bordered ASCII grid. The exit row, when given,
 * is marked with '>' on the right border.
 */
export function formatGrid(state: PuzzleState, exitRow?: number): string {
  const border = `+${'-'.repeat(state.size * 2 + 1)}+`;
  const lines: string[] = [border];

  state.board.forEach((row, r) => {
    lines.push(`| ${row.split('').join(' ')} ${r === exitRow ? '>' : '|'}`);
  });

  lines.push(border);
  return lines.join('\n');
}

/**
 * Format a compact solution summary
 */
export function formatCompactSummary(solution: Solution): string {
  const status = solution.found ? '✓ SOLVED' : `✗ ${solution.status}`;
  const cost = solution.found ? `cost ${solution.totalCost}` : 'cost ∞';

  return `${status} | ${solution.steps.length} moves | ${cost} | ${solution.stats.nodesExplored} nodes explored`;
}

/**
 * Format solution as JSON. Infinity has no JSON form, so an unsolved
 * total cost is written as null.
 */
export function formatSolutionJSON(solution: Solution): string {
  return JSON.stringify({
    found: solution.found,
    status: solution.status,
    totalCost: solution.found ? solution.totalCost : null,
    movesCount: solution.steps.length,
    stats: solution.stats,
    steps: solution.steps.map(s => ({
      step: s.stepNumber,
      vehicle: s.vehicleId,
      direction: s.direction,
      cost: s.cost,
      cumulativeCost: s.cumulativeCost,
    })),
    summary: solution.summary,
  }, null, 2);
}
