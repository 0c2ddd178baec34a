#!/usr/bin/env node
/**
 * Rush Hour Solver - CLI Interface
 */

import * as fs from 'fs';

import { MalformedInputError } from '../domain/errors.js';
import { resolveExit } from '../state/puzzle-state.js';
import { RushHourSolver, analyzePuzzle } from '../solver/solver.js';
import { type LoadedPuzzle, loadPuzzle, readPuzzleJSON, readTextGrid } from '../io/state-parser.js';
import {
  formatSolution,
  formatGrid,
  formatCompactSummary,
  formatSolutionJSON,
} from '../io/solution-formatter.js';
import { type CLIOptions, parseArgs, solverOptions } from './args.js';

const args = process.argv.slice(2);

function printHelp(): void {
  console.log(`
Rush Hour Solver
================

Finds a minimum-cost sequence of moves that drives the target vehicle
to the exit. Every single-cell slide costs vehicle length x unit cost.

USAGE:
  rush-hour-solver <command> [options]

COMMANDS:
  solve       Solve a puzzle and print the move sequence
  analyze     Show blocking vehicles and legal moves without solving
  help        Show this help message

OPTIONS:
  -i, --input <file>        Puzzle file (JSON format)
  -g, --grid <file>         Puzzle file (plain text grid)
  -f, --format <type>       Output format: text (default) or json
  -c, --unit-cost <n>       Cost per cell of vehicle length (default: 1)
  --target <id>             Target vehicle id (default: X)
  --exit-row <n>            Exit row, marked '>' on the grid (default: middle)
  --exit-column <n>         Exit column (default: rightmost)
  --max-iterations <n>      Maximum state expansions (default: 1000000)
  -t, --time <seconds>      Maximum solve time in seconds (default: 60)
  --allow-gaps              Accept vehicles whose cells are not contiguous
  --verify                  Check board invariants on every generated state
  -h, --help                Show help

EXAMPLES:
  rush-hour-solver solve -i puzzle.json
  rush-hour-solver solve -g puzzle.txt --unit-cost 2 -f json
  rush-hour-solver analyze -g puzzle.txt

INPUT FILE FORMAT (JSON):
  {
    "board": ["......", "..B.C.", "AAXXC.", "..B.C.", "......", "......"],
    "vehicles": {
      "X": { "positions": [[2, 2], [2, 3]], "orientation": "horizontal" }
    }
  }
  "vehicles" is optional; without it vehicles are read off the board.

INPUT FILE FORMAT (text grid):
  One row per line, '.' for empty cells, one letter or digit per vehicle.
`);
}

function loadInput(options: CLIOptions): LoadedPuzzle {
  const parseOptions = { allowGaps: options.allowGaps, targetVehicle: options.targetVehicle };

  if (options.inputFile) {
    const content = fs.readFileSync(options.inputFile, 'utf-8');
    return loadPuzzle(readPuzzleJSON(content), parseOptions);
  }
  if (options.gridFile) {
    const content = fs.readFileSync(options.gridFile, 'utf-8');
    return loadPuzzle(readTextGrid(content), parseOptions);
  }

  throw new MalformedInputError(['Must provide either --input or --grid']);
}

function printWarnings(warnings: string[]): void {
  if (warnings.length === 0) return;
  console.log('Warnings:');
  warnings.forEach(w => console.log(`  - ${w}`));
  console.log('');
}

function runSolve(options: CLIOptions): number {
  const { state, warnings } = loadInput(options);
  const solverOpts = solverOptions(options);
  const exit = resolveExit(state, solverOpts);

  if (options.outputFormat === 'text') {
    printWarnings(warnings);
    console.log('Starting Rush Hour solver...');
    console.log(`Target vehicle: ${options.targetVehicle}`);
    console.log(`Unit cost: ${options.unitCost}`);
    console.log(`Max iterations: ${options.maxIterations.toLocaleString('en-US')}`);
    console.log(`Max time: ${options.maxTime / 1000}s`);
    console.log('');
    console.log('Initial State:');
    console.log(formatGrid(state, exit.row));
    console.log('');
  }

  const solver = new RushHourSolver();
  const solution = solver.solve(state, solverOpts);

  if (options.outputFormat === 'json') {
    console.log(formatSolutionJSON(solution));
  } else {
    console.log(formatSolution(solution));
    if (solution.finalState) {
      console.log('');
      console.log('Final State:');
      console.log(formatGrid(solution.finalState, exit.row));
    }
    console.log('');
    console.log(formatCompactSummary(solution));
  }

  return solution.found ? 0 : 2;
}

function runAnalyze(options: CLIOptions): number {
  const { state, warnings } = loadInput(options);
  const analysis = analyzePuzzle(state, solverOptions(options));

  printWarnings(warnings);

  console.log('=== PUZZLE ANALYSIS ===');
  console.log('');
  console.log(formatGrid(state, analysis.exit.row));
  console.log('');

  console.log(`Board: ${analysis.size}x${analysis.size}`);
  console.log(`Vehicles: ${analysis.vehicleCount}`);
  console.log(`Exit: row ${analysis.exit.row}, column ${analysis.exit.col}`);
  console.log(`Already solved: ${analysis.solved ? 'yes' : 'no'}`);
  console.log('');

  console.log('Blocking Vehicles:');
  if (analysis.blockingVehicles.length === 0) {
    console.log('  (none)');
  }
  for (const id of analysis.blockingVehicles) {
    console.log(`  ${id}`);
  }
  console.log('');

  console.log('Legal Moves:');
  for (const move of analysis.legalMoves) {
    console.log(`  ${move.vehicleId} ${move.direction} (cost: ${move.cost})`);
  }
  console.log('');

  if (analysis.suggestions.length > 0) {
    console.log('Suggestions:');
    for (const suggestion of analysis.suggestions) {
      console.log(`  • ${suggestion}`);
    }
  }

  return 0;
}

// Main entry point
function main(): number {
  const options = parseArgs(args);

  switch (options.command) {
    case 'solve':
      return runSolve(options);

    case 'analyze':
      return runAnalyze(options);

    case 'help':
    default:
      printHelp();
      return 0;
  }
}

try {
  process.exitCode = main();
} catch (err) {
  if (err instanceof MalformedInputError) {
    console.error('Error: malformed puzzle input');
    err.errors.forEach(e => console.error(`  - ${e}`));
  } else {
    console.error('Error:', err);
  }
  process.exitCode = 1;
}
