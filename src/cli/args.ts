/**
 * Command line argument handling
 */

import type { SolverOptions } from '../domain/types.js';
import { DEFAULT_SOLVER_OPTIONS } from '../domain/constants.js';

export interface CLIOptions {
  command: 'solve' | 'analyze' | 'help';
  inputFile?: string;
  gridFile?: string;
  outputFormat: 'text' | 'json';
  unitCost: number;
  targetVehicle: string;
  exitRow?: number;
  exitColumn?: number;
  maxIterations: number;
  maxTime: number;
  allowGaps: boolean;
  verifyStates: boolean;
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    outputFormat: 'text',
    unitCost: DEFAULT_SOLVER_OPTIONS.unitCost,
    targetVehicle: DEFAULT_SOLVER_OPTIONS.targetVehicle,
    maxIterations: DEFAULT_SOLVER_OPTIONS.maxIterations,
    maxTime: DEFAULT_SOLVER_OPTIONS.maxTime,
    allowGaps: false,
    verifyStates: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case 'solve':
      case 'analyze':
        options.command = arg;
        break;

      case '-i':
      case '--input':
        options.inputFile = args[++i];
        break;

      case '-g':
      case '--grid':
        options.gridFile = args[++i];
        break;

      case '-f':
      case '--format':
        options.outputFormat = args[++i] === 'json' ? 'json' : 'text';
        break;

      case '-c':
      case '--unit-cost':
        options.unitCost = Number(args[++i]);
        break;

      case '--target':
        options.targetVehicle = args[++i] ?? options.targetVehicle;
        break;

      case '--exit-row':
        options.exitRow = parseInt(args[++i], 10);
        break;

      case '--exit-column':
        options.exitColumn = parseInt(args[++i], 10);
        break;

      case '--max-iterations':
        options.maxIterations = parseInt(args[++i], 10);
        break;

      case '-t':
      case '--time':
        options.maxTime = Number(args[++i]) * 1000;
        break;

      case '--allow-gaps':
        options.allowGaps = true;
        break;

      case '--verify':
        options.verifyStates = true;
        break;

      case '-h':
      case '--help':
        options.command = 'help';
        break;
    }
  }

  return options;
}

/**
 * Map parsed flags onto solver options, leaving unset exits to the defaults
 */
export function solverOptions(options: CLIOptions): Partial<SolverOptions> {
  const solverOpts: Partial<SolverOptions> = {
    unitCost: options.unitCost,
    targetVehicle: options.targetVehicle,
    maxIterations: options.maxIterations,
    maxTime: options.maxTime,
    verifyStates: options.verifyStates,
  };
  if (options.exitRow !== undefined) {
    solverOpts.exitRow = options.exitRow;
  }
  if (options.exitColumn !== undefined) {
    solverOpts.exitColumn = options.exitColumn;
  }
  return solverOpts;
}
