/**
 * boardtop command
 *
 * Exit codes: 0 success, 1 control or dashboard failure, 2 usage or
 * validation error. A fatal dashboard error is reported only after the
 * terminal has been restored.
 */

import { openBoard, takeSnapshot, createDashboardLoop, type Board } from '../board/board.js';
import { resolveDashboardConfig, validateDashboardConfig } from '../board/config/index.js';
import { ControlValidationError, ControlWriteError } from '../board/control/index.js';
import type { DashboardConfig } from '../board/types/index.js';
import { configureLogging, createSubsystemLogger } from '../logging/subsystem.js';
import { VERSION } from '../version.js';
import { USAGE, UsageError, parseArgs, type CliCommand, type CliOptions } from './args.js';

const log = createSubsystemLogger('cli');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  stdout: { write(text: string): unknown };
  stderr: { write(text: string): unknown };
  env: NodeJS.ProcessEnv;
  /** Whether stdin is a terminal the dashboard can take over */
  interactive: boolean;
  openBoard: (config: DashboardConfig) => Board;
  /** Registers an exit request for SIGINT/SIGTERM; returns the unregister function */
  onSignal: (handler: () => void) => () => void;
}

function listenForSignals(handler: () => void): () => void {
  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
  return () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
  };
}

export const processIo: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  interactive: process.stdin.isTTY === true,
  openBoard: (config) => openBoard(config),
  onSignal: listenForSignals,
};

function runControl(io: CliIo, action: () => string): number {
  try {
    io.stdout.write(`${action()}\n`);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ControlValidationError) {
      io.stderr.write(`boardtop: ${error.message}\n`);
      return EXIT_USAGE;
    }
    if (error instanceof ControlWriteError) {
      io.stderr.write(`boardtop: ${error.message}\n`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}

async function runDashboard(io: CliIo, board: Board): Promise<number> {
  if (!io.interactive) {
    io.stderr.write('boardtop: the dashboard needs an interactive terminal (try --stats)\n');
    return EXIT_FAILURE;
  }

  const loop = createDashboardLoop(board);
  const release = io.onSignal(() => loop.post({ type: 'exit' }));
  try {
    const outcome = await loop.run();
    if (outcome.reason === 'error') {
      io.stderr.write(`boardtop: ${outcome.message}\n`);
      return EXIT_FAILURE;
    }
    return EXIT_OK;
  } finally {
    release();
  }
}

type BoardCommand = Exclude<CliCommand, 'help' | 'version'>;

async function run(io: CliIo, command: BoardCommand, value: number, board: Board): Promise<number> {
  const { control } = board;

  switch (command) {
    case 'stats': {
      const sample = await takeSnapshot(board);
      io.stdout.write(`${JSON.stringify(sample, null, 2)}\n`);
      return EXIT_OK;
    }
    case 'fan':
      return runControl(io, () => {
        control.setCoolingDuty(value);
        return `Fan duty set to ${value}%`;
      });
    case 'profile':
      return runControl(io, () => {
        control.setPerformanceProfile(value);
        return `Power mode set to ${value}`;
      });
    case 'boost':
      return runControl(io, () => (control.toggleBoostMode() ? 'Boost enabled' : 'Boost disabled'));
    case 'dashboard':
      return runDashboard(io, board);
  }
}

export async function main(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.stderr.write(`boardtop: ${error.message}\nTry 'boardtop --help'.\n`);
    return EXIT_USAGE;
  }

  if (options.command === 'help') {
    io.stdout.write(USAGE);
    return EXIT_OK;
  }
  if (options.command === 'version') {
    io.stdout.write(`boardtop ${VERSION}\n`);
    return EXIT_OK;
  }

  const config = resolveDashboardConfig(options.overrides, io.env);
  const problems = validateDashboardConfig(config);
  if (problems.length > 0) {
    for (const problem of problems) {
      io.stderr.write(`boardtop: ${problem}\n`);
    }
    return EXIT_USAGE;
  }

  // Nothing may reach stderr while the dashboard is drawn.
  configureLogging({
    ...config.logging,
    stderr: options.command !== 'dashboard' && config.logging.stderr,
  });
  log.debug('starting', { command: options.command, sysRoot: config.sysRoot });

  return run(io, options.command, options.value ?? Number.NaN, io.openBoard(config));
}
