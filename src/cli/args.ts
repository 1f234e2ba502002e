/**
 * Command-line arguments
 */

import type { DashboardConfigOverrides } from '../board/config/index.js';
import { isLogLevel } from '../board/config/index.js';

export type CliCommand = 'dashboard' | 'stats' | 'fan' | 'profile' | 'boost' | 'help' | 'version';

export interface CliOptions {
  command: CliCommand;
  /** Argument of --fan or --profile */
  value?: number;
  overrides: DashboardConfigOverrides;
}

export class UsageError extends Error {
  override readonly name = 'UsageError';
}

const ACTION_FLAGS = Object.freeze(['--stats', '--fan', '--profile', '--boost']);

export const USAGE = `boardtop - board telemetry and control dashboard

Usage:
  boardtop [options]              interactive dashboard
  boardtop --stats [options]      print one sample as JSON
  boardtop --fan <0-100>          set the fan duty cycle
  boardtop --profile <0-15>       switch the nvpmodel power mode
  boardtop --boost                toggle jetson_clocks

Options:
  --interval <ms>        tick interval, or the --stats sampling delay
  --root <dir>           read pseudo-files under <dir> instead of /
  --log-file <path>      append JSON log lines to <path>
  --log-level <level>    debug | info | warn | error
  --verbose, -v          debug logging on stderr (not in the dashboard)
  --version, -V          print the version
  --help, -h             show this help
`;

function integerArg(flag: string, text: string): number {
  if (!/^-?\d+$/.test(text.trim())) {
    throw new UsageError(`Invalid value for ${flag}: ${text}`);
  }
  return Number(text);
}

export function parseArgs(argv: readonly string[]): CliOptions {
  let command: CliCommand = 'dashboard';
  let action: string | undefined;
  let value: number | undefined;
  let interval: number | undefined;
  let help = false;
  let version = false;
  let verbose = false;
  const overrides: DashboardConfigOverrides = {};
  const logging: NonNullable<DashboardConfigOverrides['logging']> = {};

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i] ?? '';
    const at = raw.indexOf('=');
    const flag = raw.startsWith('--') && at > 0 ? raw.slice(0, at) : raw;
    const inline = flag === raw ? undefined : raw.slice(at + 1);

    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next === '') throw new UsageError(`Missing value for ${flag}`);
      i++;
      return next;
    };

    if (ACTION_FLAGS.includes(flag)) {
      if (action !== undefined && action !== flag) {
        throw new UsageError(`${action} and ${flag} cannot be combined`);
      }
      action = flag;
    }

    switch (flag) {
      case '--help':
      case '-h':
        help = true;
        break;
      case '--version':
      case '-V':
        version = true;
        break;
      case '--stats':
        command = 'stats';
        break;
      case '--boost':
        command = 'boost';
        break;
      case '--fan':
        command = 'fan';
        value = integerArg(flag, takeValue());
        break;
      case '--profile':
        command = 'profile';
        value = integerArg(flag, takeValue());
        break;
      case '--interval':
        interval = integerArg(flag, takeValue());
        break;
      case '--root':
        overrides.sysRoot = takeValue();
        break;
      case '--log-file':
        logging.file = takeValue();
        break;
      case '--log-level': {
        const level = takeValue().toLowerCase();
        if (!isLogLevel(level)) throw new UsageError(`Unknown log level: ${level}`);
        logging.level = level;
        break;
      }
      case '--verbose':
      case '-v':
        verbose = true;
        break;
      default:
        throw new UsageError(raw.startsWith('-') ? `Unknown option: ${raw}` : `Unexpected argument: ${raw}`);
    }
  }

  if (verbose) {
    logging.stderr = true;
    if (logging.level === undefined) logging.level = 'debug';
  }
  if (Object.keys(logging).length > 0) {
    overrides.logging = logging;
  }
  if (interval !== undefined) {
    if (command === 'stats') overrides.statsIntervalMs = interval;
    else overrides.tickIntervalMs = interval;
  }

  if (help) command = 'help';
  else if (version) command = 'version';

  return value === undefined ? { command, overrides } : { command, value, overrides };
}
