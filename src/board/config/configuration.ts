/**
 * Dashboard Configuration
 *
 * Defaults, environment overrides and validation for DashboardConfig.
 * Precedence is defaults < environment < explicit overrides (CLI flags).
 */

import type { AcceleratorStrategyPreference, DashboardConfig, LogLevel } from '../types/index.js';

export const DEFAULT_DASHBOARD_CONFIG: Readonly<DashboardConfig> = {
  sysRoot: '/',
  tickIntervalMs: 250,
  statsIntervalMs: 500,
  logging: {
    level: 'info',
    stderr: false,
  },
  accelerator: {
    strategy: 'auto',
    vendorMinMajor: 38,
    vendorTool: 'nvidia-smi',
    vendorTimeoutMs: 2000,
  },
  control: {
    useSudo: true,
    profileHelper: '/usr/bin/nvpmodel',
    boostHelper: '/usr/bin/jetson_clocks',
  },
};

export interface DashboardConfigOverrides {
  sysRoot?: string;
  tickIntervalMs?: number;
  statsIntervalMs?: number;
  logging?: Partial<DashboardConfig['logging']>;
  accelerator?: Partial<DashboardConfig['accelerator']>;
  control?: Partial<DashboardConfig['control']>;
}

export const LOG_LEVELS: readonly LogLevel[] = Object.freeze(['debug', 'info', 'warn', 'error']);

const ACCELERATOR_STRATEGIES: readonly AcceleratorStrategyPreference[] = Object.freeze(['auto', 'sysfs', 'vendor']);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function isAcceleratorStrategy(value: string): value is AcceleratorStrategyPreference {
  return ACCELERATOR_STRATEGIES.some((strategy) => strategy === value);
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

/**
 * Reads BOARDTOP_* variables. Unparsable numbers are passed through as NaN
 * so that validation reports them.
 */
export function configFromEnvironment(env: NodeJS.ProcessEnv): DashboardConfigOverrides {
  const overrides: DashboardConfigOverrides = {};

  if (env['BOARDTOP_ROOT']) {
    overrides.sysRoot = env['BOARDTOP_ROOT'];
  }
  if (env['BOARDTOP_INTERVAL_MS']) {
    overrides.tickIntervalMs = Number(env['BOARDTOP_INTERVAL_MS']);
  }

  const logging: Partial<DashboardConfig['logging']> = {};
  const level = env['BOARDTOP_LOG_LEVEL']?.toLowerCase();
  if (level !== undefined && isLogLevel(level)) {
    logging.level = level;
  }
  if (env['BOARDTOP_LOG_FILE']) {
    logging.file = env['BOARDTOP_LOG_FILE'];
  }
  if (Object.keys(logging).length > 0) {
    overrides.logging = logging;
  }

  const strategy = env['BOARDTOP_ACCELERATOR']?.toLowerCase();
  if (strategy !== undefined && isAcceleratorStrategy(strategy)) {
    overrides.accelerator = { strategy };
  }

  const noSudo = env['BOARDTOP_NO_SUDO']?.toLowerCase();
  if (noSudo !== undefined && TRUTHY.has(noSudo)) {
    overrides.control = { useSudo: false };
  }

  return overrides;
}

function merge(base: DashboardConfig, overrides: DashboardConfigOverrides): DashboardConfig {
  return {
    sysRoot: overrides.sysRoot ?? base.sysRoot,
    tickIntervalMs: overrides.tickIntervalMs ?? base.tickIntervalMs,
    statsIntervalMs: overrides.statsIntervalMs ?? base.statsIntervalMs,
    logging: { ...base.logging, ...overrides.logging },
    accelerator: { ...base.accelerator, ...overrides.accelerator },
    control: { ...base.control, ...overrides.control },
  };
}

export function resolveDashboardConfig(
  overrides: DashboardConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): DashboardConfig {
  return merge(merge(DEFAULT_DASHBOARD_CONFIG, configFromEnvironment(env)), overrides);
}

/**
 * Validates dashboard configuration for consistency
 */
export function validateDashboardConfig(config: DashboardConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.tickIntervalMs) || config.tickIntervalMs < 50 || config.tickIntervalMs > 10_000) {
    errors.push('Tick interval must be an integer between 50 and 10000 ms');
  }

  if (!Number.isInteger(config.statsIntervalMs) || config.statsIntervalMs < 0 || config.statsIntervalMs > 10_000) {
    errors.push('Snapshot interval must be an integer between 0 and 10000 ms');
  }

  if (config.sysRoot === '' || !config.sysRoot.startsWith('/')) {
    errors.push('Filesystem root must be an absolute path');
  }

  if (!isLogLevel(config.logging.level)) {
    errors.push(`Unknown log level: ${config.logging.level}`);
  }

  if (!Number.isInteger(config.accelerator.vendorMinMajor) || config.accelerator.vendorMinMajor < 0) {
    errors.push('Vendor tool firmware threshold must be a non-negative integer');
  }

  if (!(config.accelerator.vendorTimeoutMs > 0)) {
    errors.push('Vendor tool timeout must be positive');
  }

  if (config.control.profileHelper === '' || config.control.boostHelper === '') {
    errors.push('Control helper paths must not be empty');
  }

  return errors;
}
