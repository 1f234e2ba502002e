/**
 * Subsystem Logging
 *
 * Named loggers on top of a single tslog root. The dashboard owns stdout, so
 * the root never prints by itself: records reach a JSON-lines file and/or
 * stderr only through the transports configured here. A log file that
 * cannot be written is dropped after the first failure.
 */

import { appendFileSync } from 'node:fs';
import { Logger, type ILogObj } from 'tslog';
import type { LogLevel } from '../board/types/index.js';

export interface SubsystemLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface LoggingOptions {
  level: LogLevel;
  file?: string;
  stderr: boolean;
}

const LEVEL_IDS: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
});

let rootLogger = createRootLogger({ level: 'info', stderr: false });
const subLoggers = new Map<string, Logger<ILogObj>>();

function createRootLogger(options: LoggingOptions): Logger<ILogObj> {
  const logger = new Logger<ILogObj>({
    name: 'boardtop',
    type: 'hidden',
    minLevel: LEVEL_IDS[options.level],
  });

  const { file, stderr } = options;
  if (file !== undefined || stderr) {
    let fileWritable = file !== undefined;
    logger.attachTransport((record) => {
      const line = formatRecord(record);
      if (file !== undefined && fileWritable) {
        try {
          appendFileSync(file, `${line}\n`);
        } catch (error) {
          fileWritable = false;
          if (stderr) {
            const reason = error instanceof Error ? error.message : String(error);
            process.stderr.write(`boardtop: log file ${file} disabled: ${reason}\n`);
          }
        }
      }
      if (stderr) {
        process.stderr.write(`${line}\n`);
      }
    });
  }

  return logger;
}

function formatRecord(record: ILogObj): string {
  const meta = record['_meta'];
  const args: unknown[] = [];
  for (const [key, value] of Object.entries(record)) {
    if (key !== '_meta') {
      args.push(value);
    }
  }

  const entry: Record<string, unknown> = { args };
  if (typeof meta === 'object' && meta !== null) {
    if ('logLevelName' in meta) entry['level'] = meta.logLevelName;
    if ('date' in meta) entry['time'] = meta.date instanceof Date ? meta.date.toISOString() : meta.date;
    if ('name' in meta) entry['subsystem'] = meta.name;
  }
  return JSON.stringify(entry);
}

/**
 * Replaces the root logger. Loggers created earlier pick up the new
 * settings on their next call.
 */
export function configureLogging(options: LoggingOptions): void {
  rootLogger = createRootLogger(options);
  subLoggers.clear();
}

function resolve(subsystem: string): Logger<ILogObj> {
  let logger = subLoggers.get(subsystem);
  if (!logger) {
    logger = rootLogger.getSubLogger({ name: subsystem });
    subLoggers.set(subsystem, logger);
  }
  return logger;
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    const logger = resolve(subsystem);
    const args: unknown[] = meta === undefined ? [message] : [message, meta];
    switch (level) {
      case 'debug':
        logger.debug(...args);
        break;
      case 'info':
        logger.info(...args);
        break;
      case 'warn':
        logger.warn(...args);
        break;
      case 'error':
        logger.error(...args);
        break;
    }
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
  };
}
