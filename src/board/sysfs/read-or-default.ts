/**
 * Best-effort readers
 *
 * Every field a collector reports is read through readOrDefault: read the
 * file, parse it, and fall back to a default on any failure. Parsers signal
 * a malformed value by returning null.
 */

import type { Sysfs } from './sysfs.js';
import { createSubsystemLogger } from '../../logging/subsystem.js';

const log = createSubsystemLogger('board/sysfs');

export type Parser<T> = (text: string) => T | null;

export function readOrDefault<T>(sysfs: Sysfs, path: string | null, parse: Parser<T>, fallback: T): T {
  if (path === null) {
    return fallback;
  }

  let text: string;
  try {
    text = sysfs.readText(path);
  } catch (error) {
    log.debug('pseudo-file unavailable', {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
    return fallback;
  }

  const parsed = parse(text);
  if (parsed === null) {
    log.debug('malformed pseudo-file value', { path, value: text.trim().slice(0, 64) });
    return fallback;
  }
  return parsed;
}

export const parseInteger: Parser<number> = (text) => {
  const trimmed = text.trim();
  if (!/^[-+]?\d+$/.test(trimmed)) return null;
  const value = parseInt(trimmed, 10);
  return Number.isFinite(value) ? value : null;
};

export const parseNumber: Parser<number> = (text) => {
  const trimmed = text.trim();
  if (trimmed === '') return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
};

/** Trimmed text with trailing NULs removed (device-tree strings carry one) */
export const parseString: Parser<string> = (text) => {
  const value = text.replace(/\0+$/, '').trim();
  return value === '' ? null : value;
};

export function readInt(sysfs: Sysfs, path: string | null, fallback = 0): number {
  return readOrDefault(sysfs, path, parseInteger, fallback);
}

export function readFloat(sysfs: Sysfs, path: string | null, fallback = 0): number {
  return readOrDefault(sysfs, path, parseNumber, fallback);
}

export function readString(sysfs: Sysfs, path: string | null, fallback = ''): string {
  return readOrDefault(sysfs, path, parseString, fallback);
}

/**
 * Parses `key: value` or `key=value` lines. Lines without a separator are
 * skipped; the first occurrence of a key wins.
 */
export function parseKeyValues(text: string, separator: ':' | '=' = ':'): Map<string, string> {
  const entries = new Map<string, string>();
  for (const line of text.split('\n')) {
    const at = line.indexOf(separator);
    if (at <= 0) continue;
    const key = line.slice(0, at).trim();
    if (key === '' || entries.has(key)) continue;
    entries.set(key, line.slice(at + 1).trim());
  }
  return entries;
}

export function readKeyValues(sysfs: Sysfs, path: string | null, separator: ':' | '=' = ':'): Map<string, string> {
  return readOrDefault(sysfs, path, (text) => parseKeyValues(text, separator), new Map<string, string>());
}

/** Lists a directory, returning [] when it is missing */
export function listOrEmpty(sysfs: Sysfs, path: string): string[] {
  try {
    return sysfs.listDir(path);
  } catch (error) {
    log.debug('directory unavailable', {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }
}
