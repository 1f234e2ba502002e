/**
 * Pseudo-filesystem access
 *
 * Thin synchronous access to /proc, /sys and /etc. Every path handed to a
 * Sysfs is absolute and interpreted under the configured root, so a copy of
 * a board's tree can be sampled on another machine.
 */

import { existsSync, readFileSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

export interface Sysfs {
  exists(path: string): boolean;
  /** Throws when the file is missing or unreadable */
  readText(path: string): string;
  /** Entry names of a directory; throws when it cannot be listed */
  listDir(path: string): string[];
  /** Throws with the underlying errno on failure */
  writeText(path: string, value: string): void;
}

export function createNodeSysfs(root = '/'): Sysfs {
  const under = (path: string): string => (root === '/' ? path : join(root, path));

  return {
    exists: (path) => existsSync(under(path)),
    readText: (path) => readFileSync(under(path), 'utf8'),
    listDir: (path) => readdirSync(under(path), { withFileTypes: true }).map((entry) => entry.name),
    writeText: (path, value) => writeFileSync(under(path), value),
  };
}

/**
 * Sorts directory entries such as thermal_zone10 after thermal_zone9.
 */
export function naturalSort(names: readonly string[]): string[] {
  return [...names].sort((a, b) => a.localeCompare(b, 'en', { numeric: true }));
}

/**
 * Returns the numeric suffix of entries named `<prefix><n>`, or null.
 */
export function indexedEntry(name: string, prefix: string): number | null {
  if (!name.startsWith(prefix)) return null;
  const rest = name.slice(prefix.length);
  return /^\d+$/.test(rest) ? parseInt(rest, 10) : null;
}
