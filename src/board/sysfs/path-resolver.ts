/**
 * Path Resolver
 *
 * Locates hardware exposure points whose location varies across board
 * revisions and kernel/driver versions. Candidates are ordered by priority:
 * specific and modern identifiers first, generic fallbacks last.
 *
 * Results are not cached; callers resolve once when they are built, since
 * hardware topology does not change at runtime.
 */

import type { Sysfs } from './sysfs.js';
import { naturalSort } from './sysfs.js';

/**
 * Returns the first candidate that exists, or null when none does.
 */
export function resolvePath(sysfs: Sysfs, candidates: readonly string[]): string | null {
  for (const candidate of candidates) {
    let found = false;
    try {
      found = sysfs.exists(candidate);
    } catch {
      found = false;
    }
    if (found) {
      return candidate;
    }
  }
  return null;
}

/**
 * Returns the first entry of `dir` (natural order) accepted by `accept`,
 * as a full path, or null. A missing directory yields null.
 */
export function resolveDirEntry(
  sysfs: Sysfs,
  dir: string,
  accept: (entryPath: string, name: string) => boolean,
): string | null {
  let names: string[];
  try {
    names = naturalSort(sysfs.listDir(dir));
  } catch {
    return null;
  }

  for (const name of names) {
    const entryPath = `${dir}/${name}`;
    if (accept(entryPath, name)) {
      return entryPath;
    }
  }
  return null;
}
