/**
 * Performance Profile Collector
 *
 * Power models declared in nvpmodel.conf, the active model and the boost
 * (jetson_clocks) state published in the device tree.
 */

import type { Sysfs } from '../sysfs/index.js';
import { readOrDefault, readString, resolvePath, parseInteger } from '../sysfs/index.js';
import type { PerformanceProfile, ProfileReading } from '../types/index.js';
import { DEVICE_TREE_CANDIDATES } from './board-identity-collector.js';

export const NVPMODEL_CONF = '/etc/nvpmodel.conf';
export const NVPMODEL_STATUS = '/var/lib/nvpmodel/status';

/**
 * Extracts `< POWER_MODEL ID=n NAME=x >` declarations in file order.
 */
export function parseProfiles(text: string): PerformanceProfile[] {
  const profiles: PerformanceProfile[] = [];
  const pattern = /<\s*POWER_MODEL\s+ID\s*=\s*(\d+)\s+NAME\s*=\s*([^\s>]+)[^>]*>/gi;
  for (const match of text.matchAll(pattern)) {
    const id = parseInt(match[1] ?? '', 10);
    const name = match[2] ?? '';
    if (Number.isFinite(id) && name !== '') {
      profiles.push({ id, name });
    }
  }
  return profiles;
}

/** `pmode:0002` as written by nvpmodel */
export function parseStatus(text: string): number | null {
  const match = /pmode\s*:\s*(\d+)/i.exec(text);
  return match?.[1] !== undefined ? parseInt(match[1], 10) : null;
}

/** Boost is on when the status value contains no 0 */
export function boostEnabled(raw: string): boolean {
  return raw !== '' && !raw.includes('0');
}

export class ProfileCollector {
  private readonly deviceTree: string | null;

  constructor(private readonly sysfs: Sysfs) {
    this.deviceTree = resolvePath(sysfs, DEVICE_TREE_CANDIDATES);
  }

  collect(): ProfileReading {
    const profiles = readOrDefault(this.sysfs, NVPMODEL_CONF, parseProfiles, []);

    let current = readOrDefault<number | null>(this.sysfs, NVPMODEL_STATUS, parseStatus, null);
    if (current === null && this.deviceTree !== null) {
      current = readOrDefault<number | null>(this.sysfs, `${this.deviceTree}/nvidia,pmodel`, parseInteger, null);
    }

    const raw = this.deviceTree === null ? '' : readString(this.sysfs, `${this.deviceTree}/nvidia,boost`);
    return { current, profiles, boost: { enabled: boostEnabled(raw), raw } };
  }
}
