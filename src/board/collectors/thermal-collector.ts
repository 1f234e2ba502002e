/**
 * Thermal Collector
 *
 * Reads every thermal zone and promotes the first zone of each known kind to
 * a named field. Temperatures are reported by the kernel in millidegrees.
 */

import type { Sysfs } from '../sysfs/index.js';
import { readInt, readString, listOrEmpty, indexedEntry } from '../sysfs/index.js';
import type { ThermalReading, ThermalZoneReading } from '../types/index.js';

export const THERMAL_CLASS = '/sys/class/thermal';

/** Highest trip point index probed when looking for the critical trip */
const MAX_TRIP_POINTS = 16;

export type ThermalKind = 'cpu' | 'gpu' | 'pmic' | 'board';

/** Zone-name fragments per named field, in priority order */
export const THERMAL_VOCABULARY: ReadonlyArray<readonly [ThermalKind, readonly string[]]> = Object.freeze([
  ['cpu', ['cpu']],
  ['gpu', ['gpu']],
  ['pmic', ['pmic']],
  ['board', ['board', 'tboard']],
] as const);

/**
 * Case-insensitive fragment match against the vocabulary; first match wins.
 */
export function classifyZone(name: string): ThermalKind | null {
  const lowered = name.toLowerCase();
  for (const [kind, fragments] of THERMAL_VOCABULARY) {
    if (fragments.some((fragment) => lowered.includes(fragment))) {
      return kind;
    }
  }
  return null;
}

export function listZoneIndices(sysfs: Sysfs): number[] {
  const indices: number[] = [];
  for (const name of listOrEmpty(sysfs, THERMAL_CLASS)) {
    const index = indexedEntry(name, 'thermal_zone');
    if (index !== null) indices.push(index);
  }
  return indices.sort((a, b) => a - b);
}

const toCelsius = (millidegrees: number): number => millidegrees / 1000;

export class ThermalCollector {
  constructor(private readonly sysfs: Sysfs) {}

  readZone(index: number): ThermalZoneReading {
    const dir = `${THERMAL_CLASS}/thermal_zone${index}`;
    return {
      index,
      name: readString(this.sysfs, `${dir}/type`),
      current: toCelsius(readInt(this.sysfs, `${dir}/temp`)),
      trip: toCelsius(readInt(this.sysfs, `${dir}/trip_point_0_temp`)),
      critical: toCelsius(this.readCriticalTrip(dir)),
    };
  }

  collect(): ThermalReading {
    const reading: ThermalReading = { cpu: 0, gpu: 0, board: 0, pmic: 0, zones: [] };
    const filled = new Set<ThermalKind>();

    for (const index of listZoneIndices(this.sysfs)) {
      const zone = this.readZone(index);
      reading.zones.push(zone);

      const kind = classifyZone(zone.name);
      if (kind !== null && !filled.has(kind)) {
        reading[kind] = zone.current;
        filled.add(kind);
      }
    }

    return reading;
  }

  /** The trip point type must be read before its temperature */
  private readCriticalTrip(dir: string): number {
    for (let trip = 0; trip < MAX_TRIP_POINTS; trip++) {
      const type = readString(this.sysfs, `${dir}/trip_point_${trip}_type`);
      if (type === '') break;
      if (type.toLowerCase() === 'critical') {
        return readInt(this.sysfs, `${dir}/trip_point_${trip}_temp`);
      }
    }
    return 0;
  }
}
