/**
 * Engine Collector
 *
 * Auxiliary hardware engines exposed as devfreq devices. An engine is online
 * when its driver publishes the available frequency list.
 */

import type { Sysfs } from '../sysfs/index.js';
import { readInt } from '../sysfs/index.js';
import type { EngineReading } from '../types/index.js';

const DEVFREQ = '/sys/class/devfreq';

export const ENGINE_NAMES = Object.freeze(['ape', 'dla0', 'dla1', 'nvdec', 'nvenc', 'nvjpg'] as const);

export class EngineCollector {
  constructor(private readonly sysfs: Sysfs) {}

  collect(): EngineReading[] {
    return ENGINE_NAMES.map((name) => {
      const dir = `${DEVFREQ}/${name}`;
      let online = false;
      try {
        online = this.sysfs.exists(`${dir}/available_frequencies`);
      } catch {
        online = false;
      }
      return { name, online, frequency: readInt(this.sysfs, `${dir}/cur_freq`) };
    });
  }
}
