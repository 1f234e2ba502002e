/**
 * Cooling Collector
 *
 * Fan and other cooling devices from the thermal class. The operating mode
 * is advisory: it comes from the pwm-fan hwmon driver when that exposes
 * pwm1_enable, and is otherwise guessed from the duty pattern.
 */

import type { Sysfs } from '../sysfs/index.js';
import { readInt, readString, listOrEmpty, indexedEntry, resolveDirEntry } from '../sysfs/index.js';
import type { CoolingDeviceReading, CoolingMode, CoolingReading } from '../types/index.js';
import { THERMAL_CLASS } from './thermal-collector.js';

export const HWMON_CLASS = '/sys/class/hwmon';

const FAN_DRIVER_NAMES = Object.freeze(['pwmfan', 'pwm-fan', 'pwm_fan']);

/**
 * Locates the pwm-fan hwmon directory, or null.
 */
export function resolveFanHwmon(sysfs: Sysfs): string | null {
  return resolveDirEntry(sysfs, HWMON_CLASS, (entry) =>
    FAN_DRIVER_NAMES.includes(readString(sysfs, `${entry}/name`).toLowerCase()),
  );
}

export function modeFromPwmEnable(value: number | null): CoolingMode | null {
  if (value === null || value < 0) return null;
  if (value === 0) return 'off';
  if (value === 1) return 'manual';
  return 'automatic';
}

export function inferCoolingMode(devices: readonly CoolingDeviceReading[]): CoolingMode {
  if (devices.length === 0) return 'unknown';
  return devices.every((device) => device.duty === 0) ? 'off' : 'manual';
}

export class CoolingCollector {
  private readonly fanHwmon: string | null;

  constructor(private readonly sysfs: Sysfs) {
    this.fanHwmon = resolveFanHwmon(sysfs);
  }

  collect(): CoolingReading {
    const devices = this.readDevices();
    const count = devices.length;

    return {
      devices,
      duty: count > 0 ? Math.floor(devices.reduce((sum, device) => sum + device.duty, 0) / count) : 0,
      rpm: count > 0 ? Math.floor(devices.reduce((sum, device) => sum + device.rpm, 0) / count) : 0,
      mode: this.readMode() ?? inferCoolingMode(devices),
    };
  }

  private readDevices(): CoolingDeviceReading[] {
    const indices: number[] = [];
    for (const name of listOrEmpty(this.sysfs, THERMAL_CLASS)) {
      const index = indexedEntry(name, 'cooling_device');
      if (index !== null) indices.push(index);
    }
    indices.sort((a, b) => a - b);

    const fanRpm = this.fanHwmon === null ? 0 : readInt(this.sysfs, `${this.fanHwmon}/fan1_input`);

    return indices.map((index) => {
      const dir = `${THERMAL_CLASS}/cooling_device${index}`;
      const name = readString(this.sysfs, `${dir}/type`);
      // Normalisation needs max_state before cur_state.
      const maxState = readInt(this.sysfs, `${dir}/max_state`);
      const curState = readInt(this.sysfs, `${dir}/cur_state`);
      const duty = maxState > 0 ? Math.min(100, Math.max(0, Math.floor((curState / maxState) * 100))) : 0;
      const ownRpm = readInt(this.sysfs, `${dir}/rpm`, -1);
      const rpm = ownRpm >= 0 ? ownRpm : name.toLowerCase().includes('fan') ? fanRpm : 0;
      return { index, name, duty, rpm };
    });
  }

  private readMode(): CoolingMode | null {
    if (this.fanHwmon === null) return null;
    return modeFromPwmEnable(readInt(this.sysfs, `${this.fanHwmon}/pwm1_enable`, -1));
  }
}
