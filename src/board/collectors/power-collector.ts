/**
 * Power Collector
 *
 * Power rails from INA3221 monitors. Current kernels expose them through
 * hwmon (inK_label, currK_input in mA, inK_input in mV); older L4T releases
 * only publish IIO devices under the I2C bus with raw values and scales.
 */

import type { Sysfs } from '../sysfs/index.js';
import { readInt, readFloat, readString, listOrEmpty, naturalSort } from '../sysfs/index.js';
import type { PowerRailReading, PowerReading } from '../types/index.js';
import { HWMON_CLASS } from './cooling-collector.js';

export const I2C_DEVICES = '/sys/bus/i2c/devices';

type RailSource = { kind: 'hwmon'; dirs: string[] } | { kind: 'iio'; dirs: string[] } | { kind: 'none' };

export function railFromReadings(name: string, current: number, voltage: number): PowerRailReading {
  return { name, current, voltage, power: (current * voltage) / 1000 };
}

export function totalWatts(rails: readonly PowerRailReading[]): number {
  return rails.reduce((sum, rail) => sum + rail.power, 0) / 1000;
}

export class PowerCollector {
  private readonly source: RailSource;

  constructor(private readonly sysfs: Sysfs) {
    this.source = this.resolveSource();
  }

  get sourceKind(): RailSource['kind'] {
    return this.source.kind;
  }

  collect(): PowerReading {
    let rails: PowerRailReading[] = [];
    switch (this.source.kind) {
      case 'hwmon':
        rails = this.source.dirs.flatMap((dir) => this.readHwmonRails(dir));
        break;
      case 'iio':
        rails = this.source.dirs.map((dir) => this.readIioRail(dir));
        break;
      case 'none':
        break;
    }
    return { rails, total: totalWatts(rails) };
  }

  private resolveSource(): RailSource {
    const hwmon = naturalSort(listOrEmpty(this.sysfs, HWMON_CLASS))
      .map((name) => `${HWMON_CLASS}/${name}`)
      .filter((dir) => readString(this.sysfs, `${dir}/name`).toLowerCase().startsWith('ina3221'));
    if (hwmon.length > 0) {
      return { kind: 'hwmon', dirs: hwmon };
    }

    const iio = naturalSort(listOrEmpty(this.sysfs, I2C_DEVICES))
      .filter((name) => name.startsWith('iio:device'))
      .map((name) => `${I2C_DEVICES}/${name}`);
    if (iio.length > 0) {
      return { kind: 'iio', dirs: iio };
    }

    return { kind: 'none' };
  }

  private readHwmonRails(dir: string): PowerRailReading[] {
    const channels: number[] = [];
    for (const name of listOrEmpty(this.sysfs, dir)) {
      const match = /^in(\d+)_label$/.exec(name);
      if (match?.[1] !== undefined) channels.push(parseInt(match[1], 10));
    }
    channels.sort((a, b) => a - b);

    const rails: PowerRailReading[] = [];
    for (const channel of channels) {
      const name = readString(this.sysfs, `${dir}/in${channel}_label`);
      // Unconnected channels are labelled NC on carrier boards.
      if (name === '' || name.toUpperCase() === 'NC') continue;
      rails.push(
        railFromReadings(
          name,
          readInt(this.sysfs, `${dir}/curr${channel}_input`),
          readInt(this.sysfs, `${dir}/in${channel}_input`),
        ),
      );
    }
    return rails;
  }

  private readIioRail(dir: string): PowerRailReading {
    const name = readString(this.sysfs, `${dir}/name`);
    // Scales are needed before the raw values can be converted.
    const currentScale = readFloat(this.sysfs, `${dir}/in_current_scale`, 1);
    const voltageScale = readFloat(this.sysfs, `${dir}/in_voltage_scale`, 1);
    const current = (readInt(this.sysfs, `${dir}/in_current_raw`) * currentScale) / 1000;
    const voltage = (readInt(this.sysfs, `${dir}/in_voltage_raw`) * voltageScale) / 1000;
    return railFromReadings(name, current, voltage);
  }
}
