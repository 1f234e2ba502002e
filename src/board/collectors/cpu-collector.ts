/**
 * CPU Collector
 *
 * Reads per-core cumulative counters from /proc/stat and per-core frequency
 * and governor from cpufreq. Usage itself is derived by the delta-rate
 * engine; this collector only attaches the figures it is handed.
 */

import type { Sysfs } from '../sysfs/index.js';
import { readInt, readString, readOrDefault, listOrEmpty, indexedEntry, naturalSort } from '../sysfs/index.js';
import type { CoreCounters, CpuCoreReading, CpuReading, CumulativeCounterSnapshot } from '../types/index.js';

const PROC_STAT = '/proc/stat';
const PROC_CPUINFO = '/proc/cpuinfo';
const CPU_DEVICES = '/sys/devices/system/cpu';

/**
 * Parses the `cpuN` lines of /proc/stat. The aggregate `cpu` line is skipped
 * and missing trailing fields count as 0.
 */
export function parseProcStat(text: string): CoreCounters[] {
  const cores: CoreCounters[] = [];

  for (const line of text.split('\n')) {
    const fields = line.trim().split(/\s+/);
    const head = fields[0] ?? '';
    const index = indexedEntry(head, 'cpu');
    if (index === null) continue;

    const field = (position: number): number => {
      const value = parseInt(fields[position] ?? '', 10);
      return Number.isFinite(value) && value >= 0 ? value : 0;
    };

    cores.push({
      index,
      user: field(1),
      nice: field(2),
      system: field(3),
      idle: field(4),
      iowait: field(5),
      irq: field(6),
      softirq: field(7),
    });
  }

  return cores;
}

/**
 * Maps processor index to `cpu MHz` from /proc/cpuinfo. ARM kernels usually
 * omit the field, in which case the map stays empty.
 */
export function parseCpuinfoFrequencies(text: string): Map<number, number> {
  const frequencies = new Map<number, number>();
  let processor: number | null = null;

  for (const line of text.split('\n')) {
    const at = line.indexOf(':');
    if (at < 0) continue;
    const key = line.slice(0, at).trim();
    const value = line.slice(at + 1).trim();

    if (key === 'processor') {
      const parsed = parseInt(value, 10);
      processor = Number.isFinite(parsed) ? parsed : null;
    } else if (key === 'cpu MHz' && processor !== null) {
      const mhz = parseFloat(value);
      if (Number.isFinite(mhz)) {
        frequencies.set(processor, Math.round(mhz * 1_000_000));
      }
    }
  }

  return frequencies;
}

export class CpuCollector {
  constructor(private readonly sysfs: Sysfs) {}

  /**
   * Reads the counter snapshot for one tick. Kept free of any other I/O so
   * the delta-rate engine sees an interval close to the tick interval.
   */
  readCounters(ordinal: number): CumulativeCounterSnapshot {
    return {
      ordinal,
      cores: readOrDefault(this.sysfs, PROC_STAT, parseProcStat, []),
    };
  }

  collect(snapshot: CumulativeCounterSnapshot = { ordinal: 0, cores: [] }, usages: readonly number[] = []): CpuReading {
    const indices = snapshot.cores.length > 0 ? snapshot.cores.map((core) => core.index) : this.listCoreIndices();
    const cpuinfo = readOrDefault(this.sysfs, PROC_CPUINFO, parseCpuinfoFrequencies, new Map<number, number>());

    const cores: CpuCoreReading[] = indices.map((index, position) => {
      const cpufreq = `${CPU_DEVICES}/cpu${index}/cpufreq`;
      const khz = readInt(this.sysfs, `${cpufreq}/scaling_cur_freq`);
      return {
        index,
        usage: usages[position] ?? 0,
        frequency: khz > 0 ? khz * 1000 : (cpuinfo.get(index) ?? 0),
        governor: readString(this.sysfs, `${cpufreq}/scaling_governor`, 'unknown'),
      };
    });

    const usage = cores.length > 0 ? cores.reduce((sum, core) => sum + core.usage, 0) / cores.length : 0;
    return { usage, cores };
  }

  private listCoreIndices(): number[] {
    const indices: number[] = [];
    for (const name of naturalSort(listOrEmpty(this.sysfs, CPU_DEVICES))) {
      const index = indexedEntry(name, 'cpu');
      if (index !== null) indices.push(index);
    }
    return indices;
  }
}
