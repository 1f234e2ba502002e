/**
 * Accelerator Collector
 *
 * Two mutually exclusive sources, chosen once at startup from the firmware
 * version: devfreq files for older L4T releases, the vendor management tool
 * for newer ones where the integrated GPU no longer publishes devfreq load.
 */

import { execFileSync } from 'node:child_process';
import type { Sysfs } from '../sysfs/index.js';
import { readInt, readString, resolvePath } from '../sysfs/index.js';
import type {
  AcceleratorProcess,
  AcceleratorReading,
  AcceleratorStrategyPreference,
} from '../types/index.js';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { firmwareMajor } from './firmware-releases.js';
import { THERMAL_CLASS, classifyZone, listZoneIndices } from './thermal-collector.js';

const log = createSubsystemLogger('board/accelerator');

/** Most specific first: Thor GPC/NVD, then per-SoC platform devices, then generic */
export const ACCELERATOR_DEVFREQ_CANDIDATES = Object.freeze([
  '/sys/class/devfreq/gpu-gpc-0',
  '/sys/class/devfreq/gpu-nvd-0',
  '/sys/class/devfreq/17000000.ga10b',
  '/sys/class/devfreq/17000000.gv11b',
  '/sys/class/devfreq/17000000.gp10b',
  '/sys/class/devfreq/57000000.gpu',
  '/sys/class/devfreq/gpu',
]);

/** Full scale of the devfreq device/load file */
const LOAD_SCALE = 255;

const MIB = 1024 * 1024;

export type AcceleratorSource =
  | { kind: 'sysfs'; devfreqPath: string; temperaturePath: string | null }
  | { kind: 'vendor'; tool: string; timeoutMs: number }
  | { kind: 'none' };

export interface AcceleratorSourceOptions {
  preference: AcceleratorStrategyPreference;
  /** Raw L4T version of the board */
  firmwareVersion: string;
  vendorMinMajor: number;
  vendorTool: string;
  vendorTimeoutMs: number;
}

/** Runs a helper and returns its stdout; throws on failure or timeout */
export type CommandRunner = (file: string, args: readonly string[], timeoutMs: number) => string;

export const runCommand: CommandRunner = (file, args, timeoutMs) =>
  execFileSync(file, [...args], { encoding: 'utf8', timeout: timeoutMs, stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * Temperature file of the first thermal zone classified as the GPU's.
 */
export function resolveAcceleratorTemperature(sysfs: Sysfs): string | null {
  for (const index of listZoneIndices(sysfs)) {
    const dir = `${THERMAL_CLASS}/thermal_zone${index}`;
    if (classifyZone(readString(sysfs, `${dir}/type`)) === 'gpu') {
      return `${dir}/temp`;
    }
  }
  return null;
}

export function selectAcceleratorSource(sysfs: Sysfs, options: AcceleratorSourceOptions): AcceleratorSource {
  const vendor: AcceleratorSource = {
    kind: 'vendor',
    tool: options.vendorTool,
    timeoutMs: options.vendorTimeoutMs,
  };

  if (options.preference === 'vendor') {
    return vendor;
  }

  if (options.preference === 'auto') {
    const major = firmwareMajor(options.firmwareVersion);
    if (major !== null && major >= options.vendorMinMajor) {
      return vendor;
    }
  }

  const devfreqPath = resolvePath(sysfs, ACCELERATOR_DEVFREQ_CANDIDATES);
  if (devfreqPath === null) {
    return { kind: 'none' };
  }
  return { kind: 'sysfs', devfreqPath, temperaturePath: resolveAcceleratorTemperature(sysfs) };
}

export function emptyAcceleratorReading(): AcceleratorReading {
  return {
    source: 'none',
    usage: 0,
    frequency: 0,
    maxFrequency: 0,
    temperature: 0,
    governor: 'unknown',
    memoryUsed: 0,
    memoryTotal: 0,
    processes: [],
  };
}

/** Parses one csv field of the vendor tool; `[N/A]` and garbage become 0 */
function csvNumber(field: string | undefined): number {
  const value = Number((field ?? '').trim());
  return Number.isFinite(value) && value >= 0 ? value : 0;
}

/**
 * Parses `utilization.gpu, clocks.gr, clocks.max.gr, temperature.gpu,
 * memory.used, memory.total` (noheader, nounits). Only the first device is
 * reported.
 */
export function parseVendorQuery(output: string): Omit<AcceleratorReading, 'source' | 'governor' | 'processes'> {
  const line = output.split('\n').find((candidate) => candidate.trim() !== '') ?? '';
  const fields = line.split(',');
  return {
    usage: Math.min(100, csvNumber(fields[0])),
    frequency: csvNumber(fields[1]) * 1_000_000,
    maxFrequency: csvNumber(fields[2]) * 1_000_000,
    temperature: csvNumber(fields[3]),
    memoryUsed: csvNumber(fields[4]) * MIB,
    memoryTotal: csvNumber(fields[5]) * MIB,
  };
}

/** Parses `pid, process_name, used_memory` lines */
export function parseVendorProcesses(output: string): AcceleratorProcess[] {
  const processes: AcceleratorProcess[] = [];
  for (const line of output.split('\n')) {
    const fields = line.split(',').map((field) => field.trim());
    const pid = parseInt(fields[0] ?? '', 10);
    if (!Number.isFinite(pid) || fields.length < 3) continue;
    processes.push({ pid, name: fields[1] ?? '', memory: csvNumber(fields[2]) * MIB });
  }
  return processes;
}

export class AcceleratorCollector {
  constructor(
    private readonly sysfs: Sysfs,
    readonly source: AcceleratorSource,
    private readonly run: CommandRunner = runCommand,
  ) {}

  collect(): AcceleratorReading {
    switch (this.source.kind) {
      case 'sysfs':
        return this.collectSysfs(this.source.devfreqPath, this.source.temperaturePath);
      case 'vendor':
        return this.collectVendor(this.source.tool, this.source.timeoutMs);
      case 'none':
        return emptyAcceleratorReading();
    }
  }

  private collectSysfs(devfreqPath: string, temperaturePath: string | null): AcceleratorReading {
    // The usage estimate normalises against max_freq, so it is read first.
    const maxFrequency = readInt(this.sysfs, `${devfreqPath}/max_freq`);
    const frequency = readInt(this.sysfs, `${devfreqPath}/cur_freq`);
    const load = readInt(this.sysfs, `${devfreqPath}/device/load`, -1);

    let usage = 0;
    if (load >= 0) {
      usage = Math.min(100, (load / LOAD_SCALE) * 100);
    } else if (frequency > 0 && maxFrequency > 0) {
      usage = Math.min(100, (frequency / maxFrequency) * 100);
    }

    return {
      ...emptyAcceleratorReading(),
      source: 'sysfs',
      usage,
      frequency,
      maxFrequency,
      temperature: readInt(this.sysfs, temperaturePath) / 1000,
      governor: readString(this.sysfs, `${devfreqPath}/governor`, 'unknown'),
    };
  }

  private collectVendor(tool: string, timeoutMs: number): AcceleratorReading {
    const reading: AcceleratorReading = { ...emptyAcceleratorReading(), source: 'vendor' };

    try {
      const query = this.run(
        tool,
        [
          '--query-gpu=utilization.gpu,clocks.gr,clocks.max.gr,temperature.gpu,memory.used,memory.total',
          '--format=csv,noheader,nounits',
        ],
        timeoutMs,
      );
      Object.assign(reading, parseVendorQuery(query));
    } catch (error) {
      log.debug('vendor query failed', { tool, error: error instanceof Error ? error.message : String(error) });
      return reading;
    }

    try {
      const apps = this.run(
        tool,
        ['--query-compute-apps=pid,process_name,used_memory', '--format=csv,noheader,nounits'],
        timeoutMs,
      );
      reading.processes = parseVendorProcesses(apps);
    } catch (error) {
      log.debug('vendor process query failed', { tool, error: error instanceof Error ? error.message : String(error) });
    }

    return reading;
  }
}
