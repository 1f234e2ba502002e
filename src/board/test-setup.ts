/**
 * Test utilities for the board dashboard
 *
 * Provides an in-memory pseudo-filesystem, fixture builders for common board
 * files and fast-check generators for counter snapshots.
 */

import * as fc from 'fast-check';
import type { Sysfs } from './sysfs/index.js';
import type { CoreCounters, CumulativeCounterSnapshot } from './types/index.js';
import type { TerminalSession, TerminalSize } from './loop/terminal-session.js';

/**
 * In-memory Sysfs. Directories exist implicitly for every stored file and can
 * be declared empty with mkdir(). Writes are recorded in order.
 */
export class VirtualSysfs implements Sysfs {
  private readonly files = new Map<string, string>();
  private readonly dirs = new Set<string>(['/']);
  private readonly denied = new Set<string>();
  readonly writes: Array<{ path: string; value: string }> = [];

  constructor(files: Record<string, string> = {}) {
    for (const [path, content] of Object.entries(files)) {
      this.set(path, content);
    }
  }

  set(path: string, content: string): this {
    this.files.set(path, content);
    this.mkdir(parentOf(path));
    return this;
  }

  remove(path: string): this {
    this.files.delete(path);
    return this;
  }

  mkdir(path: string): this {
    let current = path;
    while (current !== '/' && current !== '') {
      this.dirs.add(current);
      current = parentOf(current);
    }
    return this;
  }

  /** Subsequent writes to path fail with EACCES */
  deny(path: string): this {
    this.denied.add(path);
    return this;
  }

  exists(path: string): boolean {
    return this.files.has(path) || this.dirs.has(path);
  }

  readText(path: string): string {
    const content = this.files.get(path);
    if (content === undefined) {
      throw errno('ENOENT', `no such file: ${path}`);
    }
    return content;
  }

  listDir(path: string): string[] {
    if (!this.dirs.has(path)) {
      throw errno('ENOENT', `no such directory: ${path}`);
    }
    const prefix = path === '/' ? '/' : `${path}/`;
    const names = new Set<string>();
    for (const entry of [...this.files.keys(), ...this.dirs]) {
      if (entry.startsWith(prefix) && entry.length > prefix.length) {
        names.add(entry.slice(prefix.length).split('/')[0] ?? '');
      }
    }
    names.delete('');
    return [...names];
  }

  writeText(path: string, value: string): void {
    if (this.denied.has(path)) {
      throw errno('EACCES', `permission denied: ${path}`);
    }
    this.writes.push({ path, value });
    this.set(path, value);
  }
}

function parentOf(path: string): string {
  const at = path.lastIndexOf('/');
  return at <= 0 ? '/' : path.slice(0, at);
}

function errno(code: string, message: string): Error & { code: string } {
  return Object.assign(new Error(`${code}: ${message}`), { code });
}

/**
 * Builds /proc/stat text from per-core counters.
 */
export function procStat(cores: readonly CoreCounters[]): string {
  const lines = ['cpu  0 0 0 0 0 0 0 0 0 0'];
  for (const core of cores) {
    lines.push(
      `cpu${core.index} ${core.user} ${core.nice} ${core.system} ${core.idle} ${core.iowait} ${core.irq} ${core.softirq} 0 0 0`,
    );
  }
  lines.push('intr 12345', 'ctxt 6789', 'btime 1700000000');
  return `${lines.join('\n')}\n`;
}

export function counters(index: number, busy: number, idle: number): CoreCounters {
  return { index, user: busy, nice: 0, system: 0, idle, iowait: 0, irq: 0, softirq: 0 };
}

/**
 * A small Orin-like tree: two cores, meminfo, one GPU devfreq, two thermal
 * zones, one INA3221 channel, a fan, an L4T 36.4.3 manifest, nvpmodel and
 * two processes.
 */
export function boardFixture(cores: readonly CoreCounters[] = [counters(0, 100, 900), counters(1, 300, 700)]): VirtualSysfs {
  return new VirtualSysfs({
    '/proc/stat': procStat(cores),
    '/proc/1/comm': 'systemd\n',
    '/proc/42/comm': 'sshd\n',
    '/proc/meminfo': 'MemTotal: 8000 kB\nMemFree: 1000 kB\nBuffers: 500 kB\nCached: 2500 kB\nSwapTotal: 0 kB\nSwapFree: 0 kB\n',
    '/sys/devices/system/cpu/cpu0/cpufreq/scaling_cur_freq': '1200000\n',
    '/sys/devices/system/cpu/cpu0/cpufreq/scaling_governor': 'schedutil\n',
    '/sys/devices/system/cpu/cpu1/cpufreq/scaling_cur_freq': '1200000\n',
    '/sys/devices/system/cpu/cpu1/cpufreq/scaling_governor': 'schedutil\n',
    '/sys/class/devfreq/17000000.ga10b/max_freq': '1300000000\n',
    '/sys/class/devfreq/17000000.ga10b/cur_freq': '650000000\n',
    '/sys/class/devfreq/17000000.ga10b/governor': 'nvhost_podgov\n',
    '/sys/class/thermal/thermal_zone0/type': 'cpu-thermal\n',
    '/sys/class/thermal/thermal_zone0/temp': '48000\n',
    '/sys/class/thermal/thermal_zone1/type': 'gpu-thermal\n',
    '/sys/class/thermal/thermal_zone1/temp': '46000\n',
    '/sys/class/thermal/cooling_device0/type': 'pwm-fan\n',
    '/sys/class/thermal/cooling_device0/max_state': '4\n',
    '/sys/class/thermal/cooling_device0/cur_state': '1\n',
    '/sys/class/hwmon/hwmon0/name': 'ina3221\n',
    '/sys/class/hwmon/hwmon0/in1_label': 'VDD_IN\n',
    '/sys/class/hwmon/hwmon0/curr1_input': '1000\n',
    '/sys/class/hwmon/hwmon0/in1_input': '5000\n',
    '/sys/class/hwmon/hwmon1/name': 'pwmfan\n',
    '/sys/class/hwmon/hwmon1/pwm1_enable': '2\n',
    '/sys/class/hwmon/hwmon1/pwm1': '64\n',
    '/sys/class/hwmon/hwmon1/fan1_input': '1800\n',
    '/etc/nv_tegra_release': '# R36 (release), REVISION: 4.3, GCID: 1, BOARD: generic, EABI: aarch64\n',
    '/etc/nvpmodel.conf': '< POWER_MODEL ID=0 NAME=MAXN >\n< POWER_MODEL ID=1 NAME=MODE_15W >\n',
    '/var/lib/nvpmodel/status': 'pmode:0000\n',
    '/sys/firmware/devicetree/base/model': 'Test Orin Board\0',
    '/sys/firmware/devicetree/base/nvidia,boost': '0\0',
  });
}

/**
 * Terminal that replays a script of keys. A null entry is a wait that times
 * out, advancing the session clock by the requested timeout; once the script
 * runs out every read returns "q".
 */
export class ScriptedTerminal implements TerminalSession {
  clock = 0;
  teardowns = 0;
  readonly waits: number[] = [];
  readonly frames: string[] = [];
  private readonly script: Array<string | null>;

  constructor(script: ReadonlyArray<string | null> = []) {
    this.script = [...script];
  }

  readKey(timeoutMs: number): Promise<string | null> {
    this.waits.push(timeoutMs);
    const next = this.script.shift();
    if (next === undefined) return Promise.resolve('q');
    if (next === null) this.clock += timeoutMs;
    return Promise.resolve(next);
  }

  write(text: string): void {
    this.frames.push(text);
  }

  size(): TerminalSize {
    return { columns: 80, rows: 24 };
  }

  teardown(): void {
    this.teardowns++;
  }
}

/**
 * Fast-check generators for counter snapshots
 */

export const coreCountersArbitrary = (index: number): fc.Arbitrary<CoreCounters> =>
  fc.record({
    index: fc.constant(index),
    user: fc.nat({ max: 1_000_000 }),
    nice: fc.nat({ max: 1_000_000 }),
    system: fc.nat({ max: 1_000_000 }),
    idle: fc.nat({ max: 1_000_000 }),
    iowait: fc.nat({ max: 1_000_000 }),
    irq: fc.nat({ max: 1_000_000 }),
    softirq: fc.nat({ max: 1_000_000 }),
  });

export const snapshotArbitrary = (coreCount: number, ordinal = 1): fc.Arbitrary<CumulativeCounterSnapshot> =>
  fc
    .array(coreCountersArbitrary(0), { minLength: coreCount, maxLength: coreCount })
    .map((cores) => ({ ordinal, cores: cores.map((core, index) => ({ ...core, index })) }));

/** Non-negative per-field increments applied to a snapshot */
export const counterDeltaArbitrary = fc.record({
  user: fc.nat({ max: 10_000 }),
  nice: fc.nat({ max: 10_000 }),
  system: fc.nat({ max: 10_000 }),
  idle: fc.nat({ max: 10_000 }),
  iowait: fc.nat({ max: 10_000 }),
  irq: fc.nat({ max: 10_000 }),
  softirq: fc.nat({ max: 10_000 }),
});

export type CounterDelta = typeof counterDeltaArbitrary extends fc.Arbitrary<infer T> ? T : never;

export function advance(
  snapshot: CumulativeCounterSnapshot,
  delta: CounterDelta,
): CumulativeCounterSnapshot {
  return {
    ordinal: snapshot.ordinal + 1,
    cores: snapshot.cores.map((core) => ({
      index: core.index,
      user: core.user + delta.user,
      nice: core.nice + delta.nice,
      system: core.system + delta.system,
      idle: core.idle + delta.idle,
      iowait: core.iowait + delta.iowait,
      irq: core.irq + delta.irq,
      softirq: core.softirq + delta.softirq,
    })),
  };
}

/**
 * Test configuration for property-based tests
 */
export const propertyTestConfig = {
  numRuns: 30,
  timeout: 5000,
  verbose: false,
};
