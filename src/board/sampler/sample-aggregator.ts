/**
 * Sample Aggregator
 *
 * Runs every domain collector once per tick and assembles one immutable
 * Sample. The counter read and the delta-rate observation are kept adjacent
 * so the measured interval stays close to the tick interval.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Sysfs } from '../sysfs/index.js';
import type { DashboardConfig, Sample } from '../types/index.js';
import {
  AcceleratorCollector,
  BoardIdentityCollector,
  CoolingCollector,
  CpuCollector,
  EngineCollector,
  MemoryCollector,
  PowerCollector,
  ProcessCollector,
  ProfileCollector,
  ThermalCollector,
  selectAcceleratorSource,
  type CommandRunner,
} from '../collectors/index.js';
import { DeltaRateEngine } from '../delta-rate/index.js';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { SerialQueue } from './serial-queue.js';
import { deepFreeze } from './deep-freeze.js';

const log = createSubsystemLogger('board/sampler');

export interface SampleCollectors {
  cpu: CpuCollector;
  accelerator: AcceleratorCollector;
  engines: EngineCollector;
  memory: MemoryCollector;
  thermal: ThermalCollector;
  power: PowerCollector;
  cooling: CoolingCollector;
  board: BoardIdentityCollector;
  profile: ProfileCollector;
  processes: ProcessCollector;
}

export interface SampleAggregatorOptions {
  /** Wall clock for takenAt */
  now?: () => Date;
  /** Waits between the two ticks of samplePair */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Builds every collector over one Sysfs. Hardware locations are resolved
 * here, once; the accelerator source is chosen from the board's firmware
 * version.
 */
export function createCollectors(
  sysfs: Sysfs,
  config: Pick<DashboardConfig, 'accelerator'>,
  runCommand?: CommandRunner,
): SampleCollectors {
  const board = new BoardIdentityCollector(sysfs);
  const identity = board.collect();
  const source = selectAcceleratorSource(sysfs, {
    preference: config.accelerator.strategy,
    firmwareVersion: identity.firmwareVersion,
    vendorMinMajor: config.accelerator.vendorMinMajor,
    vendorTool: config.accelerator.vendorTool,
    vendorTimeoutMs: config.accelerator.vendorTimeoutMs,
  });

  log.info('collectors ready', {
    model: identity.model,
    firmwareVersion: identity.firmwareVersion,
    accelerator: source.kind,
  });

  return {
    cpu: new CpuCollector(sysfs),
    accelerator: new AcceleratorCollector(sysfs, source, runCommand),
    engines: new EngineCollector(sysfs),
    memory: new MemoryCollector(sysfs),
    thermal: new ThermalCollector(sysfs),
    power: new PowerCollector(sysfs),
    cooling: new CoolingCollector(sysfs),
    board,
    profile: new ProfileCollector(sysfs),
    processes: new ProcessCollector(sysfs),
  };
}

export class SampleAggregator {
  private readonly engine = new DeltaRateEngine();
  private readonly queue = new SerialQueue();
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private ordinal = 0;

  constructor(
    private readonly collectors: SampleCollectors,
    options: SampleAggregatorOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
  }

  tick(): Readonly<Sample> {
    const ordinal = this.ordinal + 1;
    const { collectors } = this;

    const snapshot = collectors.cpu.readCounters(ordinal);
    const usages = this.engine.observe(snapshot);

    const sample: Sample = {
      ordinal,
      takenAt: this.now().toISOString(),
      cpu: collectors.cpu.collect(snapshot, usages),
      accelerator: collectors.accelerator.collect(),
      engines: collectors.engines.collect(),
      memory: collectors.memory.collect(),
      thermal: collectors.thermal.collect(),
      power: collectors.power.collect(),
      cooling: collectors.cooling.collect(),
      board: collectors.board.collect(),
      profile: collectors.profile.collect(),
      processes: collectors.processes.collect(),
    };

    // Only a fully assembled sample advances the ordinal.
    this.ordinal = ordinal;
    return deepFreeze(sample);
  }

  /**
   * Two ticks `intervalMs` apart, returning the second; the first only
   * primes the delta-rate baseline. Concurrent callers run one at a time.
   */
  samplePair(intervalMs: number): Promise<Readonly<Sample>> {
    return this.queue.run(async () => {
      this.tick();
      await this.sleep(intervalMs);
      return this.tick();
    });
  }

  get ticks(): number {
    return this.ordinal;
  }
}
