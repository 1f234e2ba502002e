/**
 * Sample Interfaces
 *
 * Defines the composite snapshot produced once per tick from every hardware
 * domain of the board. Every field is always present: unavailable values are
 * reported as 0, '' or 'unknown' and lists as [].
 */

export interface CpuCoreReading {
  /** Core index as exposed by the kernel (cpuN) */
  index: number;
  /** Utilization percentage (0-100) derived from counter deltas */
  usage: number;
  /** Current frequency in Hz */
  frequency: number;
  /** cpufreq governor name */
  governor: string;
}

export interface CpuReading {
  /** Mean utilization of all cores (0-100) */
  usage: number;
  cores: CpuCoreReading[];
}

/** Raw per-core counters from /proc/stat, in USER_HZ ticks since boot */
export interface CoreCounters {
  index: number;
  user: number;
  nice: number;
  system: number;
  idle: number;
  iowait: number;
  irq: number;
  softirq: number;
}

export interface CumulativeCounterSnapshot {
  /** Tick number the snapshot was taken on; only ordering matters */
  ordinal: number;
  cores: CoreCounters[];
}

export type AcceleratorSourceKind = 'sysfs' | 'vendor' | 'none';

export interface AcceleratorProcess {
  pid: number;
  name: string;
  /** Accelerator memory held by the process in bytes */
  memory: number;
}

export interface AcceleratorReading {
  source: AcceleratorSourceKind;
  /** Utilization percentage (0-100) */
  usage: number;
  /** Current clock in Hz */
  frequency: number;
  /** Maximum clock in Hz */
  maxFrequency: number;
  /** Temperature in Celsius */
  temperature: number;
  governor: string;
  /** Dedicated memory in bytes, 0 on unified-memory boards */
  memoryUsed: number;
  memoryTotal: number;
  processes: AcceleratorProcess[];
}

export interface EngineReading {
  /** Engine identifier (ape, dla0, dla1, nvdec, nvenc, nvjpg) */
  name: string;
  online: boolean;
  /** Current clock in Hz */
  frequency: number;
}

export interface MemoryReading {
  ramUsed: number;
  ramTotal: number;
  ramCached: number;
  swapUsed: number;
  swapTotal: number;
  swapCached: number;
  /** On-chip SRAM (IRAM) figures, 0 where the board has none */
  sramUsed: number;
  sramTotal: number;
  sramLargestFreeBlock: number;
}

export interface ThermalZoneReading {
  index: number;
  /** Zone type as reported by the driver */
  name: string;
  /** Current temperature in Celsius */
  current: number;
  /** First trip point in Celsius */
  trip: number;
  /** Critical trip point in Celsius */
  critical: number;
}

export interface ThermalReading {
  cpu: number;
  gpu: number;
  board: number;
  pmic: number;
  zones: ThermalZoneReading[];
}

export interface PowerRailReading {
  name: string;
  /** Current in mA */
  current: number;
  /** Voltage in mV */
  voltage: number;
  /** Power in mW */
  power: number;
}

export interface PowerReading {
  rails: PowerRailReading[];
  /** Sum of rail power in W */
  total: number;
}

/** Advisory only: inferred from driver files or duty patterns */
export type CoolingMode = 'automatic' | 'manual' | 'off' | 'unknown';

export interface CoolingDeviceReading {
  index: number;
  name: string;
  /** Duty cycle percentage (0-100) */
  duty: number;
  rpm: number;
}

export interface CoolingReading {
  devices: CoolingDeviceReading[];
  duty: number;
  rpm: number;
  mode: CoolingMode;
}

export interface BoardIdentity {
  model: string;
  /** Human release label (JetPack), 'unknown' when it cannot be derived */
  firmwareLabel: string;
  /** Raw low-level version string (L4T) */
  firmwareVersion: string;
  serial: string;
}

export interface PerformanceProfile {
  id: number;
  name: string;
}

export interface ProfileReading {
  /** Active profile id, null when unreadable */
  current: number | null;
  profiles: PerformanceProfile[];
  boost: {
    enabled: boolean;
    /** Raw value of the boost status file */
    raw: string;
  };
}

export interface ProcessReading {
  /** Running processes: the numeric entries of /proc */
  total: number;
}

export interface Sample {
  /** Tick number the sample was produced on */
  ordinal: number;
  /** ISO-8601 timestamp */
  takenAt: string;
  cpu: CpuReading;
  accelerator: AcceleratorReading;
  engines: EngineReading[];
  memory: MemoryReading;
  thermal: ThermalReading;
  power: PowerReading;
  cooling: CoolingReading;
  board: BoardIdentity;
  profile: ProfileReading;
  processes: ProcessReading;
}
