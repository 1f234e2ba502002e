/**
 * Delta-Rate Engine
 *
 * Turns monotonic per-core counters into utilization percentages by pairing
 * each snapshot with the one observed immediately before it. The stored
 * snapshot is replaced on every call, and a change in core count resets the
 * baseline rather than mixing core indices across a hot-plug.
 */

import type { CoreCounters, CumulativeCounterSnapshot } from '../types/index.js';

export function busyTime(core: CoreCounters): number {
  return core.user + core.nice + core.system + core.irq + core.softirq;
}

export function totalTime(core: CoreCounters): number {
  return busyTime(core) + core.idle + core.iowait;
}

/**
 * Usage of one core between two readings, clamped to [0, 100]. A
 * non-positive total delta yields 0.
 */
export function coreUsage(previous: CoreCounters, current: CoreCounters): number {
  const totalDelta = totalTime(current) - totalTime(previous);
  if (totalDelta <= 0) {
    return 0;
  }
  const usage = (100 * (busyTime(current) - busyTime(previous))) / totalDelta;
  return Math.min(100, Math.max(0, usage));
}

export class DeltaRateEngine {
  private previous: CumulativeCounterSnapshot | null = null;

  /**
   * Returns one usage figure per core of `current`, in its order.
   */
  observe(current: CumulativeCounterSnapshot): number[] {
    const previous = this.previous;
    this.previous = current;

    if (previous === null || previous.cores.length !== current.cores.length) {
      return current.cores.map(() => 0);
    }

    const byIndex = new Map(previous.cores.map((core) => [core.index, core]));
    return current.cores.map((core) => {
      const before = byIndex.get(core.index);
      return before === undefined ? 0 : coreUsage(before, core);
    });
  }

  /** Ordinal of the stored baseline, or null before the first observation */
  get baselineOrdinal(): number | null {
    return this.previous?.ordinal ?? null;
  }

  reset(): void {
    this.previous = null;
  }
}
