/**
 * Memory Collector
 *
 * RAM, swap and on-chip SRAM (IRAM) figures from /proc/meminfo, in bytes.
 */

import type { Sysfs } from '../sysfs/index.js';
import { readKeyValues } from '../sysfs/index.js';
import type { MemoryReading } from '../types/index.js';

const PROC_MEMINFO = '/proc/meminfo';

function kilobytes(entries: Map<string, string>, key: string): number {
  const raw = entries.get(key);
  if (raw === undefined) return 0;
  const value = parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value * 1024 : 0;
}

export function memoryFromMeminfo(entries: Map<string, string>): MemoryReading {
  const ramTotal = kilobytes(entries, 'MemTotal');
  const free = kilobytes(entries, 'MemFree');
  const buffers = kilobytes(entries, 'Buffers');
  const cached = kilobytes(entries, 'Cached');
  const swapTotal = kilobytes(entries, 'SwapTotal');
  const swapFree = kilobytes(entries, 'SwapFree');
  const sramTotal = kilobytes(entries, 'IramTotal');
  const sramFree = kilobytes(entries, 'IramFree');
  const sramLargestFreeBlock = kilobytes(entries, 'IramLfb');

  return {
    ramUsed: Math.max(0, ramTotal - (free + buffers + cached)),
    ramTotal,
    ramCached: cached,
    swapUsed: Math.max(0, swapTotal - swapFree),
    swapTotal,
    swapCached: kilobytes(entries, 'SwapCached'),
    sramUsed: Math.max(0, sramTotal - sramFree),
    sramTotal,
    sramLargestFreeBlock,
  };
}

export class MemoryCollector {
  constructor(private readonly sysfs: Sysfs) {}

  collect(): MemoryReading {
    return memoryFromMeminfo(readKeyValues(this.sysfs, PROC_MEMINFO));
  }
}
