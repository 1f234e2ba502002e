/**
 * Unit Tests for the Memory Collector
 */

import { describe, it, expect } from 'vitest';
import { MemoryCollector } from './memory-collector.js';
import { VirtualSysfs } from '../test-setup.js';

const MEMINFO = [
  'MemTotal:        8000 kB',
  'MemFree:         1000 kB',
  'MemAvailable:    5000 kB',
  'Buffers:          500 kB',
  'Cached:          2500 kB',
  'SwapCached:       100 kB',
  'SwapTotal:       4000 kB',
  'SwapFree:        3000 kB',
  'IramTotal:        252 kB',
  'IramFree:         200 kB',
  'IramLfb:          100 kB',
].join('\n');

describe('MemoryCollector', () => {
  it('should derive used figures in bytes', () => {
    const reading = new MemoryCollector(new VirtualSysfs({ '/proc/meminfo': MEMINFO })).collect();

    expect(reading).toEqual({
      ramUsed: 4000 * 1024,
      ramTotal: 8000 * 1024,
      ramCached: 2500 * 1024,
      swapUsed: 1000 * 1024,
      swapTotal: 4000 * 1024,
      swapCached: 100 * 1024,
      sramUsed: 52 * 1024,
      sramTotal: 252 * 1024,
      sramLargestFreeBlock: 100 * 1024,
    });
  });

  it('should floor used RAM at zero', () => {
    const reading = new MemoryCollector(
      new VirtualSysfs({ '/proc/meminfo': 'MemTotal: 1000 kB\nMemFree: 900 kB\nCached: 500 kB\n' }),
    ).collect();

    expect(reading.ramUsed).toBe(0);
    expect(reading.ramTotal).toBe(1000 * 1024);
  });

  it('should report zero SRAM on boards without IRAM', () => {
    const reading = new MemoryCollector(new VirtualSysfs({ '/proc/meminfo': 'MemTotal: 1000 kB\n' })).collect();

    expect(reading.sramTotal).toBe(0);
    expect(reading.sramUsed).toBe(0);
  });
});
