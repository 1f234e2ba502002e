/**
 * Unit Tests for the node Sysfs implementation
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { createNodeSysfs, naturalSort, indexedEntry } from './sysfs.js';

vi.mock('node:fs');

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);
const mockWriteFileSync = vi.mocked(writeFileSync);

describe('createNodeSysfs', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should read paths as given on the real root', () => {
    mockReadFileSync.mockReturnValue('schedutil\n');

    const sysfs = createNodeSysfs();

    expect(sysfs.readText('/sys/devices/system/cpu/cpu0/cpufreq/scaling_governor')).toBe('schedutil\n');
    expect(mockReadFileSync).toHaveBeenCalledWith('/sys/devices/system/cpu/cpu0/cpufreq/scaling_governor', 'utf8');
  });

  it('should resolve paths under a custom root', () => {
    mockExistsSync.mockReturnValue(true);

    const sysfs = createNodeSysfs('/tmp/board');

    expect(sysfs.exists('/proc/stat')).toBe(true);
    expect(mockExistsSync).toHaveBeenCalledWith('/tmp/board/proc/stat');
  });

  it('should write under the root', () => {
    const sysfs = createNodeSysfs('/tmp/board');

    sysfs.writeText('/sys/class/hwmon/hwmon1/pwm1', '128');

    expect(mockWriteFileSync).toHaveBeenCalledWith('/tmp/board/sys/class/hwmon/hwmon1/pwm1', '128');
  });

  it('should propagate read failures', () => {
    mockReadFileSync.mockImplementation(() => {
      throw new Error('ENOENT');
    });

    expect(() => createNodeSysfs().readText('/proc/meminfo')).toThrow('ENOENT');
  });
});

describe('naturalSort', () => {
  it('should order numeric suffixes numerically', () => {
    expect(naturalSort(['thermal_zone10', 'thermal_zone2', 'thermal_zone1'])).toEqual([
      'thermal_zone1',
      'thermal_zone2',
      'thermal_zone10',
    ]);
  });
});

describe('indexedEntry', () => {
  it('should extract the index of matching entries', () => {
    expect(indexedEntry('cpu12', 'cpu')).toBe(12);
    expect(indexedEntry('cpufreq', 'cpu')).toBeNull();
    expect(indexedEntry('hwmon', 'hwmon')).toBeNull();
  });
});
