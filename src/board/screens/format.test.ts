/**
 * Unit Tests for display formatting
 */

import { describe, it, expect } from 'vitest';
import {
  formatBytes,
  formatCelsius,
  formatFrequency,
  formatMilliwatts,
  formatPercent,
  formatWatts,
  usedShare,
} from './format.js';

describe('format', () => {
  it('should format byte counts in binary units', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KiB');
    expect(formatBytes(3 * 1024 * 1024 * 1024)).toBe('3.0 GiB');
  });

  it('should format frequencies', () => {
    expect(formatFrequency(0)).toBe('-');
    expect(formatFrequency(650_000_000)).toBe('650 MHz');
    expect(formatFrequency(1_420_800_000)).toBe('1.42 GHz');
  });

  it('should format percentages, temperatures and power', () => {
    expect(formatPercent(49.6)).toBe('50%');
    expect(formatPercent(Number.NaN)).toBe('0%');
    expect(formatCelsius(45.5)).toBe('45.5°C');
    expect(formatMilliwatts(500)).toBe('500 mW');
    expect(formatMilliwatts(7500)).toBe('7.50 W');
    expect(formatWatts(11.5)).toBe('11.50 W');
  });

  it('should compute used shares safely', () => {
    expect(usedShare(1, 4)).toBe(25);
    expect(usedShare(1, 0)).toBe(0);
  });
});
