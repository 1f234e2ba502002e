/**
 * Unit Tests for the Delta-Rate Engine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DeltaRateEngine, coreUsage } from './delta-rate-engine.js';
import { counters } from '../test-setup.js';

describe('coreUsage', () => {
  it('should compute busy share of the total delta', () => {
    expect(coreUsage(counters(0, 100, 900), counters(0, 150, 950))).toBe(50);
  });

  it('should count nice, system, irq and softirq as busy and iowait as idle', () => {
    const before = { index: 0, user: 0, nice: 0, system: 0, idle: 0, iowait: 0, irq: 0, softirq: 0 };
    const after = { index: 0, user: 10, nice: 10, system: 10, idle: 20, iowait: 20, irq: 10, softirq: 20 };

    expect(coreUsage(before, after)).toBe(60);
  });

  it('should return 0 when the total does not advance', () => {
    expect(coreUsage(counters(0, 100, 900), counters(0, 100, 900))).toBe(0);
    expect(coreUsage(counters(0, 100, 900), counters(0, 90, 800))).toBe(0);
  });

  it('should clamp to the valid range', () => {
    // busy went backwards while idle advanced
    expect(coreUsage(counters(0, 100, 900), counters(0, 50, 1000))).toBe(0);
  });
});

describe('DeltaRateEngine', () => {
  let engine: DeltaRateEngine;

  beforeEach(() => {
    engine = new DeltaRateEngine();
  });

  it('should report zeros on the first observation and store the baseline', () => {
    expect(engine.observe({ ordinal: 1, cores: [counters(0, 100, 900), counters(1, 10, 90)] })).toEqual([0, 0]);
    expect(engine.baselineOrdinal).toBe(1);
  });

  it('should derive usage from the previous tick only', () => {
    engine.observe({ ordinal: 1, cores: [counters(0, 0, 0)] });
    engine.observe({ ordinal: 2, cores: [counters(0, 100, 100)] });

    expect(engine.observe({ ordinal: 3, cores: [counters(0, 110, 190)] })).toEqual([10]);
  });

  it('should reset on a topology change and use the new baseline afterwards', () => {
    engine.observe({ ordinal: 1, cores: [counters(0, 100, 900)] });

    expect(engine.observe({ ordinal: 2, cores: [counters(0, 200, 1000), counters(1, 0, 0)] })).toEqual([0, 0]);
    expect(engine.observe({ ordinal: 3, cores: [counters(0, 250, 1050), counters(1, 75, 25)] })).toEqual([50, 75]);
  });

  it('should pair cores by index', () => {
    engine.observe({ ordinal: 1, cores: [counters(0, 0, 0), counters(1, 0, 0)] });

    expect(engine.observe({ ordinal: 2, cores: [counters(1, 20, 80), counters(0, 80, 20)] })).toEqual([20, 80]);
  });

  it('should report zero for a core index that was not present before', () => {
    engine.observe({ ordinal: 1, cores: [counters(0, 0, 0), counters(1, 0, 0)] });

    expect(engine.observe({ ordinal: 2, cores: [counters(0, 50, 50), counters(4, 50, 50)] })).toEqual([50, 0]);
  });

  it('should start over after reset', () => {
    engine.observe({ ordinal: 1, cores: [counters(0, 0, 0)] });
    engine.reset();

    expect(engine.baselineOrdinal).toBeNull();
    expect(engine.observe({ ordinal: 2, cores: [counters(0, 50, 50)] })).toEqual([0]);
  });
});
