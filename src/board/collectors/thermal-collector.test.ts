/**
 * Unit Tests for the Thermal Collector
 */

import { describe, it, expect } from 'vitest';
import { ThermalCollector, classifyZone } from './thermal-collector.js';
import { VirtualSysfs } from '../test-setup.js';

const zone = (index: number): string => `/sys/class/thermal/thermal_zone${index}`;

describe('classifyZone', () => {
  it('should match fragments case-insensitively in priority order', () => {
    expect(classifyZone('CPU-therm')).toBe('cpu');
    expect(classifyZone('BCPU-therm')).toBe('cpu');
    expect(classifyZone('GPU-therm')).toBe('gpu');
    expect(classifyZone('PMIC-Die')).toBe('pmic');
    expect(classifyZone('Tboard_tegra')).toBe('board');
    expect(classifyZone('soc0-thermal')).toBeNull();
  });
});

describe('ThermalCollector', () => {
  const sysfs = new VirtualSysfs({
    [`${zone(0)}/type`]: 'CPU-therm\n',
    [`${zone(0)}/temp`]: '45500\n',
    [`${zone(0)}/trip_point_0_type`]: 'passive\n',
    [`${zone(0)}/trip_point_0_temp`]: '96000\n',
    [`${zone(0)}/trip_point_1_type`]: 'critical\n',
    [`${zone(0)}/trip_point_1_temp`]: '102500\n',
    [`${zone(1)}/type`]: 'GPU-therm\n',
    [`${zone(1)}/temp`]: '43000\n',
    [`${zone(2)}/type`]: 'Tboard_tegra\n',
    [`${zone(2)}/temp`]: '38000\n',
    [`${zone(3)}/type`]: 'soc0-thermal\n',
    [`${zone(3)}/temp`]: '40000\n',
    [`${zone(4)}/type`]: 'PMIC-Die\n',
    [`${zone(4)}/temp`]: '100000\n',
    [`${zone(10)}/type`]: 'cpu-secondary\n',
    [`${zone(10)}/temp`]: '60000\n',
    '/sys/class/thermal/cooling_device0/type': 'pwm-fan\n',
  });

  it('should list every zone in numeric order', () => {
    const reading = new ThermalCollector(sysfs).collect();

    expect(reading.zones.map((entry) => entry.index)).toEqual([0, 1, 2, 3, 4, 10]);
  });

  it('should promote the first zone of each kind to its named field', () => {
    const reading = new ThermalCollector(sysfs).collect();

    expect(reading.cpu).toBe(45.5);
    expect(reading.gpu).toBe(43);
    expect(reading.board).toBe(38);
    expect(reading.pmic).toBe(100);
  });

  it('should read the first trip point and the critical trip point', () => {
    const [first, second] = new ThermalCollector(sysfs).collect().zones;

    expect(first).toEqual({ index: 0, name: 'CPU-therm', current: 45.5, trip: 96, critical: 102.5 });
    expect(second).toEqual({ index: 1, name: 'GPU-therm', current: 43, trip: 0, critical: 0 });
  });

  it('should keep unclassified zones in the raw list only', () => {
    const reading = new ThermalCollector(sysfs).collect();

    expect(reading.zones[3]?.name).toBe('soc0-thermal');
  });
});
