/**
 * Unit Tests for the Screen State Machine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ScreenStateMachine, screenAt, screenIndex } from './screen-state.js';

describe('ScreenStateMachine', () => {
  let screens: ScreenStateMachine;

  beforeEach(() => {
    screens = new ScreenStateMachine();
  });

  it('should start on the overview', () => {
    expect(screens.current).toBe('overview');
  });

  it('should select screens by 1-based index', () => {
    expect(screens.select(5)).toBe(true);
    expect(screens.current).toBe('power');

    expect(screens.select(7)).toBe(true);
    expect(screens.current).toBe('control');
  });

  it('should ignore out-of-range and fractional indices', () => {
    for (const index of [0, 9, -1, 2.5, Number.NaN]) {
      expect(screens.select(index)).toBe(false);
      expect(screens.current).toBe('overview');
    }
  });

  it('should wrap when moving past either end', () => {
    screens.select(8);

    expect(screens.next()).toBe('overview');
    expect(screens.previous()).toBe('info');
    expect(screens.previous()).toBe('control');
  });
});

describe('screen indices', () => {
  it('should map indices and screens both ways', () => {
    expect(screenAt(1)).toBe('overview');
    expect(screenAt(3)).toBe('accelerator');
    expect(screenAt(8)).toBe('info');
    expect(screenAt(9)).toBeNull();
    expect(screenIndex('temperature')).toBe(6);
  });
});
