/**
 * Unit Tests for the Control Panel
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ControlPanel } from './control-panel.js';
import type { CoolingReading, ProfileReading } from '../types/index.js';

function state(duty: number, current: number | null, ids: number[] = []): { cooling: CoolingReading; profile: ProfileReading } {
  return {
    cooling: { devices: [], duty, rpm: 0, mode: 'manual' },
    profile: {
      current,
      profiles: ids.map((id) => ({ id, name: `MODE_${id}` })),
      boost: { enabled: false, raw: '0' },
    },
  };
}

describe('ControlPanel', () => {
  let panel: ControlPanel;

  beforeEach(() => {
    panel = new ControlPanel();
  });

  it('should start on the fan duty item', () => {
    expect(panel.selected).toBe('cooling-duty');
    expect(panel.handleSelect()).toEqual({ type: 'set-cooling-duty', duty: 0 });
  });

  it('should move the cursor with wrap-around', () => {
    panel.moveDown();
    expect(panel.selected).toBe('boost');
    panel.moveDown();
    expect(panel.selected).toBe('profile');
    panel.moveDown();
    expect(panel.selected).toBe('cooling-duty');
    panel.moveUp();
    expect(panel.selected).toBe('profile');
  });

  it('should seed the duty target from the board rounded to a step', () => {
    panel.sync(state(43, null));

    expect(panel.dutyTarget).toBe(40);
  });

  it('should adjust the duty target within 0-100', () => {
    panel.sync(state(90, null));
    panel.adjust(1);
    panel.adjust(1);

    expect(panel.handleSelect()).toEqual({ type: 'set-cooling-duty', duty: 100 });

    for (let step = 0; step < 12; step++) panel.adjust(-1);

    expect(panel.dutyTarget).toBe(0);
  });

  it('should keep adjusted targets across syncs unless forced', () => {
    panel.sync(state(20, null));
    panel.adjust(1);
    panel.sync(state(80, null));

    expect(panel.dutyTarget).toBe(30);

    panel.sync(state(80, null), true);

    expect(panel.dutyTarget).toBe(80);
  });

  it('should toggle boost', () => {
    panel.moveDown();

    expect(panel.handleSelect()).toEqual({ type: 'toggle-boost' });
  });

  it('should cycle through declared profiles', () => {
    panel.sync(state(0, 2, [2, 0, 1]));
    panel.moveUp();

    expect(panel.handleSelect()).toEqual({ type: 'set-performance-profile', id: 2 });

    panel.adjust(1);
    expect(panel.profileTarget).toBe(0);

    panel.adjust(-1);
    expect(panel.profileTarget).toBe(2);
  });

  it('should cycle through the full id range without declared profiles', () => {
    panel.sync(state(0, null));
    panel.moveUp();
    panel.adjust(-1);

    expect(panel.handleSelect()).toEqual({ type: 'set-performance-profile', id: 15 });
  });

  it('should remember the last outcome', () => {
    const outcome = { action: { type: 'toggle-boost' } as const, ok: true, message: 'boost on' };
    panel.record(outcome);

    expect(panel.outcome).toEqual(outcome);
  });
});
