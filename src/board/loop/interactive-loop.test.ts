/**
 * Unit Tests for the Interactive Loop
 */

import { describe, it, expect, vi } from 'vitest';
import { InteractiveLoop } from './interactive-loop.js';
import { SampleAggregator, createCollectors } from '../sampler/index.js';
import { DEFAULT_DASHBOARD_CONFIG } from '../config/index.js';
import { ScriptedTerminal, boardFixture } from '../test-setup.js';
import type { ScreenView } from '../screens/index.js';
import type { ControlAction, ControlOutcome, Sample, ScreenState } from '../types/index.js';

const TICK_MS = 250;

function harness(script: Array<string | null>, tick?: () => Readonly<Sample>) {
  const terminal = new ScriptedTerminal(script);
  const aggregator = new SampleAggregator(createCollectors(boardFixture(), DEFAULT_DASHBOARD_CONFIG));
  const renders: Array<{ screen: ScreenState; view: ScreenView }> = [];
  const sampler = { tick: vi.fn(tick ?? (() => aggregator.tick())) };
  const control = {
    dispatch: vi.fn((action: ControlAction): ControlOutcome => ({ action, ok: true, message: 'done' })),
  };

  const loop = new InteractiveLoop(
    {
      openTerminal: () => terminal,
      createRenderer: () => (screen, view) => {
        renders.push({ screen, view });
      },
      sampler,
      control,
    },
    { tickIntervalMs: TICK_MS, now: () => terminal.clock },
  );

  return { terminal, renders, sampler, control, loop };
}

describe('InteractiveLoop', () => {
  it('should stop on the quit key and restore the terminal', async () => {
    const { loop, terminal, renders } = harness(['q']);

    await expect(loop.run()).resolves.toEqual({ reason: 'exit' });
    expect(terminal.teardowns).toBe(1);
    expect(terminal.waits).toEqual([0]);
    expect(renders).toEqual([]);
  });

  it('should select and render a screen from a number key', async () => {
    const { loop, renders, terminal } = harness(['5', 'q']);

    await loop.run();

    expect(renders.map((render) => render.screen)).toEqual(['power']);
    expect(renders[0]?.view.title).toBe('Power');
    expect(terminal.waits).toEqual([0, TICK_MS]);
  });

  it('should tick when the interval elapses', async () => {
    const { loop, sampler, terminal } = harness([null, null, 'q']);

    await loop.run();

    expect(sampler.tick).toHaveBeenCalledTimes(2);
    expect(terminal.waits).toEqual([0, TICK_MS, TICK_MS]);
  });

  it('should ignore unrecognised and out-of-range keys', async () => {
    const { loop, sampler } = harness([null, '9', 'x', 'down', 'q']);

    await loop.run();

    expect(sampler.tick).toHaveBeenCalledTimes(1);
    expect(loop.screen.current).toBe('overview');
  });

  it('should cycle screens with tab and shift-tab', async () => {
    const { loop, renders } = harness(['tab', 'shift+tab', 'shift+tab', 'q']);

    await loop.run();

    expect(renders.map((render) => render.screen)).toEqual(['cpu', 'overview', 'info']);
  });

  it('should dispatch the selected control action and show its outcome', async () => {
    const { loop, control, renders } = harness(['7', 'enter', 'q']);

    await loop.run();

    expect(control.dispatch).toHaveBeenCalledWith({ type: 'set-cooling-duty', duty: 30 });
    expect(renders.at(-1)?.view.status).toBe('ok: done');
  });

  it('should adjust control targets with the arrow keys', async () => {
    const { loop, control } = harness(['7', 'down', 'down', 'right', 'enter', 'q']);

    await loop.run();

    expect(control.dispatch).toHaveBeenCalledWith({ type: 'set-performance-profile', id: 1 });
  });

  it('should honour an exit posted before the first cycle', async () => {
    const { loop, terminal } = harness([]);
    loop.post({ type: 'exit' });

    await expect(loop.run()).resolves.toEqual({ reason: 'exit' });
    expect(terminal.waits).toEqual([]);
    expect(terminal.teardowns).toBe(1);
  });

  it('should end with an error outcome when a tick fails', async () => {
    const { loop, terminal, renders } = harness([null], () => {
      throw new Error('thermal read exploded');
    });

    await expect(loop.run()).resolves.toEqual({ reason: 'error', message: 'thermal read exploded' });
    expect(terminal.teardowns).toBe(1);
    expect(renders).toEqual([]);
  });

  it('should restore the terminal when waiting for input fails', async () => {
    const { loop, terminal } = harness([]);
    vi.spyOn(terminal, 'readKey').mockRejectedValue(new Error('stdin closed'));

    await expect(loop.run()).rejects.toThrow('stdin closed');
    expect(terminal.teardowns).toBe(1);
  });
});
