/**
 * Board entry point
 *
 * Wires one board's collectors, aggregator and control surface from a
 * DashboardConfig. The CLI and embedding callers go through here.
 */

import { createNodeSysfs, type Sysfs } from './sysfs/index.js';
import type { DashboardConfig, Sample } from './types/index.js';
import { createCollectors, SampleAggregator } from './sampler/index.js';
import { ControlSurface } from './control/index.js';
import { runCommand, type CommandRunner } from './collectors/index.js';
import { InteractiveLoop, NodeTerminalSession, type TerminalSession } from './loop/index.js';
import { TextRenderer } from './render/index.js';

export interface Board {
  config: DashboardConfig;
  sysfs: Sysfs;
  sampler: SampleAggregator;
  control: ControlSurface;
}

export interface OpenBoardOptions {
  /** Defaults to the node filesystem under config.sysRoot */
  sysfs?: Sysfs;
  runCommand?: CommandRunner;
}

export function openBoard(config: DashboardConfig, options: OpenBoardOptions = {}): Board {
  const sysfs = options.sysfs ?? createNodeSysfs(config.sysRoot);
  const run = options.runCommand ?? runCommand;

  return {
    config,
    sysfs,
    sampler: new SampleAggregator(createCollectors(sysfs, config, run)),
    control: new ControlSurface(sysfs, config.control, run),
  };
}

/** One fully primed Sample, for the one-shot surface */
export function takeSnapshot(board: Board): Promise<Readonly<Sample>> {
  return board.sampler.samplePair(board.config.statsIntervalMs);
}

export function createDashboardLoop(
  board: Board,
  openTerminal: () => TerminalSession = () => new NodeTerminalSession(),
): InteractiveLoop {
  return new InteractiveLoop(
    {
      openTerminal,
      createRenderer: (terminal) => new TextRenderer(terminal).render,
      sampler: board.sampler,
      control: board.control,
    },
    { tickIntervalMs: board.config.tickIntervalMs },
  );
}
