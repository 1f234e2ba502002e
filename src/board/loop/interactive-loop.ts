/**
 * Interactive Loop
 *
 * The dashboard's single control flow. Each cycle waits for a key no longer
 * than the time left until the next tick, turns the key into ControlMessages,
 * drains the queue, then samples and renders when the tick is due or the
 * screen changed. The terminal is acquired by the constructor and released
 * exactly once when run() settles, whatever the exit route.
 */

import type { ControlAction, ControlMessage, ControlOutcome, Sample } from '../types/index.js';
import {
  ControlPanel,
  ScreenStateMachine,
  followingScreen,
  precedingScreen,
  projectView,
  screenAt,
} from '../screens/index.js';
import type { RenderCallback } from '../render/index.js';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { resolveDashboardCommand, screenShortcut } from './key-input.js';
import type { TerminalSession } from './terminal-session.js';

const log = createSubsystemLogger('board/loop');

export interface LoopDependencies {
  /** Called once, from the constructor */
  openTerminal: () => TerminalSession;
  /** Builds the render callback over the acquired terminal */
  createRenderer: (terminal: TerminalSession) => RenderCallback;
  sampler: { tick(): Readonly<Sample> };
  control: { dispatch(action: ControlAction): ControlOutcome };
}

export interface LoopOptions {
  tickIntervalMs: number;
  /** Monotonic milliseconds */
  now?: () => number;
}

export type LoopOutcome = { reason: 'exit' } | { reason: 'error'; message: string };

export class InteractiveLoop {
  private readonly terminal: TerminalSession;
  private readonly render: RenderCallback;
  private readonly messages: ControlMessage[] = [];
  private readonly screens = new ScreenStateMachine();
  private readonly panel = new ControlPanel();
  private readonly now: () => number;
  private lastTickAt = Number.NEGATIVE_INFINITY;
  private redrawRequested = true;
  private running = false;

  constructor(
    private readonly deps: LoopDependencies,
    private readonly options: LoopOptions,
  ) {
    this.now = options.now ?? (() => performance.now());
    this.terminal = deps.openTerminal();
    this.render = deps.createRenderer(this.terminal);
  }

  get screen(): ScreenStateMachine {
    return this.screens;
  }

  /** Queues a message from outside the loop, e.g. a signal handler */
  post(message: ControlMessage): void {
    this.messages.push(message);
  }

  async run(): Promise<LoopOutcome> {
    if (this.running) {
      throw new Error('Interactive loop is already running');
    }
    this.running = true;

    try {
      for (;;) {
        const stop = this.drain();
        if (stop !== null) return stop;

        const elapsed = this.now() - this.lastTickAt;
        const key = await this.terminal.readKey(Math.max(0, this.options.tickIntervalMs - elapsed));

        try {
          if (key !== null) this.handleKey(key);
          const stopAfterInput = this.drain();
          if (stopAfterInput !== null) return stopAfterInput;

          if (this.redrawRequested || this.now() - this.lastTickAt >= this.options.tickIntervalMs) {
            this.tick();
          }
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          log.error('dashboard tick failed', { screen: this.screens.current, error: message });
          this.post({ type: 'error', message });
        }
      }
    } finally {
      this.terminal.teardown();
      this.running = false;
    }
  }

  private tick(): void {
    const sample = this.deps.sampler.tick();
    this.lastTickAt = this.now();
    this.redrawRequested = false;

    this.panel.sync(sample);
    const screen = this.screens.current;
    this.render(screen, projectView(screen, sample, this.panel));
  }

  /** Applies queued messages; returns an outcome once the loop must stop */
  private drain(): LoopOutcome | null {
    for (let message = this.messages.shift(); message !== undefined; message = this.messages.shift()) {
      switch (message.type) {
        case 'set-screen':
          if (message.screen !== this.screens.current) {
            this.screens.set(message.screen);
            this.redrawRequested = true;
          }
          break;
        case 'update':
          this.redrawRequested = true;
          break;
        case 'exit':
          return { reason: 'exit' };
        case 'error':
          return { reason: 'error', message: message.message };
      }
    }
    return null;
  }

  private handleKey(key: string): void {
    const index = screenShortcut(key);
    if (index !== null) {
      const screen = screenAt(index);
      if (screen !== null) this.post({ type: 'set-screen', screen });
      return;
    }

    const command = resolveDashboardCommand(key);
    const onControl = this.screens.current === 'control';
    switch (command) {
      case 'quit':
        this.post({ type: 'exit' });
        return;
      case 'next-screen':
        this.post({ type: 'set-screen', screen: followingScreen(this.screens.current) });
        return;
      case 'previous-screen':
        this.post({ type: 'set-screen', screen: precedingScreen(this.screens.current) });
        return;
      case undefined:
        return;
    }

    if (!onControl) return;

    switch (command) {
      case 'move-up':
        this.panel.moveUp();
        break;
      case 'move-down':
        this.panel.moveDown();
        break;
      case 'decrease':
        this.panel.adjust(-1);
        break;
      case 'increase':
        this.panel.adjust(1);
        break;
      case 'activate': {
        const outcome = this.deps.control.dispatch(this.panel.handleSelect());
        this.panel.record(outcome);
        break;
      }
    }
    this.post({ type: 'update' });
  }
}
