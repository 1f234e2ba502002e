/**
 * Terminal Session
 *
 * Owns the terminal while the dashboard runs: raw-mode input, the alternate
 * screen and a hidden cursor. teardown() puts all three back and is safe to
 * call more than once.
 *
 * An escape sequence cut at a chunk boundary is held until the next chunk
 * completes it; with no continuation within ESCAPE_GRACE_MS the held bytes
 * are reported as keys (a lone ESC becomes "escape").
 */

import { ANSI } from '../render/ansi.js';
import { decodeKeyStream, decodeKeys } from './key-input.js';

export interface TerminalSize {
  columns: number;
  rows: number;
}

export interface TerminalSession {
  /** Next key name, or null once timeoutMs passes without input */
  readKey(timeoutMs: number): Promise<string | null>;
  write(text: string): void;
  size(): TerminalSize;
  teardown(): void;
}

/** The parts of process.stdin a session uses */
export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

/** The parts of process.stdout a session uses */
export interface TerminalOutput {
  write(text: string): unknown;
  columns?: number;
  rows?: number;
}

const FALLBACK_SIZE: TerminalSize = { columns: 80, rows: 24 };

export const ESCAPE_GRACE_MS = 40;

export class NodeTerminalSession implements TerminalSession {
  private readonly pending: string[] = [];
  private waiter: ((key: string | null) => void) | null = null;
  private closed = false;
  private partial = '';
  private partialTimer: ReturnType<typeof setTimeout> | null = null;

  private readonly onData = (chunk: Buffer | string): void => {
    this.clearPartialTimer();
    const text = this.partial + (typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
    const { keys, partial } = decodeKeyStream(text);
    this.pending.push(...keys);
    this.partial = partial;
    if (partial !== '') {
      this.partialTimer = setTimeout(this.flushPartial, ESCAPE_GRACE_MS);
    }
    this.deliver();
  };

  private readonly flushPartial = (): void => {
    this.partialTimer = null;
    this.pending.push(...decodeKeys(this.partial));
    this.partial = '';
    this.deliver();
  };

  constructor(
    private readonly input: TerminalInput = process.stdin,
    private readonly output: TerminalOutput = process.stdout,
  ) {
    this.output.write(ANSI.altOn + ANSI.hideCursor + ANSI.clear);
    if (this.input.isTTY) {
      this.input.setRawMode?.(true);
    }
    this.input.on('data', this.onData);
    this.input.resume();
  }

  readKey(timeoutMs: number): Promise<string | null> {
    const queued = this.pending.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, Math.max(0, timeoutMs));

      this.waiter = (key) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(key);
      };
    });
  }

  private deliver(): void {
    const key = this.waiter === null ? undefined : this.pending.shift();
    if (key !== undefined) {
      this.waiter?.(key);
    }
  }

  private clearPartialTimer(): void {
    if (this.partialTimer !== null) {
      clearTimeout(this.partialTimer);
      this.partialTimer = null;
    }
  }

  write(text: string): void {
    this.output.write(text);
  }

  size(): TerminalSize {
    return {
      columns: this.output.columns || FALLBACK_SIZE.columns,
      rows: this.output.rows || FALLBACK_SIZE.rows,
    };
  }

  teardown(): void {
    if (this.closed) return;
    this.closed = true;

    this.clearPartialTimer();
    this.partial = '';
    this.input.off('data', this.onData);
    if (this.input.isTTY) {
      this.input.setRawMode?.(false);
    }
    this.input.pause();
    this.waiter?.(null);
    this.output.write(ANSI.reset + ANSI.showCursor + ANSI.altOff);
  }
}
