/**
 * Screen State Machine
 *
 * A fixed, ordered set of dashboard views. Screens are addressed by their
 * 1-based position; anything outside 1..8 is ignored.
 */

import { SCREEN_ORDER, type ScreenState } from '../types/index.js';

export const SCREEN_COUNT = SCREEN_ORDER.length;

/** Screen at a 1-based index, or null when out of range */
export function screenAt(index: number): ScreenState | null {
  if (!Number.isInteger(index) || index < 1 || index > SCREEN_COUNT) {
    return null;
  }
  return SCREEN_ORDER[index - 1] ?? null;
}

export function screenIndex(screen: ScreenState): number {
  return SCREEN_ORDER.indexOf(screen) + 1;
}

export function followingScreen(screen: ScreenState): ScreenState {
  return SCREEN_ORDER[screenIndex(screen) % SCREEN_COUNT] ?? screen;
}

export function precedingScreen(screen: ScreenState): ScreenState {
  return SCREEN_ORDER[(screenIndex(screen) - 2 + SCREEN_COUNT) % SCREEN_COUNT] ?? screen;
}

export class ScreenStateMachine {
  private state: ScreenState;

  constructor(initial: ScreenState = 'overview') {
    this.state = initial;
  }

  get current(): ScreenState {
    return this.state;
  }

  /**
   * Selects the screen at a 1-based index. Returns false, leaving the state
   * untouched, when the index is out of range.
   */
  select(index: number): boolean {
    const screen = screenAt(index);
    if (screen === null) {
      return false;
    }
    this.state = screen;
    return true;
  }

  set(screen: ScreenState): void {
    this.state = screen;
  }

  next(): ScreenState {
    this.state = followingScreen(this.state);
    return this.state;
  }

  previous(): ScreenState {
    this.state = precedingScreen(this.state);
    return this.state;
  }
}
