/**
 * Control Panel
 *
 * Cursor and pending targets of the Control screen. Selecting an item yields
 * a ControlAction; executing it is the control surface's job.
 */

import {
  COOLING_DUTY_MAX,
  COOLING_DUTY_MIN,
  PROFILE_ID_MAX,
  PROFILE_ID_MIN,
  type ControlAction,
  type ControlOutcome,
  type Sample,
} from '../types/index.js';

export const CONTROL_ITEMS = Object.freeze(['cooling-duty', 'boost', 'profile'] as const);

export type ControlItem = (typeof CONTROL_ITEMS)[number];

export const COOLING_DUTY_STEP = 10;

export class ControlPanel {
  private cursor = 0;
  private duty: number | null = null;
  private profile: number | null = null;
  private knownProfiles: number[] = [];
  private lastOutcome: ControlOutcome | null = null;

  get selected(): ControlItem {
    return CONTROL_ITEMS[this.cursor] ?? 'cooling-duty';
  }

  /** Pending duty target; follows the board until adjusted */
  get dutyTarget(): number {
    return this.duty ?? COOLING_DUTY_MIN;
  }

  get profileTarget(): number {
    return this.profile ?? PROFILE_ID_MIN;
  }

  get outcome(): ControlOutcome | null {
    return this.lastOutcome;
  }

  /**
   * Seeds targets from the latest sample. Targets the user has adjusted are
   * kept.
   */
  sync(sample: Pick<Sample, 'cooling' | 'profile'>, force = false): void {
    this.knownProfiles = sample.profile.profiles.map((profile) => profile.id).sort((a, b) => a - b);
    if (this.duty === null || force) {
      this.duty = roundToStep(sample.cooling.duty);
    }
    if (this.profile === null || force) {
      this.profile = sample.profile.current ?? this.knownProfiles[0] ?? PROFILE_ID_MIN;
    }
  }

  moveUp(): void {
    this.cursor = (this.cursor - 1 + CONTROL_ITEMS.length) % CONTROL_ITEMS.length;
  }

  moveDown(): void {
    this.cursor = (this.cursor + 1) % CONTROL_ITEMS.length;
  }

  /** Changes the target of the selected item by one step */
  adjust(direction: 1 | -1): void {
    switch (this.selected) {
      case 'cooling-duty':
        this.duty = clamp(this.dutyTarget + direction * COOLING_DUTY_STEP, COOLING_DUTY_MIN, COOLING_DUTY_MAX);
        break;
      case 'profile':
        this.profile = this.cycleProfile(direction);
        break;
      case 'boost':
        break;
    }
  }

  handleSelect(): ControlAction {
    switch (this.selected) {
      case 'cooling-duty':
        return { type: 'set-cooling-duty', duty: this.dutyTarget };
      case 'boost':
        return { type: 'toggle-boost' };
      case 'profile':
        return { type: 'set-performance-profile', id: this.profileTarget };
    }
  }

  record(outcome: ControlOutcome): void {
    this.lastOutcome = outcome;
  }

  private cycleProfile(direction: 1 | -1): number {
    const ids =
      this.knownProfiles.length > 0
        ? this.knownProfiles
        : Array.from({ length: PROFILE_ID_MAX - PROFILE_ID_MIN + 1 }, (_, offset) => PROFILE_ID_MIN + offset);
    const at = ids.indexOf(this.profileTarget);
    const next = at < 0 ? 0 : (at + direction + ids.length) % ids.length;
    return ids[next] ?? PROFILE_ID_MIN;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function roundToStep(duty: number): number {
  return clamp(Math.round(duty / COOLING_DUTY_STEP) * COOLING_DUTY_STEP, COOLING_DUTY_MIN, COOLING_DUTY_MAX);
}
