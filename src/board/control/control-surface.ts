/**
 * Control Surface
 *
 * The three privileged actions of the Control screen and the one-shot CLI
 * flags. Fan duty is written to the pwm-fan hwmon files; power modes and
 * boost go through the nvpmodel and jetson_clocks helpers, under `sudo -n`
 * unless configured otherwise.
 */

import type { Sysfs } from '../sysfs/index.js';
import {
  COOLING_DUTY_MAX,
  COOLING_DUTY_MIN,
  PROFILE_ID_MAX,
  PROFILE_ID_MIN,
  type ControlAction,
  type ControlOutcome,
  type DashboardConfig,
} from '../types/index.js';
import { ProfileCollector, resolveFanHwmon, runCommand, type CommandRunner } from '../collectors/index.js';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { ControlValidationError, ControlWriteError, failureReason, isControlError } from './errors.js';

const log = createSubsystemLogger('board/control');

/** pwm1_enable value that hands the fan to userspace */
const PWM_MANUAL = '1';
const PWM_FULL_SCALE = 255;

/** Helpers may block on hardware; give them longer than a vendor query */
export const HELPER_TIMEOUT_MS = 10_000;

export type ControlOptions = DashboardConfig['control'];

export function dutyToPwm(duty: number): number {
  return Math.min(PWM_FULL_SCALE, Math.floor((duty * PWM_FULL_SCALE) / 100));
}

function requireInteger(value: number, min: number, max: number, what: string): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ControlValidationError(`${what} must be an integer between ${min} and ${max}, got ${value}`);
  }
}

export class ControlSurface {
  private readonly profiles: ProfileCollector;

  constructor(
    private readonly sysfs: Sysfs,
    private readonly options: ControlOptions,
    private readonly run: CommandRunner = runCommand,
  ) {
    this.profiles = new ProfileCollector(sysfs);
  }

  setCoolingDuty(duty: number): void {
    requireInteger(duty, COOLING_DUTY_MIN, COOLING_DUTY_MAX, 'Fan duty');

    const hwmon = resolveFanHwmon(this.sysfs);
    if (hwmon === null) {
      throw new ControlWriteError('Cannot set fan duty', 'no pwm-fan device found');
    }

    const pwm = dutyToPwm(duty);
    this.write(`${hwmon}/pwm1_enable`, PWM_MANUAL);
    this.write(`${hwmon}/pwm1`, String(pwm));
    log.info('fan duty set', { duty, pwm, hwmon });
  }

  setPerformanceProfile(id: number): void {
    requireInteger(id, PROFILE_ID_MIN, PROFILE_ID_MAX, 'Power mode id');
    this.helper(this.options.profileHelper, ['-m', String(id)]);
    log.info('power mode set', { id });
  }

  /** Turns boost on, or restores the saved clocks when it is already on. Returns the new state. */
  toggleBoostMode(): boolean {
    const enabled = this.profiles.collect().boost.enabled;
    this.helper(this.options.boostHelper, enabled ? ['--restore'] : []);
    log.info('boost toggled', { enabled: !enabled });
    return !enabled;
  }

  /**
   * Runs an action from the Control screen. Validation and write failures
   * become a failed outcome; anything else propagates.
   */
  dispatch(action: ControlAction): ControlOutcome {
    try {
      switch (action.type) {
        case 'set-cooling-duty':
          this.setCoolingDuty(action.duty);
          return { action, ok: true, message: `fan duty set to ${action.duty}%` };
        case 'set-performance-profile':
          this.setPerformanceProfile(action.id);
          return { action, ok: true, message: `power mode set to ${action.id}` };
        case 'toggle-boost': {
          const enabled = this.toggleBoostMode();
          return { action, ok: true, message: enabled ? 'boost enabled' : 'boost disabled' };
        }
      }
    } catch (error) {
      if (!isControlError(error)) {
        throw error;
      }
      log.warn('control action failed', { action: action.type, error: error.message });
      return { action, ok: false, message: error.message };
    }
  }

  private write(path: string, value: string): void {
    try {
      this.sysfs.writeText(path, value);
    } catch (error) {
      throw new ControlWriteError(`Cannot write ${path}`, failureReason(error));
    }
  }

  private helper(program: string, args: readonly string[]): void {
    try {
      if (this.options.useSudo) {
        this.run('sudo', ['-n', program, ...args], HELPER_TIMEOUT_MS);
      } else {
        this.run(program, args, HELPER_TIMEOUT_MS);
      }
    } catch (error) {
      throw new ControlWriteError(`${program} failed`, failureReason(error));
    }
  }
}
