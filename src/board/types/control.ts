/**
 * Control action types
 *
 * Actions produced by the Control screen and executed by the control surface.
 */

export const COOLING_DUTY_MIN = 0;
export const COOLING_DUTY_MAX = 100;
export const PROFILE_ID_MIN = 0;
export const PROFILE_ID_MAX = 15;

export type ControlAction =
  | { type: 'set-cooling-duty'; duty: number }
  | { type: 'toggle-boost' }
  | { type: 'set-performance-profile'; id: number };

export interface ControlOutcome {
  action: ControlAction;
  ok: boolean;
  message: string;
}
