/**
 * Screen and loop message types
 */

/** Dashboard views, in navigation order (index 1..8) */
export const SCREEN_ORDER = [
  'overview',
  'cpu',
  'accelerator',
  'memory',
  'power',
  'temperature',
  'control',
  'info',
] as const;

export type ScreenState = (typeof SCREEN_ORDER)[number];

export const SCREEN_TITLES: Readonly<Record<ScreenState, string>> = Object.freeze({
  overview: 'All',
  cpu: 'CPU',
  accelerator: 'GPU',
  memory: 'Memory',
  power: 'Power',
  temperature: 'Temperature',
  control: 'Control',
  info: 'Info',
});

export type ControlMessage =
  | { type: 'set-screen'; screen: ScreenState }
  | { type: 'update' }
  | { type: 'exit' }
  | { type: 'error'; message: string };
