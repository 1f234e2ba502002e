/**
 * Screens - Main Export
 */

export * from './screen-state.js';
export * from './control-panel.js';
export * from './format.js';
export * from './views.js';
