/**
 * Control - Main Export
 */

export * from './errors.js';
export * from './control-surface.js';
