/**
 * Interactive loop - Main Export
 */

export * from './key-input.js';
export * from './terminal-session.js';
export * from './interactive-loop.js';
