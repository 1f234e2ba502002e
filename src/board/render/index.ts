/**
 * Rendering - Main Export
 */

export * from './ansi.js';
export * from './text-renderer.js';
