/**
 * Sysfs access - Main Export
 */

export * from './sysfs.js';
export * from './path-resolver.js';
export * from './read-or-default.js';
