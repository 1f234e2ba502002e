/**
 * boardtop - Main Export
 */

export * from './board/index.js';
export { configureLogging, createSubsystemLogger } from './logging/subsystem.js';
export type { LoggingOptions, SubsystemLogger } from './logging/subsystem.js';
export { VERSION } from './version.js';
