/**
 * Domain Collectors - Main Export
 */

export * from './cpu-collector.js';
export * from './accelerator-collector.js';
export * from './engine-collector.js';
export * from './memory-collector.js';
export * from './thermal-collector.js';
export * from './power-collector.js';
export * from './cooling-collector.js';
export * from './firmware-releases.js';
export * from './board-identity-collector.js';
export * from './profile-collector.js';
export * from './process-collector.js';
