/**
 * Board dashboard - Main Export
 */

export * from './types/index.js';
export * from './sysfs/index.js';
export * from './collectors/index.js';
export * from './delta-rate/index.js';
export * from './sampler/index.js';
export * from './config/index.js';
export * from './screens/index.js';
export * from './control/index.js';
export * from './render/index.js';
export * from './loop/index.js';
export * from './board.js';
