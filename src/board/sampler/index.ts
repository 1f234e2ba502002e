/**
 * Sample Aggregator - Main Export
 */

export * from './sample-aggregator.js';
export * from './serial-queue.js';
export * from './deep-freeze.js';
