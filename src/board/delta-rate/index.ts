/**
 * Delta-Rate Engine - Main Export
 */

export * from './delta-rate-engine.js';
