/**
 * Dashboard Configuration - Main Export
 */

export * from './configuration.js';
