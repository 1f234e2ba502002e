/**
 * Board Dashboard - Type Definitions
 *
 * This module exports all TypeScript interfaces and types for the dashboard.
 */

export * from './sample.js';
export * from './screen.js';
export * from './control.js';
export * from './dashboard-config.js';
