/**
 * Main types export file for syswatch
 */

// Configuration types
export * from './config';

// Threshold and alert types
export * from './alerts';

// Event types
export * from './events';

// Metric snapshot types
export * from './metrics';

// API types
export * from './dashboard';
