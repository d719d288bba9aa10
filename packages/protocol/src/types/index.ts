// Re-export all protocol types

export * from './common.js';
export * from './validators.js';
export * from './schema.js';
export * from './actions.js';
export * from './diff.js';
export * from './config.js';
export * from './telemetry.js';
