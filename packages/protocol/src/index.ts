// @lumen-state/protocol
// Shared contracts for schemas, actions, diffs and telemetry

export * from './types/index.js';
export * from './validation/index.js';
