// Diff engine

export { diff } from './diff.js';
export { formatChanges, formatDiff } from './format.js';
export { assertChanged } from './assert.js';
export { diffWireSchema, toWire, fromWire, serializeDiff, parseDiff } from './wire.js';
