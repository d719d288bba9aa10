// Diff types - structural comparison of two snapshots

import type { FieldName } from './common.js';

/**
 * Pseudo-field reported when two snapshots have different schemas.
 */
export const SCHEMA_FIELD = '__schema__';

/**
 * Field-level changes between two snapshots of the same schema.
 * `changed` is in schema declaration order and is never empty.
 */
export type StateChanges = {
  changed: FieldName[];
  /** Fields that went from null to a value */
  added: Record<FieldName, unknown>;
  /** Fields that went from a value to null */
  removed: Record<FieldName, unknown>;
  /** Fields whose value was replaced: [old, new] */
  modified: Record<FieldName, readonly [unknown, unknown]>;
  /** Nested snapshots that changed internally */
  nested: Record<FieldName, StateChanges>;
};

export type DiffResult = { status: 'unchanged' } | { status: 'changed'; changes: StateChanges };

/**
 * Cross-boundary representation. An unchanged result has an empty `changed` list.
 */
export type DiffWire = {
  changed: string[];
  added: Record<string, unknown>;
  removed: Record<string, unknown>;
  modified: Record<string, [unknown, unknown]>;
  nested: Record<string, DiffWire>;
};
