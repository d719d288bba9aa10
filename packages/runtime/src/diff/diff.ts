// Structural diff between two snapshots
//
// Fields are compared in schema declaration order. Nested snapshots of the
// same schema are diffed recursively; everything else that differs is
// classified as added (null -> value), removed (value -> null) or modified.

import {
  SCHEMA_FIELD,
  isNullish,
  isSnapshot,
  schemaOf,
  type DiffResult,
  type SchemaDescriptor,
  type StateChanges,
} from '@lumen-state/protocol';
import { deepEqual } from '../equality.js';
import { RuntimeError } from '../errors.js';

function requireSchema(value: object, side: string): SchemaDescriptor {
  const schema = schemaOf(value);
  if (!schema) {
    throw new RuntimeError('NOT_A_SNAPSHOT', `Cannot diff: ${side} value is not a snapshot`);
  }
  return schema;
}

function emptyChanges(): StateChanges {
  return { changed: [], added: {}, removed: {}, modified: {}, nested: {} };
}

/**
 * Compare two snapshots.
 *
 * @example
 * diff(counter.create({ count: 0 }), counter.create({ count: 1 }))
 * // { status: 'changed', changes: { changed: ['count'], modified: { count: [0, 1] }, ... } }
 */
export function diff(oldState: object, newState: object): DiffResult {
  const oldSchema = requireSchema(oldState, 'old');
  const newSchema = requireSchema(newState, 'new');

  if (oldSchema.name !== newSchema.name) {
    const changes = emptyChanges();
    changes.changed.push(SCHEMA_FIELD);
    changes.modified[SCHEMA_FIELD] = [oldSchema.name, newSchema.name];
    return { status: 'changed', changes };
  }

  const changes = emptyChanges();

  for (const field of oldSchema.fieldNames) {
    const before: unknown = Reflect.get(oldState, field);
    const after: unknown = Reflect.get(newState, field);

    if (deepEqual(before, after) || (isNullish(before) && isNullish(after))) continue;

    if (isNullish(before)) {
      changes.changed.push(field);
      changes.added[field] = after;
    } else if (isNullish(after)) {
      changes.changed.push(field);
      changes.removed[field] = before;
    } else if (isSnapshot(before) && isSnapshot(after) && schemaOf(before)?.name === schemaOf(after)?.name) {
      const inner = diff(before, after);
      if (inner.status === 'changed') {
        changes.changed.push(field);
        changes.nested[field] = inner.changes;
      }
    } else {
      changes.changed.push(field);
      changes.modified[field] = [before, after];
    }
  }

  return changes.changed.length === 0 ? { status: 'unchanged' } : { status: 'changed', changes };
}
