// Changesets - accumulate several field changes, validate them together,
// then apply them as one new snapshot.
//
// Every function returns a new changeset; none mutates its input.

import {
  isNullish,
  schemaOf,
  type CustomCheck,
  type FieldName,
  type SchemaDescriptor,
  type Snapshot,
} from '@lumen-state/protocol';
import { ChangesetError, RuntimeError, ValidationError } from '../errors.js';
import { runCustomCheck, validateField } from '../validation/index.js';

export type Changeset<S extends object> = Readonly<{
  data: Snapshot<S>;
  schema: SchemaDescriptor;
  changes: Readonly<Record<FieldName, unknown>>;
  errors: readonly ValidationError[];
  valid: boolean;
}>;

export type ApplyResult<S extends object> =
  | { ok: true; state: Snapshot<S> }
  | { ok: false; changeset: Changeset<S> };

function update<S extends object>(changeset: Changeset<S>, patch: Partial<Changeset<S>>): Changeset<S> {
  return Object.freeze({ ...changeset, ...patch });
}

/**
 * Start a changeset from a snapshot.
 */
export function change<S extends object>(data: Snapshot<S>): Changeset<S> {
  const schema = schemaOf(data);
  if (!schema) {
    throw new RuntimeError('NOT_A_SNAPSHOT', 'Cannot start a changeset from a value that is not a snapshot');
  }
  return Object.freeze({ data, schema, changes: Object.freeze({}), errors: [], valid: true });
}

/**
 * Record a change. Nothing is validated until validateChanges.
 */
export function putChange<S extends object>(changeset: Changeset<S>, field: FieldName, value: unknown): Changeset<S> {
  return update(changeset, { changes: Object.freeze({ ...changeset.changes, [field]: value }) });
}

export function putChanges<S extends object>(
  changeset: Changeset<S>,
  changes: Readonly<Record<FieldName, unknown>>
): Changeset<S> {
  return update(changeset, { changes: Object.freeze({ ...changeset.changes, ...changes }) });
}

/**
 * Validate every change to a declared field. Replaces earlier errors.
 */
export function validateChanges<S extends object>(changeset: Changeset<S>): Changeset<S> {
  const errors: ValidationError[] = [];
  for (const [field, value] of Object.entries(changeset.changes)) {
    const descriptor = changeset.schema.field(field);
    if (!descriptor) continue;
    const result = validateField(field, value, descriptor);
    if (!result.ok) errors.push(result.error);
  }
  return update(changeset, { errors, valid: errors.length === 0 });
}

/**
 * Run an ad-hoc check against a pending change. Fields without a
 * (non-null) change are skipped.
 */
export function validateChange<S extends object>(
  changeset: Changeset<S>,
  field: FieldName,
  check: CustomCheck
): Changeset<S> {
  const value = changeset.changes[field];
  if (isNullish(value)) return changeset;

  const failure = runCustomCheck(check, value);
  return failure ? addError(changeset, field, failure.message) : changeset;
}

export function addError<S extends object>(changeset: Changeset<S>, field: FieldName, message: string): Changeset<S> {
  const error = new ValidationError({
    field,
    value: changeset.changes[field],
    errors: [{ kind: 'custom', message }],
  });
  return update(changeset, { errors: [...changeset.errors, error], valid: false });
}

/**
 * Apply the changes to declared fields when the changeset is valid.
 */
export function applyChanges<S extends object>(changeset: Changeset<S>): ApplyResult<S> {
  if (!changeset.valid) {
    return { ok: false, changeset };
  }

  const known: Record<FieldName, unknown> = {};
  for (const [field, value] of Object.entries(changeset.changes)) {
    if (changeset.schema.field(field)) known[field] = value;
  }
  const state = { ...changeset.data, ...known };
  Object.freeze(state);
  return { ok: true, state };
}

/**
 * @throws ChangesetError carrying the changeset's errors
 */
export function applyChangesOrThrow<S extends object>(changeset: Changeset<S>): Snapshot<S> {
  const result = applyChanges(changeset);
  if (!result.ok) {
    throw new ChangesetError(result.changeset.errors);
  }
  return result.state;
}

/**
 * Pending value for a field, else the original value, else the fallback.
 */
export function getField<S extends object>(changeset: Changeset<S>, field: FieldName, fallback?: unknown): unknown {
  if (Object.prototype.hasOwnProperty.call(changeset.changes, field)) {
    return changeset.changes[field];
  }
  return Object.prototype.hasOwnProperty.call(changeset.data, field) ? Reflect.get(changeset.data, field) : fallback;
}

export function getChange<S extends object>(changeset: Changeset<S>, field: FieldName, fallback?: unknown): unknown {
  return Object.prototype.hasOwnProperty.call(changeset.changes, field) ? changeset.changes[field] : fallback;
}

export function isChanged<S extends object>(changeset: Changeset<S>, field: FieldName): boolean {
  return Object.prototype.hasOwnProperty.call(changeset.changes, field);
}

export function changedFields<S extends object>(changeset: Changeset<S>): FieldName[] {
  return Object.keys(changeset.changes);
}
