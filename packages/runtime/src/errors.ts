// Runtime error types

import type { FieldName, SchemaName, ValidationIssue } from '@lumen-state/protocol';
import type { SchemaDefinitionIssue } from '@lumen-state/protocol';
import { formatValue } from './inspect.js';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

export type TypeMismatchHint = 'nil_value' | 'wrong_schema' | 'string_to_number';

const HINTS: Record<TypeMismatchHint, string> = {
  nil_value:
    'The value is null but the field is not nullable.\n    Declare the field with nullable: true if null is a valid value.',
  wrong_schema:
    "Make sure you're passing a snapshot of the expected schema.\n    Check your data transformations.",
  string_to_number:
    'Did you forget to convert the string from form params?\n    Use Number() or pass numbers directly.',
};

/**
 * A value did not match the declared type of a field.
 * Raised by the error policy when on_error is "raise".
 */
export class TypeMismatchError extends RuntimeError {
  readonly field: FieldName;
  readonly expected: string;
  readonly got: string;
  readonly hint?: string;
  readonly path: readonly FieldName[];

  constructor(options: {
    field: FieldName;
    expected: string;
    got: string;
    hint?: string;
    path?: readonly FieldName[];
  }) {
    super('TYPE_MISMATCH', formatTypeMismatch(options));
    this.name = 'TypeMismatchError';
    this.field = options.field;
    this.expected = options.expected;
    this.got = options.got;
    this.hint = options.hint;
    this.path = options.path ?? [];
  }

  /**
   * Copy of this error carrying a canned hint for a common mistake.
   */
  withHint(kind: TypeMismatchHint): TypeMismatchError {
    return new TypeMismatchError({
      field: this.field,
      expected: this.expected,
      got: this.got,
      path: this.path,
      hint: HINTS[kind],
    });
  }
}

function formatTypeMismatch(options: {
  field: FieldName;
  expected: string;
  got: string;
  hint?: string;
  path?: readonly FieldName[];
}): string {
  const pathStr = options.path && options.path.length > 0 ? ` (at path: ${options.path.join('.')})` : '';
  const hintStr = options.hint ? `\n\n    Hint: ${options.hint}` : '';
  return (
    `Type mismatch for field "${options.field}"${pathStr}\n` +
    `    Expected: ${options.expected}\n` +
    `    Got: ${options.got}${hintStr}`
  );
}

/**
 * Aggregated validation failure for one field.
 *
 * Returned (not thrown) by validateField; the error policy decides
 * whether it surfaces.
 */
export class ValidationError extends RuntimeError {
  readonly field: FieldName;
  readonly value: unknown;
  readonly errors: readonly ValidationIssue[];
  readonly path: readonly FieldName[];

  constructor(options: {
    field: FieldName;
    value: unknown;
    errors: readonly ValidationIssue[];
    path?: readonly FieldName[];
  }) {
    const path = options.path ?? [];
    const errorLines = options.errors.map((e) => `    - ${e.kind}: ${e.message}`).join('\n');
    super(
      'VALIDATION_FAILURE',
      `Validation failed for ${[...path, options.field].join('.')}\n` +
        `    Value: ${formatValue(options.value)}\n` +
        `    Errors:\n${errorLines}`
    );
    this.name = 'ValidationError';
    this.field = options.field;
    this.value = options.value;
    this.errors = options.errors;
    this.path = path;
  }

  /**
   * Human-readable form (same as the message)
   */
  format(): string {
    return this.message;
  }

  /**
   * JSON-serializable form, e.g. for API responses
   */
  toJSON(): { field: FieldName; path: FieldName[]; errors: { type: string; message: string }[] } {
    return {
      field: this.field,
      path: [...this.path],
      errors: this.errors.map((e) => ({ type: e.kind, message: e.message })),
    };
  }

  /**
   * Collapse errors to one message per field, joined with "; ".
   */
  static formatForForm(errors: readonly ValidationError[]): Record<FieldName, string> {
    const form: Record<FieldName, string> = {};
    for (const error of errors) {
      form[error.field] = error.errors.map((e) => e.message).join('; ');
    }
    return form;
  }
}

/**
 * No registered handler matched an action.
 * Always raised; never gated by the error policy.
 */
export class UnknownActionError extends RuntimeError {
  readonly attempted: string;
  readonly available: readonly string[];
  readonly schema: SchemaName;
  readonly suggestion?: string;

  constructor(options: {
    attempted: string;
    available: readonly string[];
    schema: SchemaName;
    suggestion?: string;
  }) {
    const actions = options.available.map((a) => `"${a}"`).join(', ');
    const hint = options.suggestion ? `\n\n    Hint: Did you mean "${options.suggestion}"?` : '';
    super(
      'UNKNOWN_ACTION',
      `Unknown action "${options.attempted}" for ${options.schema}\n` +
        `    Available actions: [${actions}]${hint}`
    );
    this.name = 'UnknownActionError';
    this.attempted = options.attempted;
    this.available = options.available;
    this.schema = options.schema;
    this.suggestion = options.suggestion;
  }
}

/**
 * A reply handler did not return a [state, payload] pair.
 */
export class InvalidReplyError extends RuntimeError {
  readonly action: string;
  readonly schema: SchemaName;

  constructor(schema: SchemaName, action: string) {
    super('INVALID_REPLY', `Reply handler "${action}" for ${schema} must return a [state, payload] pair`);
    this.name = 'InvalidReplyError';
    this.action = action;
    this.schema = schema;
  }
}

/**
 * A schema definition or a schema lookup is invalid.
 */
export class SchemaDefinitionError extends RuntimeError {
  readonly schema: SchemaName;
  readonly field?: FieldName;
  readonly issues: readonly SchemaDefinitionIssue[];

  constructor(
    schema: SchemaName,
    message: string,
    options?: { field?: FieldName; issues?: readonly SchemaDefinitionIssue[] }
  ) {
    super('SCHEMA_DEFINITION_ERROR', `Schema ${schema}: ${message}`);
    this.name = 'SchemaDefinitionError';
    this.schema = schema;
    this.field = options?.field;
    this.issues = options?.issues ?? [];
  }
}

/**
 * A state assertion (assertChanged and the testing helpers) failed.
 */
export class StateAssertionError extends RuntimeError {
  constructor(message: string) {
    super('STATE_ASSERTION', message);
    this.name = 'StateAssertionError';
  }
}

/**
 * applyChangesOrThrow was called on an invalid changeset.
 */
export class ChangesetError extends RuntimeError {
  readonly errors: readonly ValidationError[];

  constructor(errors: readonly ValidationError[]) {
    super(
      'CHANGESET_INVALID',
      `Changeset validation failed: ${errors.map((e) => e.message).join('; ')}`
    );
    this.name = 'ChangesetError';
    this.errors = errors;
  }
}
