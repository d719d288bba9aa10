// Schema Definition Validation
//
// Checks a schema definition before the registry accepts it.
// Catches malformed field definitions at definition time instead of
// the first time a setter or the diff engine trips over them.

import { isRecord } from '../types/common.js';
import { isPrimitiveType } from '../types/schema.js';
import { VALIDATOR_KINDS } from '../types/validators.js';
import { SCHEMA_FIELD } from '../types/diff.js';

export type SchemaDefinitionResult = {
  valid: boolean;
  errors: SchemaDefinitionIssue[];
  warnings: SchemaDefinitionIssue[];
};

export type SchemaDefinitionIssue = {
  path: string;
  message: string;
  code: SchemaDefinitionIssueCode;
};

export type SchemaDefinitionIssueCode =
  | 'INVALID_NAME'
  | 'INVALID_TYPE'
  | 'INVALID_FIELD'
  | 'RESERVED_FIELD'
  | 'AMBIGUOUS_FIELD'
  | 'INVALID_VALIDATOR'
  | 'UNKNOWN_VALIDATOR'
  | 'EMPTY_SCHEMA';

const NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_.]*$/;
const FIELD_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Check if a string is a valid schema name (e.g., "Counter", "App.Filter")
 */
export function isValidSchemaName(name: string): boolean {
  return NAME_PATTERN.test(name);
}

/**
 * Check if a string is a valid field name
 */
export function isValidFieldName(name: string): boolean {
  return FIELD_PATTERN.test(name) && name !== SCHEMA_FIELD;
}

/**
 * Validate a complete schema definition.
 *
 * @param name - The schema name
 * @param definition - Field definitions keyed by field name
 */
export function validateSchemaDefinition(name: unknown, definition: unknown): SchemaDefinitionResult {
  const errors: SchemaDefinitionIssue[] = [];
  const warnings: SchemaDefinitionIssue[] = [];

  if (typeof name !== 'string' || !isValidSchemaName(name)) {
    errors.push({
      path: 'name',
      message: 'Schema name must start with a letter and contain only letters, digits, "_" or "."',
      code: 'INVALID_NAME',
    });
  }

  if (!isRecord(definition)) {
    errors.push({
      path: 'fields',
      message: 'Schema fields must be an object',
      code: 'INVALID_TYPE',
    });
    return { valid: false, errors, warnings };
  }

  const fieldNames = Object.keys(definition);
  if (fieldNames.length === 0) {
    warnings.push({
      path: 'fields',
      message: 'Schema declares no fields',
      code: 'EMPTY_SCHEMA',
    });
  }

  for (const fieldName of fieldNames) {
    const result = validateFieldDefinition(fieldName, definition[fieldName]);
    errors.push(...result.errors);
    warnings.push(...result.warnings);
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Validate one field definition.
 */
export function validateFieldDefinition(fieldName: string, definition: unknown): SchemaDefinitionResult {
  const errors: SchemaDefinitionIssue[] = [];
  const warnings: SchemaDefinitionIssue[] = [];
  const path = `fields.${fieldName}`;

  if (fieldName === SCHEMA_FIELD) {
    errors.push({
      path,
      message: `"${SCHEMA_FIELD}" is reserved for schema identity changes`,
      code: 'RESERVED_FIELD',
    });
  } else if (!isValidFieldName(fieldName)) {
    errors.push({
      path,
      message: 'Field name must be an identifier',
      code: 'INVALID_NAME',
    });
  }

  if (!isRecord(definition)) {
    errors.push({ path, message: 'Field definition must be an object', code: 'INVALID_FIELD' });
    return { valid: false, errors, warnings };
  }

  const sources = ['type', 'embed', 'embedMany'].filter((key) => definition[key] !== undefined);
  if (sources.length === 0) {
    errors.push({
      path,
      message: 'Field must declare one of "type", "embed" or "embedMany"',
      code: 'INVALID_FIELD',
    });
  } else if (sources.length > 1) {
    errors.push({
      path,
      message: `Field declares more than one of ${sources.map((s) => `"${s}"`).join(', ')}`,
      code: 'AMBIGUOUS_FIELD',
    });
  }

  if (definition.type !== undefined) {
    const typeError = describeTypeSpecError(definition.type);
    if (typeError) {
      errors.push({ path: `${path}.type`, message: typeError, code: 'INVALID_TYPE' });
    }
  }

  for (const key of ['embed', 'embedMany']) {
    const target = definition[key];
    if (target !== undefined && (typeof target !== 'string' || !isValidSchemaName(target))) {
      errors.push({
        path: `${path}.${key}`,
        message: 'Embedded schema must be referenced by a valid schema name',
        code: 'INVALID_TYPE',
      });
    }
  }

  for (const key of ['nullable', 'required', 'redact']) {
    if (definition[key] !== undefined && typeof definition[key] !== 'boolean') {
      errors.push({ path: `${path}.${key}`, message: `"${key}" must be a boolean`, code: 'INVALID_FIELD' });
    }
  }

  if (definition.doc !== undefined && typeof definition.doc !== 'string') {
    errors.push({ path: `${path}.doc`, message: '"doc" must be a string', code: 'INVALID_FIELD' });
  }

  const validate = definition.validate;
  if (validate !== undefined && typeof validate !== 'function') {
    if (!Array.isArray(validate)) {
      errors.push({
        path: `${path}.validate`,
        message: 'Validators must be an array or a check function',
        code: 'INVALID_VALIDATOR',
      });
    } else {
      validate.forEach((validator: unknown, index: number) => {
        const result = validateValidatorSpec(validator, `${path}.validate[${index}]`);
        errors.push(...result.errors);
        warnings.push(...result.warnings);
      });
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Validate one validator spec. Unknown kinds are only a warning:
 * they fail at validation time with an "unknown validator" entry.
 */
function validateValidatorSpec(validator: unknown, path: string): SchemaDefinitionResult {
  const errors: SchemaDefinitionIssue[] = [];
  const warnings: SchemaDefinitionIssue[] = [];

  if (!isRecord(validator) || typeof validator.kind !== 'string') {
    errors.push({ path, message: 'Validator must be an object with a "kind"', code: 'INVALID_VALIDATOR' });
    return { valid: false, errors, warnings };
  }

  const kind = validator.kind;
  if (!VALIDATOR_KINDS.some((known) => known === kind)) {
    warnings.push({ path, message: `Unknown validator kind "${kind}"`, code: 'UNKNOWN_VALIDATOR' });
    return { valid: true, errors, warnings };
  }

  const invalid = (message: string) =>
    errors.push({ path, message, code: 'INVALID_VALIDATOR' });

  switch (kind) {
    case 'format':
      if (!(validator.pattern instanceof RegExp)) invalid('format validator needs a RegExp "pattern"');
      break;
    case 'length': {
      const bounds = ['min', 'max', 'is'].filter((key) => validator[key] !== undefined);
      if (bounds.length === 0) invalid('length validator needs "min", "max" or "is"');
      for (const key of bounds) {
        const bound = validator[key];
        if (typeof bound !== 'number' || !Number.isInteger(bound) || bound < 0) {
          invalid(`length "${key}" must be a non-negative integer`);
        }
      }
      break;
    }
    case 'inclusion':
    case 'exclusion':
      if (!Array.isArray(validator.values)) invalid(`${kind} validator needs a "values" array`);
      break;
    case 'number':
      for (const key of ['greaterThan', 'greaterThanOrEqualTo', 'lessThan', 'lessThanOrEqualTo', 'equalTo']) {
        if (validator[key] !== undefined && typeof validator[key] !== 'number') {
          invalid(`number bound "${key}" must be a number`);
        }
      }
      break;
    case 'custom':
      if (typeof validator.check !== 'function') invalid('custom validator needs a "check" function');
      break;
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Describe what is wrong with a type spec, or return null when it is well-formed.
 */
export function describeTypeSpecError(spec: unknown): string | null {
  if (typeof spec === 'string') {
    return isPrimitiveType(spec) ? null : `unknown primitive type "${spec}"`;
  }
  if (!isRecord(spec) || typeof spec.kind !== 'string') {
    return 'type must be a primitive name or an object with a "kind"';
  }

  switch (spec.kind) {
    case 'list':
    case 'nullable':
      return spec.of === undefined ? `${spec.kind} type needs "of"` : describeTypeSpecError(spec.of);
    case 'map':
      if (spec.key === undefined || spec.value === undefined) return 'map type needs "key" and "value"';
      return describeTypeSpecError(spec.key) ?? describeTypeSpecError(spec.value);
    case 'enum':
      if (!Array.isArray(spec.values) || spec.values.length === 0) {
        return 'enum type needs a non-empty "values" array';
      }
      return null;
    case 'schema':
      return typeof spec.name === 'string' && isValidSchemaName(spec.name)
        ? null
        : 'schema type needs a valid schema "name"';
    case 'tuple': {
      if (!Array.isArray(spec.items)) return 'tuple type needs an "items" array';
      for (const item of spec.items) {
        const itemError = describeTypeSpecError(item);
        if (itemError) return itemError;
      }
      return null;
    }
    default:
      return `unknown type kind "${spec.kind}"`;
  }
}
