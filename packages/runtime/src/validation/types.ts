// Type checking for field values
//
// Primitives: string, integer, number, boolean, any, map, list
// Parameterized: list of, map of key/value, nullable, enum, schema, tuple

import {
  isNullish,
  isPrimitiveType,
  isRecord,
  schemaOf,
  type PrimitiveType,
  type TypeSpec,
} from '@lumen-state/protocol';
import { includesEqual } from '../equality.js';
import { formatValue } from '../inspect.js';

export type TypeCheckResult = { ok: true } | { ok: false; message: string };

const OK: TypeCheckResult = { ok: true };

function fail(message: string): TypeCheckResult {
  return { ok: false, message };
}

/**
 * Short name of a value's runtime type, as used in error messages.
 */
export function typeOf(value: unknown): string {
  if (isNullish(value)) return 'null';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'bigint') return 'bigint';
  if (typeof value === 'symbol') return 'symbol';
  if (typeof value === 'function') return 'function';
  if (Array.isArray(value)) return 'list';

  const schema = schemaOf(value);
  if (schema) return `schema ${schema.name}`;
  if (isRecord(value) || value instanceof Map) return 'map';
  if (value instanceof Date) return 'date';
  return 'object';
}

function mapEntries(value: unknown): [unknown, unknown][] | undefined {
  if (value instanceof Map) return [...value.entries()];
  if (isRecord(value)) return Object.entries(value);
  return undefined;
}

/**
 * Check a value against a type specification.
 *
 * @example
 * validateType('hello', 'string')   // { ok: true }
 * validateType(123, 'string')       // { ok: false, message: 'expected string, got integer' }
 * validateType(null, { kind: 'nullable', of: 'string' }) // { ok: true }
 */
export function validateType(value: unknown, spec: TypeSpec): TypeCheckResult {
  if (typeof spec === 'string') {
    return validatePrimitive(value, spec);
  }

  if (!isRecord(spec)) {
    return fail(`unknown type specification: ${formatValue(spec)}`);
  }

  switch (spec.kind) {
    case 'nullable':
      return isNullish(value) ? OK : validateType(value, spec.of);

    case 'list': {
      if (!Array.isArray(value)) return fail(`expected list, got ${typeOf(value)}`);
      for (const [index, item] of value.entries()) {
        const result = validateType(item, spec.of);
        if (!result.ok) return fail(`at index ${index}: ${result.message}`);
      }
      return OK;
    }

    case 'map': {
      const entries = mapEntries(value);
      if (!entries) return fail(`expected map, got ${typeOf(value)}`);
      for (const [key, item] of entries) {
        const keyResult = validateType(key, spec.key);
        if (!keyResult.ok) return fail(`map entry error: ${keyResult.message}`);
        const valueResult = validateType(item, spec.value);
        if (!valueResult.ok) return fail(`map entry error: ${valueResult.message}`);
      }
      return OK;
    }

    case 'enum':
      return includesEqual(spec.values, value)
        ? OK
        : fail(`expected one of ${formatValue(spec.values)}, got ${formatValue(value)}`);

    case 'schema': {
      const schema = schemaOf(value);
      if (schema?.name === spec.name) return OK;
      return fail(`expected schema ${spec.name}, got ${typeOf(value)}`);
    }

    case 'tuple': {
      if (!Array.isArray(value)) return fail(`expected tuple, got ${typeOf(value)}`);
      if (value.length !== spec.items.length) {
        return fail(`expected tuple of size ${spec.items.length}, got size ${value.length}`);
      }
      for (const [index, itemSpec] of spec.items.entries()) {
        const result = validateType(value[index], itemSpec);
        if (!result.ok) return fail(`tuple element ${index}: ${result.message}`);
      }
      return OK;
    }

    default:
      return fail(`unknown type specification: ${formatValue(spec)}`);
  }
}

function validatePrimitive(value: unknown, spec: string): TypeCheckResult {
  if (!isPrimitiveType(spec)) {
    return fail(`unknown type specification: ${formatValue(spec)}`);
  }
  return matchesPrimitive(value, spec) ? OK : fail(`expected ${spec}, got ${typeOf(value)}`);
}

function matchesPrimitive(value: unknown, spec: PrimitiveType): boolean {
  switch (spec) {
    case 'any':
      return true;
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && !Number.isNaN(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'map':
      return mapEntries(value) !== undefined && schemaOf(value) === undefined;
    case 'list':
      return Array.isArray(value);
  }
}

/**
 * Value a field of this type takes when its definition gives no default.
 */
export function defaultForType(spec: TypeSpec): unknown {
  if (spec === 'list') return [];
  if (typeof spec === 'string' || !isRecord(spec)) return null;

  switch (spec.kind) {
    case 'list':
      return [];
    case 'map':
      return {};
    case 'enum':
      return spec.values.length > 0 ? spec.values[0] : null;
    default:
      return null;
  }
}
