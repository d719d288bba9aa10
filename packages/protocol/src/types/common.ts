// Common types used across the protocol

/**
 * Name of a declared field within a schema
 */
export type FieldName = string;

/**
 * Name of a declared schema. Doubles as the type identity of its snapshots.
 */
export type SchemaName = string;

/**
 * Monotonic timestamp in milliseconds (performance.now() clock)
 */
export type MonotonicTime = number;

/**
 * The null marker. Both `null` and `undefined` count as "no value".
 */
export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Narrow an unknown value to a plain string-keyed record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
