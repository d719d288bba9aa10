// Structural value equality
//
// Used by the diff engine, the enum/inclusion checks and the changeset.
// Snapshots are equal only when they share a schema and every field is equal.

import { schemaOf } from '@lumen-state/protocol';

export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== 'object' || typeof b !== 'object') return false;
  if (a === null || b === null) return false;

  const schemaA = schemaOf(a);
  const schemaB = schemaOf(b);
  if (schemaA?.name !== schemaB?.name) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
  }

  if (a instanceof Map || b instanceof Map) {
    if (!(a instanceof Map) || !(b instanceof Map) || a.size !== b.size) return false;
    const left: [unknown, unknown][] = [...a];
    const right: [unknown, unknown][] = [...b];
    return matchAll(left, right, ([keyA, valueA], [keyB, valueB]) => deepEqual(keyA, keyB) && deepEqual(valueA, valueB));
  }

  if (a instanceof Set || b instanceof Set) {
    if (!(a instanceof Set) || !(b instanceof Set) || a.size !== b.size) return false;
    const left: unknown[] = [...a];
    const right: unknown[] = [...b];
    return matchAll(left, right, deepEqual);
  }

  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false;

  const aEntries = Object.entries(a);
  const bKeys = Object.keys(b);
  if (aEntries.length !== bKeys.length) return false;

  return aEntries.every(
    ([key, value]) => Object.prototype.hasOwnProperty.call(b, key) && deepEqual(value, Reflect.get(b, key))
  );
}

// Pairs every left item with a distinct right item; identical members
// are paired first.
function matchAll<T>(left: readonly T[], right: readonly T[], equal: (a: T, b: T) => boolean): boolean {
  const unmatched = [...right];
  const pending: T[] = [];
  for (const item of left) {
    const same = unmatched.indexOf(item);
    if (same === -1) {
      pending.push(item);
    } else {
      unmatched.splice(same, 1);
    }
  }
  for (const item of pending) {
    const index = unmatched.findIndex((candidate) => equal(item, candidate));
    if (index === -1) return false;
    unmatched.splice(index, 1);
  }
  return true;
}

/**
 * Membership by structural equality.
 */
export function includesEqual(values: readonly unknown[], value: unknown): boolean {
  return values.some((candidate) => deepEqual(candidate, value));
}
