// By-value capture for deferred work
//
// Deep-copies arrays, plain objects (snapshots included, schema tag kept),
// maps, sets, dates, binary data and class instances, then freezes the
// copies. Class instances keep their prototype. Functions and values whose
// state lives in internal slots (promises, weak collections) are captured
// by reference.

import { isRecord } from '@lumen-state/protocol';

export function captureValue<T>(value: T): T;
export function captureValue(value: unknown): unknown {
  return capture(value, new Map());
}

function capture(value: unknown, seen: Map<object, unknown>): unknown {
  if (typeof value !== 'object' || value === null) return value;

  const existing = seen.get(value);
  if (existing !== undefined) return existing;

  if (Array.isArray(value)) {
    const copy: unknown[] = [];
    seen.set(value, copy);
    for (const item of value) copy.push(capture(item, seen));
    return Object.freeze(copy);
  }

  if (value instanceof Date) {
    return new Date(value.getTime());
  }

  if (value instanceof RegExp) {
    return new RegExp(value);
  }

  // Typed arrays with elements cannot be frozen
  if (ArrayBuffer.isView(value) || value instanceof ArrayBuffer) {
    const copy = structuredClone(value);
    seen.set(value, copy);
    return copy;
  }

  if (value instanceof Promise || value instanceof WeakMap || value instanceof WeakSet) {
    return value;
  }

  if (value instanceof Map) {
    const copy = new Map<unknown, unknown>();
    seen.set(value, copy);
    for (const [key, item] of value) copy.set(capture(key, seen), capture(item, seen));
    return copy;
  }

  if (value instanceof Set) {
    const copy = new Set<unknown>();
    seen.set(value, copy);
    for (const item of value) copy.add(capture(item, seen));
    return copy;
  }

  if (isRecord(value)) {
    const copy: Record<PropertyKey, unknown> = {};
    seen.set(value, copy);
    for (const key of Reflect.ownKeys(value)) {
      if (Object.prototype.propertyIsEnumerable.call(value, key)) {
        copy[key] = capture(Reflect.get(value, key), seen);
      }
    }
    return Object.freeze(copy);
  }

  return Object.freeze(captureInstance(value, seen));
}

function captureInstance(value: object, seen: Map<object, unknown>): object {
  const copy: object = Object.create(Object.getPrototypeOf(value));
  seen.set(value, copy);
  for (const [key, descriptor] of Object.entries(Object.getOwnPropertyDescriptors(value))) {
    if ('value' in descriptor) descriptor.value = capture(descriptor.value, seen);
    Object.defineProperty(copy, key, descriptor);
  }
  for (const key of Object.getOwnPropertySymbols(value)) {
    const descriptor = Object.getOwnPropertyDescriptor(value, key);
    if (!descriptor) continue;
    if ('value' in descriptor) descriptor.value = capture(descriptor.value, seen);
    Object.defineProperty(copy, key, descriptor);
  }
  return copy;
}
