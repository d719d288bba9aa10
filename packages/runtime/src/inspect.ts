// Value rendering for messages, diff reports and snapshot inspection

import { isRecord, schemaOf } from '@lumen-state/protocol';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function formatKey(key: string): string {
  return IDENTIFIER.test(key) ? key : JSON.stringify(key);
}

/**
 * Render any value as a short single-line string.
 *
 * Strings are quoted, snapshots render as `#Schema<{...}>` with redacted
 * fields listed by name instead of shown.
 */
export function formatValue(value: unknown): string {
  return render(value, new Set());
}

function render(value: unknown, seen: Set<object>): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
    case 'boolean':
      return String(value);
    case 'bigint':
      return `${value}n`;
    case 'undefined':
      return 'undefined';
    case 'symbol':
      return value.toString();
    case 'function':
      return value.name ? `[Function ${value.name}]` : '[Function]';
  }

  if (typeof value !== 'object' || value === null) return 'null';
  if (seen.has(value)) return '[Circular]';
  if (value instanceof Date) return `Date(${Number.isNaN(value.getTime()) ? 'Invalid' : value.toISOString()})`;
  if (value instanceof RegExp) return String(value);
  if (value instanceof Error) return `${value.name}(${JSON.stringify(value.message)})`;

  seen.add(value);
  try {
    const schema = schemaOf(value);
    if (schema) {
      const visible: string[] = [];
      const redacted: string[] = [];
      for (const name of schema.fieldNames) {
        if (schema.field(name)?.redact) {
          redacted.push(name);
        } else {
          visible.push(`${formatKey(name)}: ${render(Reflect.get(value, name), seen)}`);
        }
      }
      if (redacted.length > 0) visible.push(`redacted: [${redacted.join(', ')}]`);
      return `#${schema.name}<{${visible.join(', ')}}>`;
    }

    if (Array.isArray(value)) {
      return `[${value.map((item) => render(item, seen)).join(', ')}]`;
    }
    if (value instanceof Map) {
      const entries = [...value.entries()].map(([k, v]) => `${render(k, seen)} => ${render(v, seen)}`);
      return `Map{${entries.join(', ')}}`;
    }
    if (value instanceof Set) {
      return `Set{${[...value].map((item) => render(item, seen)).join(', ')}}`;
    }

    const entries = Object.entries(value).map(([k, v]) => `${formatKey(k)}: ${render(v, seen)}`);
    const body = `{${entries.join(', ')}}`;
    return isRecord(value) ? body : `${value.constructor?.name ?? 'Object'}${body}`;
  } finally {
    seen.delete(value);
  }
}

/**
 * Render a list of names as `[a, b]`.
 */
export function formatNames(names: readonly string[]): string {
  return `[${names.join(', ')}]`;
}
