// Diff wire format
//
// toWire/fromWire convert between DiffResult and the plain wire shape;
// serializeDiff/parseDiff go through superjson so dates, maps, sets,
// bigints and undefined survive the trip.

import superjson from 'superjson';
import { z } from 'zod';
import type { DiffResult, DiffWire, StateChanges } from '@lumen-state/protocol';

export const diffWireSchema: z.ZodType<DiffWire> = z.lazy(() =>
  z.object({
    changed: z.array(z.string()),
    added: z.record(z.string(), z.unknown()),
    removed: z.record(z.string(), z.unknown()),
    modified: z.record(z.string(), z.tuple([z.unknown(), z.unknown()])),
    nested: z.record(z.string(), diffWireSchema),
  })
);

function changesToWire(changes: StateChanges): DiffWire {
  const nested: Record<string, DiffWire> = {};
  for (const [field, inner] of Object.entries(changes.nested)) {
    nested[field] = changesToWire(inner);
  }
  const modified: Record<string, [unknown, unknown]> = {};
  for (const [field, [before, after]] of Object.entries(changes.modified)) {
    modified[field] = [before, after];
  }
  return {
    changed: [...changes.changed],
    added: { ...changes.added },
    removed: { ...changes.removed },
    modified,
    nested,
  };
}

function changesFromWire(wire: DiffWire): StateChanges {
  const nested: Record<string, StateChanges> = {};
  for (const [field, inner] of Object.entries(wire.nested)) {
    nested[field] = changesFromWire(inner);
  }
  return {
    changed: [...wire.changed],
    added: { ...wire.added },
    removed: { ...wire.removed },
    modified: { ...wire.modified },
    nested,
  };
}

/**
 * Unchanged becomes a wire value with every collection empty.
 */
export function toWire(result: DiffResult): DiffWire {
  if (result.status === 'unchanged') {
    return { changed: [], added: {}, removed: {}, modified: {}, nested: {} };
  }
  return changesToWire(result.changes);
}

/**
 * @throws ZodError if the value is not a well-formed wire diff
 */
export function fromWire(input: unknown): DiffResult {
  const wire = diffWireSchema.parse(input);
  return wire.changed.length === 0 ? { status: 'unchanged' } : { status: 'changed', changes: changesFromWire(wire) };
}

export function serializeDiff(result: DiffResult): string {
  return superjson.stringify(toWire(result));
}

/**
 * @throws ZodError if the payload is not a well-formed wire diff
 */
export function parseDiff(text: string): DiffResult {
  return fromWire(superjson.parse(text));
}
