// Tests for the diff wire format

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import type { DiffResult } from '@lumen-state/protocol';
import { fromWire, parseDiff, serializeDiff, toWire } from './wire.js';

const nestedResult: DiffResult = {
  status: 'changed',
  changes: {
    changed: ['name', 'child'],
    added: {},
    removed: {},
    modified: { name: ['old', 'new'] },
    nested: {
      child: { changed: ['value'], added: {}, removed: {}, modified: { value: [0, 10] }, nested: {} },
    },
  },
};

describe('toWire', () => {
  it('encodes unchanged as empty collections', () => {
    expect(toWire({ status: 'unchanged' })).toEqual({
      changed: [],
      added: {},
      removed: {},
      modified: {},
      nested: {},
    });
  });

  it('keeps nested changes', () => {
    expect(toWire(nestedResult).nested.child.modified).toEqual({ value: [0, 10] });
  });
});

describe('fromWire', () => {
  it('restores the result it was given', () => {
    expect(fromWire(toWire(nestedResult))).toEqual(nestedResult);
  });

  it('decodes an empty changed list as unchanged', () => {
    expect(fromWire({ changed: [], added: {}, removed: {}, modified: {}, nested: {} })).toEqual({
      status: 'unchanged',
    });
  });

  it('rejects malformed input', () => {
    expect(() => fromWire({ changed: 'name' })).toThrow(ZodError);
    expect(() =>
      fromWire({ changed: ['x'], added: {}, removed: {}, modified: { x: [1] }, nested: {} })
    ).toThrow(ZodError);
  });
});

describe('serializeDiff', () => {
  it('preserves dates through text', () => {
    const when = new Date('2024-03-01T12:00:00.000Z');
    const result: DiffResult = {
      status: 'changed',
      changes: { changed: ['seenAt'], added: { seenAt: when }, removed: {}, modified: {}, nested: {} },
    };

    const parsed = parseDiff(serializeDiff(result));

    expect(parsed).toEqual(result);
    expect(parsed.status === 'changed' && parsed.changes.added.seenAt).toBeInstanceOf(Date);
  });

  it('rejects text that is not a wire diff', () => {
    expect(() => parseDiff('{"json":{"changed":5}}')).toThrow(ZodError);
  });
});
