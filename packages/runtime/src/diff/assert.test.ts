// Tests for change assertions

import { describe, it, expect } from 'vitest';
import { StateAssertionError } from '../errors.js';
import { silentLogger } from '../logging.js';
import { createSchemaRegistry } from '../schema/index.js';
import { assertChanged } from './assert.js';

type Task = { title: string; done: boolean; notes: string | null };

function setup() {
  const registry = createSchemaRegistry({ logger: silentLogger });
  const task = registry.define<Task>('Task', {
    title: { type: 'string', default: '' },
    done: { type: 'boolean', default: false },
    notes: { type: 'string', nullable: true },
  });
  const before = task.createOrThrow({ title: 'Write tests' });
  const after = task.update(before, { done: true, notes: 'shipped' });
  return { before, after };
}

describe('assertChanged', () => {
  it('passes when exactly the expected fields changed', () => {
    const { before, after } = setup();

    expect(() => assertChanged(before, after, ['done', 'notes'])).not.toThrow();
    expect(() => assertChanged(before, after, ['notes', 'done'])).not.toThrow();
  });

  it('fails when nothing changed', () => {
    const { before } = setup();

    expect(() => assertChanged(before, before, ['title'])).toThrow(
      new StateAssertionError('Expected fields [title] to change, but nothing changed')
    );
  });

  it('lists missing and unexpected changes', () => {
    const { before, after } = setup();

    expect(() => assertChanged(before, after, ['title', 'done'])).toThrow(
      'Missing expected changes: [title]\nUnexpected changes: [notes]'
    );
  });

  it('reports only unexpected changes when none are missing', () => {
    const { before, after } = setup();

    try {
      assertChanged(before, after, ['done']);
      expect.unreachable();
    } catch (thrown) {
      expect(thrown).toBeInstanceOf(StateAssertionError);
      expect(thrown instanceof StateAssertionError && thrown.message).toBe('Unexpected changes: [notes]');
    }
  });
});
