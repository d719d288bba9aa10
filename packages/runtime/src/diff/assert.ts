// Change assertions for tests and audits

import type { FieldName } from '@lumen-state/protocol';
import { StateAssertionError } from '../errors.js';
import { formatNames } from '../inspect.js';
import { diff } from './diff.js';

/**
 * Assert that exactly the expected fields changed between two snapshots.
 *
 * @throws StateAssertionError listing missing and unexpected changes
 */
export function assertChanged(oldState: object, newState: object, expected: readonly FieldName[]): void {
  const result = diff(oldState, newState);
  if (result.status === 'unchanged') {
    throw new StateAssertionError(`Expected fields ${formatNames(expected)} to change, but nothing changed`);
  }

  const actual = result.changes.changed;
  const missing = expected.filter((field) => !actual.includes(field));
  const extra = actual.filter((field) => !expected.includes(field));
  if (missing.length === 0 && extra.length === 0) return;

  const lines: string[] = [];
  if (missing.length > 0) lines.push(`Missing expected changes: ${formatNames(missing)}`);
  if (extra.length > 0) lines.push(`Unexpected changes: ${formatNames(extra)}`);
  throw new StateAssertionError(lines.join('\n'));
}
