// Human-readable diff reports

import type { DiffResult, StateChanges } from '@lumen-state/protocol';
import { formatNames, formatValue } from '../inspect.js';

/**
 * Render changes as grouped Added/Removed/Modified sections.
 * Falls back to listing the changed fields when only nested fields changed.
 */
export function formatChanges(changes: StateChanges): string {
  const sections: string[] = [];

  const added = Object.entries(changes.added);
  if (added.length > 0) {
    sections.push(['Added:', ...added.map(([field, value]) => `  + ${field}: ${formatValue(value)}`)].join('\n'));
  }

  const removed = Object.entries(changes.removed);
  if (removed.length > 0) {
    sections.push(['Removed:', ...removed.map(([field, value]) => `  - ${field}: ${formatValue(value)}`)].join('\n'));
  }

  const modified = Object.entries(changes.modified);
  if (modified.length > 0) {
    sections.push(
      [
        'Modified:',
        ...modified.map(([field, [before, after]]) => `  ~ ${field}: ${formatValue(before)} -> ${formatValue(after)}`),
      ].join('\n')
    );
  }

  return sections.length > 0 ? sections.join('\n\n') : `No changes to fields: ${formatNames(changes.changed)}`;
}

export function formatDiff(result: DiffResult): string {
  return result.status === 'unchanged' ? 'No changes' : formatChanges(result.changes);
}
