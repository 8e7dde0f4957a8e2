/**
 * ChangeSet derivation
 *
 * `added`, `modified`, `removed` and `unchanged` partition the union of the
 * current and previous path sets; every list is sorted.
 */

import type { ChangeSet } from './types.js';

export interface ChangeSetSummary {
  added: number;
  modified: number;
  removed: number;
  unchanged: number;
  hasChanges: boolean;
  description: string;
}

/**
 * Compare two fingerprint maps. A null `previous` reports every current
 * file as added.
 */
export function diffFingerprints(
  current: ReadonlyMap<string, string>,
  previous: ReadonlyMap<string, string> | null
): ChangeSet {
  const changeSet: ChangeSet = { added: [], modified: [], removed: [], unchanged: [] };

  for (const [file, fingerprint] of current) {
    const before = previous?.get(file);
    if (before === undefined) {
      changeSet.added.push(file);
    } else if (before !== fingerprint) {
      changeSet.modified.push(file);
    } else {
      changeSet.unchanged.push(file);
    }
  }

  if (previous) {
    for (const file of previous.keys()) {
      if (!current.has(file)) {
        changeSet.removed.push(file);
      }
    }
  }

  changeSet.added.sort();
  changeSet.modified.sort();
  changeSet.removed.sort();
  changeSet.unchanged.sort();
  return changeSet;
}

export function hasChanges(changeSet: ChangeSet): boolean {
  return changeSet.added.length > 0 || changeSet.modified.length > 0 || changeSet.removed.length > 0;
}

/**
 * Files whose findings must be recomputed: added ∪ modified
 */
export function changedFiles(changeSet: ChangeSet): string[] {
  return [...changeSet.added, ...changeSet.modified].sort();
}

export function describeChangeSet(changeSet: ChangeSet): string {
  const parts: string[] = [];
  if (changeSet.added.length > 0) {
    parts.push(`${changeSet.added.length} new`);
  }
  if (changeSet.modified.length > 0) {
    parts.push(`${changeSet.modified.length} modified`);
  }
  if (changeSet.removed.length > 0) {
    parts.push(`${changeSet.removed.length} deleted`);
  }
  if (parts.length === 0) {
    return 'No changes detected';
  }
  return `${parts.join(', ')} (${changeSet.unchanged.length} unchanged)`;
}

export function summarizeChangeSet(changeSet: ChangeSet): ChangeSetSummary {
  return {
    added: changeSet.added.length,
    modified: changeSet.modified.length,
    removed: changeSet.removed.length,
    unchanged: changeSet.unchanged.length,
    hasChanges: hasChanges(changeSet),
    description: describeChangeSet(changeSet),
  };
}
