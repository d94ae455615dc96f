/**
 * Diff engine.
 *
 * Pure set difference between the current and desired record sets of one
 * domain, keyed by record identity. Inputs are deduplicated first; outputs
 * are sorted so reports are reproducible.
 */

import { PermissionRecord, RecordSet, sortRecords } from '../domain/permission';

export interface RecordDiff<R extends PermissionRecord = PermissionRecord> {
  /** In desired, not in current: to be granted. */
  added: R[];
  /** In current, not in desired: to be revoked. */
  removed: R[];
  /** In both. */
  unchanged: R[];
}

export function diffRecords<R extends PermissionRecord>(current: Iterable<R>, desired: Iterable<R>): RecordDiff<R> {
  const currentSet = new RecordSet(current);
  const desiredSet = new RecordSet(desired);

  const added: R[] = [];
  const unchanged: R[] = [];
  for (const record of desiredSet) {
    (currentSet.has(record) ? unchanged : added).push(record);
  }
  const removed = currentSet.toArray().filter((record) => !desiredSet.has(record));

  return {
    added: sortRecords(added),
    removed: sortRecords(removed),
    unchanged: sortRecords(unchanged),
  };
}

/** True when applying the diff would change nothing. */
export function isConverged(diff: RecordDiff): boolean {
  return diff.added.length === 0 && diff.removed.length === 0;
}
