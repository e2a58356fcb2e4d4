/**
 * Duplicate-role pruning
 *
 * Approvers are implicitly reviewers, so listing them as reviewers too is
 * redundant.
 */

import type { OwnersRecord, OwnersStore } from './types.js';

/**
 * Reviewers of a record without its approvers
 */
export function pruneRecord(record: OwnersRecord): OwnersRecord {
  const approvers = new Set(record.approvers);
  return {
    ...record,
    reviewers: record.reviewers.filter((r) => !approvers.has(r)),
  };
}

/**
 * Remove approvers from the reviewers of every OWNERS record
 *
 * Returns a new store; the input is left untouched.
 */
export function pruneDuplicateReviewers(store: OwnersStore): OwnersStore {
  const owners: Record<string, OwnersRecord> = {};
  for (const [ownersPath, record] of Object.entries(store.owners)) {
    owners[ownersPath] = pruneRecord(record);
  }
  return { owners, aliases: store.aliases };
}
