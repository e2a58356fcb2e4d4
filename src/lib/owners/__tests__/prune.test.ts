/**
 * Tests for prune.ts - duplicate reviewer removal
 */

import { describe, it, expect } from 'vitest';
import { pruneDuplicateReviewers, pruneRecord } from '../prune.js';
import type { OwnersRecord, OwnersStore } from '../types.js';

function record(approvers: string[], reviewers: string[]): OwnersRecord {
  return { approvers, reviewers, present: true, expanded: true };
}

describe('prune.ts', () => {
  describe('pruneRecord', () => {
    it('removes approvers from reviewers', () => {
      const pruned = pruneRecord(record(['a', 'b'], ['b', 'c']));
      expect(pruned.approvers).toEqual(['a', 'b']);
      expect(pruned.reviewers).toEqual(['c']);
    });

    it('keeps labels and flags', () => {
      const pruned = pruneRecord({ ...record(['a'], ['a']), labels: ['sig/foo'], present: false });
      expect(pruned).toEqual({ approvers: ['a'], reviewers: [], labels: ['sig/foo'], present: false, expanded: true });
    });

    it('is idempotent', () => {
      const once = pruneRecord(record(['a', 'b'], ['b', 'c', 'a']));
      expect(pruneRecord(once)).toEqual(once);
    });
  });

  describe('pruneDuplicateReviewers', () => {
    it('prunes every record without touching the input', () => {
      const store: OwnersStore = {
        owners: {
          'org/repo/OWNERS': record(['a', 'b'], ['b', 'c']),
          'org/repo/docs/OWNERS': record([], ['d']),
        },
        aliases: { 'org/repo/OWNERS_ALIASES': { aliases: { team: ['a'] } } },
      };

      const pruned = pruneDuplicateReviewers(store);

      expect(pruned.owners['org/repo/OWNERS'].reviewers).toEqual(['c']);
      expect(pruned.owners['org/repo/docs/OWNERS'].reviewers).toEqual(['d']);
      expect(pruned.aliases).toEqual(store.aliases);
      expect(store.owners['org/repo/OWNERS'].reviewers).toEqual(['b', 'c']);
    });
  });
});
