/**
 * Tests for consensus.ts - common and union owners of a subproject
 */

import { describe, it, expect } from 'vitest';
import { analyzeConsensus, findingCode } from '../consensus.js';
import type { OwnersRecord } from '../types.js';

function present(approvers: string[], reviewers: string[] = [], labels?: string[]): OwnersRecord {
  const record: OwnersRecord = { approvers, reviewers, present: true, expanded: true };
  if (labels) record.labels = labels;
  return record;
}

const absent: OwnersRecord = { approvers: [], reviewers: [], present: false, expanded: true };

describe('consensus.ts', () => {
  describe('analyzeConsensus', () => {
    it('computes the intersection and union of approvers', () => {
      const result = analyzeConsensus('sig-foo/core', {
        'org/repo/a/OWNERS': present(['a', 'b']),
        'org/repo/b/OWNERS': present(['b', 'c']),
      });

      expect(result.common.approvers).toEqual(['b']);
      expect(result.union.approvers).toEqual(['a', 'b', 'c']);
      expect(result.findings.find((f) => f.attribute === 'approvers')).toEqual({
        kind: 'consensus',
        level: 'info',
        subproject: 'sig-foo/core',
        attribute: 'approvers',
        message: 'OK: sig-foo/core has 1 common approvers',
      });
    });

    it('reports attributes with no common entries', () => {
      const result = analyzeConsensus('sig-foo/core', {
        'org/repo/a/OWNERS': present(['a'], [], ['sig/foo']),
        'org/repo/b/OWNERS': present(['b'], [], ['sig/foo']),
      });

      expect(result.findings.map((f) => f.message)).toEqual([
        'sig-foo/core has no common approvers',
        'OK: sig-foo/core has 0 common reviewers',
        'OK: sig-foo/core has 1 common labels',
      ]);
      expect(findingCode(result.findings[0].kind)).toBe('OWNERS_NO_CONSENSUS');
    });

    it('gives equal common and union sets for a single file', () => {
      const result = analyzeConsensus('sig-foo/core', {
        'org/repo/OWNERS': present(['a', 'b'], ['c'], ['sig/foo']),
      });

      expect(result.common).toEqual({ approvers: ['a', 'b'], reviewers: ['c'], labels: ['sig/foo'] });
      expect(result.union).toEqual(result.common);
      expect(result.findings).toEqual([]);
    });

    it('counts absent files as empty sets', () => {
      const result = analyzeConsensus('sig-foo/core', {
        'org/repo/a/OWNERS': present(['a', 'b']),
        'org/repo/b/OWNERS': absent,
      });

      expect(result.common.approvers).toEqual([]);
      expect(result.union.approvers).toEqual(['a', 'b']);
      expect(result.findings[0]).toEqual({
        kind: 'missing',
        level: 'warning',
        subproject: 'sig-foo/core',
        path: 'org/repo/b/OWNERS',
        message: 'sig-foo/core is missing org/repo/b/OWNERS',
      });
      expect(result.findings.map((f) => f.message)).toEqual([
        'sig-foo/core is missing org/repo/b/OWNERS',
        'sig-foo/core has no common approvers',
        'OK: sig-foo/core has 0 common reviewers',
        'OK: sig-foo/core has 0 common labels',
      ]);
    });

    it('reports a subproject missing all of its files', () => {
      const result = analyzeConsensus('sig-foo/core', { 'org/repo/OWNERS': absent });

      expect(result.findings.map((f) => f.kind)).toEqual(['missing-all', 'missing']);
      expect(result.findings[0].message).toBe('sig-foo/core is missing ALL of its OWNERS files, why is this a subproject?');
      expect(result.common).toEqual({ approvers: [], reviewers: [], labels: [] });
    });
  });

  it('findingCode maps consensus to no code', () => {
    expect(findingCode('consensus')).toBeNull();
    expect(findingCode('missing-all')).toBe('OWNERS_MISSING_ALL');
    expect(findingCode('missing')).toBe('OWNERS_MISSING_DATA');
  });
});
