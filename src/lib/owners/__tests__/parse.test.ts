/**
 * Tests for parse.ts - OWNERS and OWNERS_ALIASES parsing
 */

import { describe, it, expect } from 'vitest';
import { parseAliasesFile, parseOwnersFile } from '../parse.js';
import { MalformedDataError } from '../errors.js';

describe('parse.ts', () => {
  describe('parseOwnersFile', () => {
    it('reads approvers, reviewers and labels', () => {
      const record = parseOwnersFile(
        'approvers:\n  - amy\n  - bob\nreviewers:\n  - cid\nlabels:\n  - sig/foo\n',
        'org/repo/OWNERS'
      );
      expect(record).toEqual({
        approvers: ['amy', 'bob'],
        reviewers: ['cid'],
        labels: ['sig/foo'],
        present: true,
        expanded: false,
      });
    });

    it('treats an empty file as an empty record', () => {
      expect(parseOwnersFile('', 'org/repo/OWNERS')).toEqual({
        approvers: [],
        reviewers: [],
        present: true,
        expanded: false,
      });
    });

    it('stringifies numeric names and drops nulls', () => {
      const record = parseOwnersFile('approvers:\n  - 1234\n  -\n  - amy\n', 'org/repo/OWNERS');
      expect(record.approvers).toEqual(['1234', 'amy']);
    });

    it('uses the catch-all filter in place of top-level lists', () => {
      const content = [
        'approvers:',
        '  - ignored',
        'labels:',
        '  - area/x',
        'filters:',
        '  ".*":',
        '    approvers:',
        '      - amy',
        '  "\\\\.go$":',
        '    reviewers:',
        '      - gopher',
        '',
      ].join('\n');
      const record = parseOwnersFile(content, 'org/repo/OWNERS');
      expect(record.approvers).toEqual(['amy']);
      expect(record.reviewers).toEqual([]);
      expect(record.labels).toEqual(['area/x']);
    });

    it('rejects a file that is not a mapping', () => {
      expect(() => parseOwnersFile('- amy\n', 'org/repo/OWNERS')).toThrow(MalformedDataError);
    });

    it('rejects invalid YAML', () => {
      expect(() => parseOwnersFile('approvers: [amy\n', 'org/repo/OWNERS')).toThrow(/org\/repo\/OWNERS is malformed/);
    });
  });

  describe('parseAliasesFile', () => {
    it('reads the alias table', () => {
      const result = parseAliasesFile('aliases:\n  leads:\n    - amy\n    - bob\n  empty:\n', 'org/repo/OWNERS_ALIASES');
      expect(result).toEqual({ aliases: { leads: ['amy', 'bob'], empty: null } });
    });

    it('treats a missing aliases key as empty', () => {
      expect(parseAliasesFile('other: 1\n', 'org/repo/OWNERS_ALIASES')).toEqual({ aliases: {} });
    });

    it('rejects aliases written as a list', () => {
      expect(() => parseAliasesFile('aliases:\n  - amy\n', 'org/repo/OWNERS_ALIASES')).toThrow(
        'org/repo/OWNERS_ALIASES is malformed: aliases must be a mapping, not a list'
      );
    });
  });
});
