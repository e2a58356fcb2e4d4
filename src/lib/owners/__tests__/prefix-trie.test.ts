/**
 * Tests for prefix-trie.ts - longest prefix lookup
 */

import { describe, it, expect } from 'vitest';
import { PrefixTrie, stripDeclarationFile } from '../prefix-trie.js';

describe('prefix-trie.ts', () => {
  describe('stripDeclarationFile', () => {
    it('removes the trailing file name', () => {
      expect(stripDeclarationFile('org/repo/a/OWNERS', 'OWNERS')).toBe('org/repo/a');
    });

    it('leaves other paths alone', () => {
      expect(stripDeclarationFile('org/repo/NOT_OWNERS', 'OWNERS')).toBe('org/repo/NOT_OWNERS');
      expect(stripDeclarationFile('org/repo', 'OWNERS')).toBe('org/repo');
    });

    it('maps a bare file name to the empty prefix', () => {
      expect(stripDeclarationFile('OWNERS', 'OWNERS')).toBe('');
    });
  });

  describe('PrefixTrie', () => {
    it('finds the deepest ancestor', () => {
      const trie = new PrefixTrie<string>();
      trie.insert('org/repo', 'root');
      trie.insert('org/repo/api', 'api');

      expect(trie.longestPrefix('org/repo/api/v2/types')).toEqual({ prefix: 'org/repo/api', value: 'api' });
      expect(trie.longestPrefix('org/repo/cmd')).toEqual({ prefix: 'org/repo', value: 'root' });
    });

    it('matches whole segments only', () => {
      const trie = new PrefixTrie<string>();
      trie.insert('org/repo/api', 'api');

      expect(trie.longestPrefix('org/repo/apis/v1')).toBeNull();
    });

    it('matches a key against itself', () => {
      const trie = new PrefixTrie<number>();
      trie.insert('org/repo/a', 1);

      expect(trie.longestPrefix('org/repo/a')).toEqual({ prefix: 'org/repo/a', value: 1 });
    });

    it('returns null when nothing matches', () => {
      const trie = new PrefixTrie<number>();
      trie.insert('org/other', 1);

      expect(trie.longestPrefix('org/repo/a')).toBeNull();
    });

    it('replaces the value for an existing key', () => {
      const trie = new PrefixTrie<string>();
      trie.insert('org/repo', 'first');
      trie.insert('org/repo', 'second');

      expect(trie.size).toBe(1);
      expect(trie.get('org/repo')).toBe('second');
    });

    it('does not report intermediate nodes as keys', () => {
      const trie = new PrefixTrie<string>();
      trie.insert('org/repo/a/b', 'deep');

      expect(trie.get('org/repo')).toBeUndefined();
      expect(trie.longestPrefix('org/repo/a')).toBeNull();
    });
  });
});
