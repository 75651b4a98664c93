import { describe, expect, it } from 'vitest';

import {
  AhoCorasick,
  kmpFind,
  kmpSearch,
  kmpTable,
  lcpArray,
  SuffixAutomaton,
  SuffixIndex,
  suffixArray,
  suffixArrayDC3,
  zFunction,
  zSearch,
} from '../src/strings';

describe('strings', () => {
  describe('search', () => {
    it('builds the KMP failure table', () => {
      expect(kmpTable('ABCDABD')).toEqual([0, 0, 0, 0, 0, 1, 2, 0]);
    });

    it('finds the first and every match', () => {
      const haystack = 'ABC ABCDAB ABCDABCDABDE';
      expect(kmpFind(haystack, 'ABCDABD')).toBe(15);
      expect(kmpSearch(haystack, 'ABCDABD')).toEqual([15]);
      expect(kmpFind(haystack, 'ABCDABE')).toBe(-1);
      expect(kmpSearch('aaaa', 'aa')).toEqual([0, 1, 2]);
    });

    it('computes the Z-function', () => {
      expect(zFunction('aaabaab')).toEqual([0, 2, 1, 0, 2, 1, 0]);
      expect(zSearch('abcabaaaababab', 'aba')).toEqual([3, 8, 10]);
      expect(zSearch('ab', 'abc')).toEqual([]);
    });

    it('rejects an empty pattern', () => {
      expect(() => kmpSearch('abc', '')).toThrow('invalid_argument');
      expect(() => zSearch('abc', '')).toThrow('invalid_argument');
    });
  });

  describe('aho-corasick', () => {
    it('reports overlapping needles by end position', () => {
      const automaton = new AhoCorasick(['a', 'ab', 'bab', 'bc', 'bca', 'c', 'caa']);
      expect(automaton.search('abccab')).toEqual([
        { needle: 0, start: 0 },
        { needle: 1, start: 0 },
        { needle: 3, start: 1 },
        { needle: 5, start: 2 },
        { needle: 5, start: 3 },
        { needle: 0, start: 4 },
        { needle: 1, start: 4 },
      ]);
    });

    it('reports duplicate needles under each index', () => {
      const automaton = new AhoCorasick(['he', 'he']);
      expect(automaton.search('hehe').map((m) => [m.needle, m.start])).toEqual([
        [0, 0],
        [1, 0],
        [0, 2],
        [1, 2],
      ]);
      expect(automaton.stateCount).toBe(3);
    });

    it('exposes failure links', () => {
      const snapshot = new AhoCorasick(['ab', 'b']).snapshot();
      expect(snapshot.transitions).toEqual([[['a', 1], ['b', 3]], [['b', 2]], [], []]);
      expect(snapshot.fail).toEqual([0, 0, 3, 0]);
      expect(snapshot.outputs).toEqual([[], [], [0, 1], [1]]);

      const automaton = new AhoCorasick(['ab', 'b']);
      expect(automaton.next(0, 'a')).toBe(1);
      expect(automaton.next(1, 'b')).toBe(2);
      expect(automaton.next(2, 'b')).toBe(3);
      expect(automaton.next(3, 'c')).toBe(0);
      expect(automaton.outputs(2)).toEqual([0, 1]);
    });

    it('rejects empty needles', () => {
      expect(() => new AhoCorasick(['a', ''])).toThrow('invalid_argument: needle 1 is empty');
    });
  });

  describe('suffix arrays', () => {
    it('sorts the suffixes of banana', () => {
      const sa = suffixArray('banana');
      expect(sa).toEqual([5, 3, 1, 0, 4, 2]);
      expect(suffixArrayDC3('banana')).toEqual(sa);
      expect(lcpArray('banana', sa)).toEqual([1, 3, 0, 0, 2]);
    });

    it('sorts the suffixes of mississippi', () => {
      const expected = [10, 7, 4, 1, 0, 9, 8, 6, 3, 5, 2];
      expect(suffixArray('mississippi')).toEqual(expected);
      expect(suffixArrayDC3('mississippi')).toEqual(expected);
      expect(lcpArray('mississippi', expected)).toEqual([1, 1, 4, 0, 0, 1, 0, 2, 1, 3]);
    });

    it('handles tiny inputs', () => {
      expect(suffixArray('')).toEqual([]);
      expect(suffixArrayDC3('')).toEqual([]);
      expect(suffixArray('z')).toEqual([0]);
      expect(suffixArrayDC3('z')).toEqual([0]);
      expect(suffixArrayDC3('aaaa')).toEqual([3, 2, 1, 0]);
      expect(lcpArray('z', [0])).toEqual([]);
    });

    it('rejects a suffix array of the wrong length', () => {
      expect(() => lcpArray('abc', [0, 1])).toThrow('invalid_argument');
    });

    it('looks substrings up through the index', () => {
      const index = new SuffixIndex('banana');
      expect(index.findAll('a')).toEqual([1, 3, 5]);
      expect(index.findAll('ana')).toEqual([1, 3]);
      expect(index.find('nan')).toBe(2);
      expect(index.find('nab')).toBe(-1);
      expect(index.findAll('x')).toEqual([]);
      expect(index.lcp).toEqual([1, 3, 0, 0, 2]);
    });

    it('owns its arrays', () => {
      const sa = suffixArray('banana');
      const index = new SuffixIndex('banana', sa);
      sa.reverse();
      expect(index.findAll('ana')).toEqual([1, 3]);

      index.sa.fill(0);
      index.lcp[0] = 99;
      expect(index.findAll('ana')).toEqual([1, 3]);
      expect(index.sa).toEqual([5, 3, 1, 0, 4, 2]);
      expect(index.lcp).toEqual([1, 3, 0, 0, 2]);
      expect(() => new SuffixIndex('banana', [0, 1])).toThrow(
        'invalid_argument: suffix array has 2 entries for a string of length 6',
      );
    });
  });

  describe('suffix automaton', () => {
    it('finds every occurrence', () => {
      const automaton = new SuffixAutomaton('bananas');
      expect(automaton.findAll('a')).toEqual([1, 3, 5]);
      expect(automaton.findAll('an')).toEqual([1, 3]);
      expect(automaton.findAll('ana')).toEqual([1, 3]);
      expect(automaton.findAll('nas')).toEqual([4]);
      expect(automaton.findAll('bb')).toEqual([]);
      expect(automaton.contains('nan')).toBe(true);
      expect(automaton.contains('nab')).toBe(false);
      expect(automaton.length).toBe(7);
    });

    it('grows online', () => {
      const automaton = new SuffixAutomaton('ab');
      expect(automaton.findAll('b')).toEqual([1]);
      automaton.append('ab');
      expect(automaton.findAll('b')).toEqual([1, 3]);
      expect(() => automaton.extend('xy')).toThrow('invalid_argument');
    });

    it('counts distinct substrings', () => {
      expect(new SuffixAutomaton('abc').countDistinctSubstrings()).toBe(6);
      expect(new SuffixAutomaton('aaa').countDistinctSubstrings()).toBe(3);
      expect(new SuffixAutomaton('banana').countDistinctSubstrings()).toBe(15);
    });

    it('finds the longest common substring', () => {
      expect(new SuffixAutomaton('bbbabca').longestCommonSubstring('aababcd')).toBe('babc');
      expect(new SuffixAutomaton('abc').longestCommonSubstring('xyz')).toBe('');
    });
  });
});
