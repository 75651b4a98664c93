import { invalidArgument } from '../errors';

const assertNeedle = (pattern: string) => {
  if (pattern.length === 0) throw invalidArgument('search pattern must not be empty');
};

/**
 * Failure table of length `m + 1`: entry `i` is the length of the longest
 * proper prefix of `pattern.slice(0, i)` that is also its suffix.
 */
export function kmpTable(pattern: string): number[] {
  const m = pattern.length;
  const table: number[] = Array(m + 1).fill(0);
  let k = 0;
  for (let i = 1; i < m; i += 1) {
    while (k > 0 && pattern[i] !== pattern[k]) k = table[k];
    if (pattern[i] === pattern[k]) k += 1;
    table[i + 1] = k;
  }
  return table;
}

/** Start positions of every (possibly overlapping) occurrence, ascending. */
export function kmpSearch(text: string, pattern: string, table: ReadonlyArray<number> = kmpTable(pattern)): number[] {
  assertNeedle(pattern);
  const m = pattern.length;
  const hits: number[] = [];
  let j = 0;
  for (let i = 0; i < text.length; i += 1) {
    while (j > 0 && text[i] !== pattern[j]) j = table[j];
    if (text[i] === pattern[j]) j += 1;
    if (j === m) {
      hits.push(i - m + 1);
      j = table[m];
    }
  }
  return hits;
}

export function kmpFind(text: string, pattern: string): number {
  assertNeedle(pattern);
  const table = kmpTable(pattern);
  let j = 0;
  for (let i = 0; i < text.length; i += 1) {
    while (j > 0 && text[i] !== pattern[j]) j = table[j];
    if (text[i] === pattern[j]) j += 1;
    if (j === pattern.length) return i - j + 1;
  }
  return -1;
}

/** `z[i]` is the longest common prefix of `s` and `s.slice(i)`; `z[0]` is 0. */
export function zFunction(s: string): number[] {
  const n = s.length;
  const z: number[] = Array(n).fill(0);
  let l = 0;
  let r = 0;
  for (let i = 1; i < n; i += 1) {
    if (i < r) z[i] = Math.min(r - i, z[i - l]);
    while (i + z[i] < n && s[z[i]] === s[i + z[i]]) z[i] += 1;
    if (i + z[i] > r) {
      l = i;
      r = i + z[i];
    }
  }
  return z;
}

/**
 * Occurrences of `pattern` read off the Z-function of `pattern + text`. No
 * separator is needed because values are compared against the pattern length.
 */
export function zSearch(text: string, pattern: string): number[] {
  assertNeedle(pattern);
  const m = pattern.length;
  const z = zFunction(pattern + text);
  const hits: number[] = [];
  for (let i = m; i + m <= z.length; i += 1) {
    if (z[i] >= m) hits.push(i - m);
  }
  return hits;
}
