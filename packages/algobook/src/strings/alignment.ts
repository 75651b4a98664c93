import { invalidArgument } from '../errors';

export type AlignmentOptions = {
  /** Cost of one inserted gap. Default 1. */
  gapCost?: number;
  /** Cost of aligning two different characters. Default 1. */
  subCost?: number;
  /** Gap marker; must be a single code unit. Default `'_'`. */
  gap?: string;
};

export type Alignment = {
  first: string;
  second: string;
  cost: number;
};

type ResolvedOptions = Required<AlignmentOptions>;

function resolve(options: AlignmentOptions): ResolvedOptions {
  const gapCost = options.gapCost ?? 1;
  const subCost = options.subCost ?? 1;
  const gap = options.gap ?? '_';
  if (!(gapCost >= 0) || !(subCost >= 0)) throw invalidArgument('alignment costs must be non-negative');
  if (gap.length !== 1) throw invalidArgument(`gap marker ${JSON.stringify(gap)} must be one code unit`);
  return { gapCost, subCost, gap };
}

export function longestCommonSubsequence(a: string, b: string): string {
  const n = a.length;
  const m = b.length;
  const dp: number[][] = Array.from({ length: n + 1 }, () => Array(m + 1).fill(0));
  for (let i = 1; i <= n; i += 1) {
    for (let j = 1; j <= m; j += 1) {
      dp[i][j] = a[i - 1] === b[j - 1] ? dp[i - 1][j - 1] + 1 : Math.max(dp[i][j - 1], dp[i - 1][j]);
    }
  }

  const out: string[] = [];
  let i = n;
  let j = m;
  while (i > 0 && j > 0) {
    if (a[i - 1] === b[j - 1]) {
      out.push(a[i - 1]);
      i -= 1;
      j -= 1;
    } else if (dp[i - 1][j] >= dp[i][j - 1]) {
      i -= 1;
    } else {
      j -= 1;
    }
  }
  return out.reverse().join('');
}

/** Last row of the LCS-length table of `a` against `b`. */
function lcsRow(a: string, b: string): number[] {
  let prev: number[] = Array(b.length + 1).fill(0);
  let row: number[] = Array(b.length + 1).fill(0);
  for (let i = 0; i < a.length; i += 1) {
    [prev, row] = [row, prev];
    row[0] = 0;
    for (let j = 0; j < b.length; j += 1) {
      row[j + 1] = a[i] === b[j] ? prev[j] + 1 : Math.max(row[j], prev[j + 1]);
    }
  }
  return row;
}

const reverse = (s: string) => s.split('').reverse().join('');

/**
 * Hirschberg's divide and conquer LCS: rows only, so the extra space is
 * linear in the shorter input.
 */
export function hirschbergLcs(a: string, b: string): string {
  if (a.length < b.length) return hirschbergLcs(b, a);
  const out: string[] = [];
  const solve = (s1: string, s2: string) => {
    if (s1.length === 0) return;
    if (s1.length === 1) {
      if (s2.includes(s1)) out.push(s1);
      return;
    }
    const mid = Math.floor(s1.length / 2);
    const fwd = lcsRow(s1.slice(0, mid), s2);
    const rev = lcsRow(reverse(s1.slice(mid)), reverse(s2));
    let split = 0;
    let best = -1;
    for (let k = 0; k <= s2.length; k += 1) {
      if (fwd[k] + rev[s2.length - k] > best) {
        best = fwd[k] + rev[s2.length - k];
        split = k;
      }
    }
    solve(s1.slice(0, mid), s2.slice(0, split));
    solve(s1.slice(mid), s2.slice(split));
  };
  solve(a, b);
  return out.join('');
}

/** Longest contiguous substring of both inputs; the earliest in `a` on ties. */
export function longestCommonSubstring(a: string, b: string): string {
  let prev: number[] = Array(b.length + 1).fill(0);
  let row: number[] = Array(b.length + 1).fill(0);
  let bestLength = 0;
  let bestEnd = 0;
  for (let i = 1; i <= a.length; i += 1) {
    [prev, row] = [row, prev];
    row[0] = 0;
    for (let j = 1; j <= b.length; j += 1) {
      row[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : 0;
      if (row[j] > bestLength) {
        bestLength = row[j];
        bestEnd = i;
      }
    }
  }
  return a.slice(bestEnd - bestLength, bestEnd);
}

/** Levenshtein distance with unit costs. */
export function editDistance(a: string, b: string): number {
  return costRow(a, b, { gapCost: 1, subCost: 1, gap: '_' })[b.length];
}

/** Full-table alignment, traced back from the bottom-right corner. */
export function alignSequences(a: string, b: string, options: AlignmentOptions = {}): Alignment {
  const { gapCost, subCost, gap } = resolve(options);
  const n = a.length;
  const m = b.length;
  const dp: number[][] = Array.from({ length: n + 1 }, (_, i) =>
    Array.from({ length: m + 1 }, (_, j) => (i === 0 ? j * gapCost : j === 0 ? i * gapCost : 0)),
  );
  for (let i = 1; i <= n; i += 1) {
    for (let j = 1; j <= m; j += 1) {
      dp[i][j] =
        a[i - 1] === b[j - 1]
          ? dp[i - 1][j - 1]
          : Math.min(dp[i - 1][j - 1] + subCost, Math.min(dp[i - 1][j], dp[i][j - 1]) + gapCost);
    }
  }

  const first: string[] = [];
  const second: string[] = [];
  let i = n;
  let j = m;
  while (i > 0 && j > 0) {
    if (a[i - 1] === b[j - 1] || dp[i][j] === dp[i - 1][j - 1] + subCost) {
      i -= 1;
      j -= 1;
      first.push(a[i]);
      second.push(b[j]);
    } else if (dp[i][j] === dp[i - 1][j] + gapCost) {
      i -= 1;
      first.push(a[i]);
      second.push(gap);
    } else {
      j -= 1;
      first.push(gap);
      second.push(b[j]);
    }
  }
  while (i > 0 || j > 0) {
    if (i > 0) {
      i -= 1;
      first.push(a[i]);
    } else {
      first.push(gap);
    }
    if (j > 0) {
      j -= 1;
      second.push(b[j]);
    } else {
      second.push(gap);
    }
  }
  return { first: first.reverse().join(''), second: second.reverse().join(''), cost: dp[n][m] };
}

/** Last row of the alignment cost table of `a` against `b`. */
function costRow(a: string, b: string, { gapCost, subCost }: ResolvedOptions): number[] {
  let prev: number[] = [];
  let row: number[] = Array.from({ length: b.length + 1 }, (_, j) => j * gapCost);
  for (let i = 0; i < a.length; i += 1) {
    prev = row;
    row = Array(b.length + 1).fill(0);
    row[0] = prev[0] + gapCost;
    for (let j = 0; j < b.length; j += 1) {
      row[j + 1] =
        a[i] === b[j] ? prev[j] : Math.min(prev[j] + subCost, Math.min(prev[j + 1], row[j]) + gapCost);
    }
  }
  return row;
}

/**
 * Linear-space alignment. Splits the longer string in half, finds the
 * cheapest split point of the other from a forward and a reverse cost row,
 * and recurses on both halves.
 */
export function hirschbergAlign(a: string, b: string, options: AlignmentOptions = {}): Alignment {
  const resolved = resolve(options);
  if (a.length < b.length) {
    const swapped = hirschbergAlign(b, a, resolved);
    return { first: swapped.second, second: swapped.first, cost: swapped.cost };
  }
  const { gapCost, subCost, gap } = resolved;
  const first: string[] = [];
  const second: string[] = [];

  const solve = (s1: string, s2: string) => {
    if (s1.length === 0) {
      for (const ch of s2) {
        first.push(gap);
        second.push(ch);
      }
      return;
    }
    if (s1.length === 1) {
      const pos = s2.indexOf(s1);
      const gapped = s2.length === 0 || (pos === -1 && 2 * gapCost < subCost);
      if (gapped) {
        first.push(s1);
        second.push(gap);
      }
      const at = gapped ? -1 : pos === -1 ? 0 : pos;
      for (let k = 0; k < s2.length; k += 1) {
        first.push(k === at ? s1 : gap);
        second.push(s2[k]);
      }
      return;
    }
    const mid = Math.floor(s1.length / 2);
    const fwd = costRow(s1.slice(0, mid), s2, resolved);
    const rev = costRow(reverse(s1.slice(mid)), reverse(s2), resolved);
    let split = 0;
    let best = Infinity;
    for (let k = 0; k <= s2.length; k += 1) {
      if (fwd[k] + rev[s2.length - k] < best) {
        best = fwd[k] + rev[s2.length - k];
        split = k;
      }
    }
    solve(s1.slice(0, mid), s2.slice(0, split));
    solve(s1.slice(mid), s2.slice(split));
  };

  solve(a, b);
  const result = { first: first.join(''), second: second.join('') };
  return { ...result, cost: alignmentCost(result.first, result.second, resolved) };
}

/** Cost of an existing alignment: gaps on either side plus mismatched pairs. */
export function alignmentCost(first: string, second: string, options: AlignmentOptions = {}): number {
  const { gapCost, subCost, gap } = resolve(options);
  if (first.length !== second.length) throw invalidArgument('aligned strings must have equal length');
  let cost = 0;
  for (let i = 0; i < first.length; i += 1) {
    if (first[i] === gap || second[i] === gap) cost += gapCost;
    else if (first[i] !== second[i]) cost += subCost;
  }
  return cost;
}
