import { invalidArgument } from '../errors';

type State = {
  length: number;
  link: number;
  /** End position of the first occurrence; -1 on clones. */
  firstpos: number;
  next: Map<string, number>;
};

/**
 * Suffix automaton built online one code unit at a time. States live in an
 * arena and refer to each other by index; state 0 is the initial state.
 */
export class SuffixAutomaton {
  private readonly states: State[] = [{ length: 0, link: -1, firstpos: -1, next: new Map() }];
  private last = 0;
  private size = 0;
  private inverseLinks: number[][] | null = null;

  constructor(text = '') {
    this.append(text);
  }

  /** Number of characters consumed so far. */
  get length(): number {
    return this.size;
  }

  get stateCount(): number {
    return this.states.length;
  }

  get transitionCount(): number {
    return this.states.reduce((total, state) => total + state.next.size, 0);
  }

  append(text: string): void {
    for (let i = 0; i < text.length; i += 1) this.extend(text[i]);
  }

  extend(ch: string): void {
    if (ch.length !== 1) throw invalidArgument(`expected a single code unit, got ${JSON.stringify(ch)}`);
    this.inverseLinks = null;
    const curr = this.states.length;
    this.states.push({ length: this.size + 1, link: 0, firstpos: this.size, next: new Map() });
    this.size += 1;

    let p = this.last;
    while (p !== -1 && !this.states[p].next.has(ch)) {
      this.states[p].next.set(ch, curr);
      p = this.states[p].link;
    }

    if (p !== -1) {
      const q = this.transition(p, ch);
      if (this.states[p].length + 1 === this.states[q].length) {
        this.states[curr].link = q;
      } else {
        const clone = this.states.length;
        this.states.push({
          length: this.states[p].length + 1,
          link: this.states[q].link,
          firstpos: -1,
          next: new Map(this.states[q].next),
        });
        while (p !== -1 && this.states[p].next.get(ch) === q) {
          this.states[p].next.set(ch, clone);
          p = this.states[p].link;
        }
        this.states[q].link = clone;
        this.states[curr].link = clone;
      }
    }
    this.last = curr;
  }

  private transition(state: number, ch: string): number {
    return this.states[state].next.get(ch) ?? -1;
  }

  /** State reached by reading `needle` from the start, or -1. */
  private walk(needle: string): number {
    let state = 0;
    for (let i = 0; i < needle.length && state !== -1; i += 1) state = this.transition(state, needle[i]);
    return state;
  }

  contains(needle: string): boolean {
    return this.walk(needle) !== -1;
  }

  /** Start positions of every occurrence of `needle`, ascending. */
  findAll(needle: string): number[] {
    if (needle.length === 0) throw invalidArgument('needle must not be empty');
    const node = this.walk(needle);
    if (node === -1) return [];

    const children = this.linkTree();
    const out: number[] = [];
    const queue: number[] = [node];
    for (let head = 0; head < queue.length; head += 1) {
      const state = this.states[queue[head]];
      if (state.firstpos !== -1) out.push(state.firstpos - needle.length + 1);
      queue.push(...children[queue[head]]);
    }
    return out.sort((a, b) => a - b);
  }

  private linkTree(): number[][] {
    if (this.inverseLinks === null) {
      const children: number[][] = this.states.map(() => []);
      for (let i = 1; i < this.states.length; i += 1) children[this.states[i].link].push(i);
      this.inverseLinks = children;
    }
    return this.inverseLinks;
  }

  /** Longest substring shared with `other`; the earliest one in `other` on ties. */
  longestCommonSubstring(other: string): string {
    let state = 0;
    let len = 0;
    let bestLength = 0;
    let bestEnd = -1;
    for (let i = 0; i < other.length; i += 1) {
      const ch = other[i];
      if (!this.states[state].next.has(ch)) {
        while (state !== -1 && !this.states[state].next.has(ch)) state = this.states[state].link;
        if (state === -1) {
          state = 0;
          len = 0;
          continue;
        }
        len = this.states[state].length;
      }
      len += 1;
      state = this.transition(state, ch);
      if (len > bestLength) {
        bestLength = len;
        bestEnd = i;
      }
    }
    return bestLength === 0 ? '' : other.slice(bestEnd - bestLength + 1, bestEnd + 1);
  }

  countDistinctSubstrings(): number {
    let total = 0;
    for (let i = 1; i < this.states.length; i += 1) {
      total += this.states[i].length - this.states[this.states[i].link].length;
    }
    return total;
  }
}
