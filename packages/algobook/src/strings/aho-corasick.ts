import { invalidArgument } from '../errors';

export type NeedleMatch = {
  /** Index into the needle list the automaton was built from. */
  needle: number;
  start: number;
};

export type AutomatonSnapshot = {
  transitions: Array<Array<[string, number]>>;
  fail: number[];
  outputs: number[][];
};

type TrieNode = {
  next: Map<string, number>;
  fail: number;
  /** Needles ending here, followed by those inherited through the failure link. */
  out: number[];
};

/**
 * Aho–Corasick automaton over an arena of trie nodes; state 0 is the root.
 */
export class AhoCorasick {
  private readonly nodes: TrieNode[] = [{ next: new Map(), fail: 0, out: [] }];
  private readonly lengths: number[];

  constructor(needles: ReadonlyArray<string>) {
    this.lengths = needles.map((needle) => needle.length);
    needles.forEach((needle, index) => this.insert(needle, index));
    this.link();
  }

  get stateCount(): number {
    return this.nodes.length;
  }

  private insert(needle: string, index: number): void {
    if (needle.length === 0) throw invalidArgument(`needle ${index} is empty`);
    let state = 0;
    for (let i = 0; i < needle.length; i += 1) {
      const ch = needle[i];
      let target = this.nodes[state].next.get(ch);
      if (target === undefined) {
        target = this.nodes.length;
        this.nodes.push({ next: new Map(), fail: 0, out: [] });
        this.nodes[state].next.set(ch, target);
      }
      state = target;
    }
    this.nodes[state].out.push(index);
  }

  // Level order guarantees a node's failure link is final before its children need it.
  private link(): void {
    const queue: number[] = [...this.nodes[0].next.values()];
    for (let head = 0; head < queue.length; head += 1) {
      const s = queue[head];
      for (const [ch, t] of this.nodes[s].next) {
        const target = this.nodes[t];
        target.fail = s === 0 ? 0 : this.next(this.nodes[s].fail, ch);
        target.out = [...target.out, ...this.nodes[target.fail].out];
        queue.push(t);
      }
    }
  }

  next(state: number, ch: string): number {
    let s = state;
    while (true) {
      const target = this.nodes[s].next.get(ch);
      if (target !== undefined) return target;
      if (s === 0) return 0;
      s = this.nodes[s].fail;
    }
  }

  outputs(state: number): ReadonlyArray<number> {
    return this.nodes[state].out;
  }

  /** Every occurrence of every needle, ordered by end position. */
  search(text: string): NeedleMatch[] {
    const matches: NeedleMatch[] = [];
    let state = 0;
    for (let i = 0; i < text.length; i += 1) {
      state = this.next(state, text[i]);
      for (const needle of this.nodes[state].out) {
        matches.push({ needle, start: i - this.lengths[needle] + 1 });
      }
    }
    return matches;
  }

  snapshot(): AutomatonSnapshot {
    return {
      transitions: this.nodes.map((node) => [...node.next.entries()]),
      fail: this.nodes.map((node) => node.fail),
      outputs: this.nodes.map((node) => [...node.out]),
    };
  }
}
