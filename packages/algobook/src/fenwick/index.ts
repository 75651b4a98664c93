import { assertIndex, invalidArgument } from '../errors';

// All trees take 0-based indices and inclusive ranges; storage is 1-based.

const lowbit = (i: number) => i & -i;

function assertRange(lo: number, hi: number, n: number, what = 'range'): void {
  assertIndex(lo, n, `${what} start`);
  assertIndex(hi, n, `${what} end`);
  if (lo > hi) throw invalidArgument(`${what} [${lo}, ${hi}] is empty`);
}

function assertSize(n: number, what: string): void {
  if (!Number.isInteger(n) || n < 0) throw invalidArgument(`${what} ${n} must be a non-negative integer`);
}

// Bit tricks on the index chains stay exact below 2^31.
const MAX_COMPRESSED_INDEX = 2 ** 30;

function assertCompressedBound(bound: number, what: string): void {
  if (!Number.isInteger(bound) || bound < 0 || bound > MAX_COMPRESSED_INDEX) {
    throw invalidArgument(`${what} ${bound} must be an integer in [0, ${MAX_COMPRESSED_INDEX}]`);
  }
}

/** Point update, range query. */
export class FenwickTree {
  private readonly tree: number[];

  constructor(readonly size: number) {
    assertSize(size, 'size');
    this.tree = Array(size + 1).fill(0);
  }

  /** Builds in linear time by pushing each cell into its parent once. */
  static from(values: ReadonlyArray<number>): FenwickTree {
    const out = new FenwickTree(values.length);
    values.forEach((value, i) => {
      out.tree[i + 1] = value;
    });
    for (let i = 1; i <= values.length; i += 1) {
      const parent = i + lowbit(i);
      if (parent <= values.length) out.tree[parent] += out.tree[i];
    }
    return out;
  }

  add(i: number, x: number): void {
    assertIndex(i, this.size);
    for (let j = i + 1; j <= this.size; j += lowbit(j)) this.tree[j] += x;
  }

  set(i: number, x: number): void {
    this.add(i, x - this.at(i));
  }

  at(i: number): number {
    return this.sum(i, i);
  }

  /** Sum over `[0, i]`; `prefixSum(-1)` is 0. */
  prefixSum(i: number): number {
    if (i !== -1) assertIndex(i, this.size);
    let total = 0;
    for (let j = i + 1; j > 0; j -= lowbit(j)) total += this.tree[j];
    return total;
  }

  sum(lo: number, hi: number): number {
    assertRange(lo, hi, this.size);
    return this.prefixSum(hi) - this.prefixSum(lo - 1);
  }
}

/**
 * Range update, range query from two trees: the prefix sum up to `i`
 * (1-based) is `i * prefix(t1, i) - prefix(t2, i)`.
 */
export class RangeFenwickTree {
  private readonly t1: number[];
  private readonly t2: number[];

  constructor(readonly size: number) {
    assertSize(size, 'size');
    this.t1 = Array(size + 2).fill(0);
    this.t2 = Array(size + 2).fill(0);
  }

  private bump(tree: number[], i: number, x: number): void {
    for (let j = i; j <= this.size + 1; j += lowbit(j)) tree[j] += x;
  }

  private query(tree: ReadonlyArray<number>, i: number): number {
    let total = 0;
    for (let j = i; j > 0; j -= lowbit(j)) total += tree[j];
    return total;
  }

  addRange(lo: number, hi: number, x: number): void {
    assertRange(lo, hi, this.size);
    const l = lo + 1;
    const r = hi + 1;
    this.bump(this.t1, l, x);
    this.bump(this.t1, r + 1, -x);
    this.bump(this.t2, l, x * (l - 1));
    this.bump(this.t2, r + 1, -x * r);
  }

  add(i: number, x: number): void {
    this.addRange(i, i, x);
  }

  set(i: number, x: number): void {
    this.add(i, x - this.at(i));
  }

  at(i: number): number {
    return this.sum(i, i);
  }

  prefixSum(i: number): number {
    if (i !== -1) assertIndex(i, this.size);
    const k = i + 1;
    return k * this.query(this.t1, k) - this.query(this.t2, k);
  }

  sum(lo: number, hi: number): number {
    assertRange(lo, hi, this.size);
    return this.prefixSum(hi) - this.prefixSum(lo - 1);
  }
}

/**
 * Range update, range query over `[0, maxIndex]` with storage proportional
 * to the cells actually touched.
 */
export class CompressedFenwickTree {
  /** Cell `i` holds the `[t1, t2]` pair of {@link RangeFenwickTree}. */
  private readonly cells = new Map<number, [number, number]>();
  readonly maxIndex: number;

  constructor(maxIndex = 1_000_000_000) {
    assertCompressedBound(maxIndex, 'maxIndex');
    this.maxIndex = maxIndex;
  }

  get touched(): number {
    return this.cells.size;
  }

  private bump(i: number, mul: number, add: number): void {
    for (let j = i; j <= this.maxIndex + 2; j += lowbit(j)) {
      const cell = this.cells.get(j);
      if (cell === undefined) {
        this.cells.set(j, [mul, add]);
      } else {
        cell[0] += mul;
        cell[1] += add;
      }
    }
  }

  addRange(lo: number, hi: number, x: number): void {
    assertRange(lo, hi, this.maxIndex + 1);
    const l = lo + 1;
    const r = hi + 1;
    this.bump(l, x, x * (l - 1));
    this.bump(r + 1, -x, -x * r);
  }

  add(i: number, x: number): void {
    this.addRange(i, i, x);
  }

  set(i: number, x: number): void {
    this.add(i, x - this.at(i));
  }

  at(i: number): number {
    return this.sum(i, i);
  }

  prefixSum(i: number): number {
    if (i !== -1) assertIndex(i, this.maxIndex + 1);
    const k = i + 1;
    let mul = 0;
    let add = 0;
    for (let j = k; j > 0; j -= lowbit(j)) {
      const cell = this.cells.get(j);
      if (cell !== undefined) {
        mul += cell[0];
        add += cell[1];
      }
    }
    return k * mul - add;
  }

  sum(lo: number, hi: number): number {
    assertRange(lo, hi, this.maxIndex + 1);
    return this.prefixSum(hi) - this.prefixSum(lo - 1);
  }
}

/** Point update, rectangle query. */
export class FenwickTree2D {
  private readonly tree: number[][];

  constructor(
    readonly rows: number,
    readonly cols: number,
  ) {
    assertSize(rows, 'rows');
    assertSize(cols, 'cols');
    this.tree = Array.from({ length: rows + 1 }, () => Array(cols + 1).fill(0));
  }

  add(r: number, c: number, x: number): void {
    assertIndex(r, this.rows, 'row');
    assertIndex(c, this.cols, 'column');
    for (let i = r + 1; i <= this.rows; i += lowbit(i)) {
      for (let j = c + 1; j <= this.cols; j += lowbit(j)) this.tree[i][j] += x;
    }
  }

  set(r: number, c: number, x: number): void {
    this.add(r, c, x - this.at(r, c));
  }

  at(r: number, c: number): number {
    return this.sum(r, c, r, c);
  }

  /** Sum over the rectangle `[0, r] x [0, c]`; either bound may be -1. */
  prefixSum(r: number, c: number): number {
    if (r !== -1) assertIndex(r, this.rows, 'row');
    if (c !== -1) assertIndex(c, this.cols, 'column');
    let total = 0;
    for (let i = r + 1; i > 0; i -= lowbit(i)) {
      for (let j = c + 1; j > 0; j -= lowbit(j)) total += this.tree[i][j];
    }
    return total;
  }

  sum(r1: number, c1: number, r2: number, c2: number): number {
    assertRange(r1, r2, this.rows, 'row range');
    assertRange(c1, c2, this.cols, 'column range');
    return (
      this.prefixSum(r2, c2) - this.prefixSum(r1 - 1, c2) - this.prefixSum(r2, c1 - 1) + this.prefixSum(r1 - 1, c1 - 1)
    );
  }
}

type Quad = [number, number, number, number];

/**
 * Storage for the four-tree rectangle update scheme. A corner update at
 * `(r, c)` (1-based, exclusive) contributes `s1*r*c + s2*r + s3*c + s4`
 * to every prefix query that covers it.
 */
interface QuadStore {
  bump(r: number, c: number, slot: 0 | 1 | 2 | 3, x: number): void;
  query(r: number, c: number): Quad;
}

class DenseQuadStore implements QuadStore {
  private readonly cells: Quad[][];

  constructor(
    private readonly rowBound: number,
    private readonly colBound: number,
  ) {
    this.cells = Array.from({ length: rowBound + 1 }, () =>
      Array.from({ length: colBound + 1 }, (): Quad => [0, 0, 0, 0]),
    );
  }

  bump(r: number, c: number, slot: 0 | 1 | 2 | 3, x: number): void {
    for (let i = r + 1; i <= this.rowBound; i += lowbit(i)) {
      for (let j = c + 1; j <= this.colBound; j += lowbit(j)) this.cells[i][j][slot] += x;
    }
  }

  query(r: number, c: number): Quad {
    const out: Quad = [0, 0, 0, 0];
    for (let i = r; i > 0; i -= lowbit(i)) {
      for (let j = c; j > 0; j -= lowbit(j)) {
        const cell = this.cells[i][j];
        for (let s = 0; s < 4; s += 1) out[s] += cell[s];
      }
    }
    return out;
  }
}

class SparseQuadStore implements QuadStore {
  readonly cells = new Map<number, Map<number, Quad>>();
  count = 0;

  constructor(
    private readonly rowBound: number,
    private readonly colBound: number,
  ) {}

  bump(r: number, c: number, slot: 0 | 1 | 2 | 3, x: number): void {
    for (let i = r + 1; i <= this.rowBound; i += lowbit(i)) {
      let row = this.cells.get(i);
      if (row === undefined) {
        row = new Map();
        this.cells.set(i, row);
      }
      for (let j = c + 1; j <= this.colBound; j += lowbit(j)) {
        let cell = row.get(j);
        if (cell === undefined) {
          cell = [0, 0, 0, 0];
          row.set(j, cell);
          this.count += 1;
        }
        cell[slot] += x;
      }
    }
  }

  query(r: number, c: number): Quad {
    const out: Quad = [0, 0, 0, 0];
    for (let i = r; i > 0; i -= lowbit(i)) {
      const row = this.cells.get(i);
      if (row === undefined) continue;
      for (let j = c; j > 0; j -= lowbit(j)) {
        const cell = row.get(j);
        if (cell === undefined) continue;
        for (let s = 0; s < 4; s += 1) out[s] += cell[s];
      }
    }
    return out;
  }
}

/** Rectangle update, rectangle query over a `rows x cols` grid. */
abstract class RectangleTree {
  protected constructor(
    readonly rows: number,
    readonly cols: number,
    private readonly store: QuadStore,
  ) {}

  private corner(r: number, c: number, x: number): void {
    const { store } = this;
    store.bump(0, 0, 0, x);
    store.bump(0, c, 0, -x);
    store.bump(0, c, 1, x * c);
    store.bump(r, 0, 0, -x);
    store.bump(r, 0, 2, x * r);
    store.bump(r, c, 0, x);
    store.bump(r, c, 1, -x * c);
    store.bump(r, c, 2, -x * r);
    store.bump(r, c, 3, x * r * c);
  }

  addRange(r1: number, c1: number, r2: number, c2: number, x: number): void {
    assertRange(r1, r2, this.rows, 'row range');
    assertRange(c1, c2, this.cols, 'column range');
    this.corner(r2 + 1, c2 + 1, x);
    this.corner(r1, c2 + 1, -x);
    this.corner(r2 + 1, c1, -x);
    this.corner(r1, c1, x);
  }

  add(r: number, c: number, x: number): void {
    this.addRange(r, c, r, c, x);
  }

  set(r: number, c: number, x: number): void {
    this.add(r, c, x - this.at(r, c));
  }

  at(r: number, c: number): number {
    return this.sum(r, c, r, c);
  }

  prefixSum(r: number, c: number): number {
    if (r !== -1) assertIndex(r, this.rows, 'row');
    if (c !== -1) assertIndex(c, this.cols, 'column');
    const rr = r + 1;
    const cc = c + 1;
    const [s1, s2, s3, s4] = this.store.query(rr, cc);
    return s1 * rr * cc + s2 * rr + s3 * cc + s4;
  }

  sum(r1: number, c1: number, r2: number, c2: number): number {
    assertRange(r1, r2, this.rows, 'row range');
    assertRange(c1, c2, this.cols, 'column range');
    return (
      this.prefixSum(r2, c2) + this.prefixSum(r1 - 1, c1 - 1) - this.prefixSum(r1 - 1, c2) - this.prefixSum(r2, c1 - 1)
    );
  }
}

export class RangeFenwickTree2D extends RectangleTree {
  constructor(rows: number, cols: number) {
    assertSize(rows, 'rows');
    assertSize(cols, 'cols');
    super(rows, cols, new DenseQuadStore(rows + 1, cols + 1));
  }
}

/**
 * {@link RangeFenwickTree2D} over `[0, maxRow] x [0, maxCol]` backed by nested
 * maps. Prefix sums multiply stored values by both coordinates, so results are
 * exact only while `|x| * maxRow * maxCol` stays below 2^53.
 */
export class CompressedFenwickTree2D extends RectangleTree {
  private readonly sparse: SparseQuadStore;

  constructor(maxRow = 1_000_000_000, maxCol = 1_000_000_000) {
    assertCompressedBound(maxRow, 'maxRow');
    assertCompressedBound(maxCol, 'maxCol');
    const sparse = new SparseQuadStore(maxRow + 2, maxCol + 2);
    super(maxRow + 1, maxCol + 1, sparse);
    this.sparse = sparse;
  }

  get touched(): number {
    return this.sparse.count;
  }
}
