import { doesNotConverge, invalidArgument } from '../errors';
import { cadd, complex, cmul, type Complex } from './complex';

const EPS = Number.EPSILON;
const MIN_NORMAL = 2.2250738585072014e-308;
const MAX = Number.MAX_VALUE;
const DEG = Math.PI / 180;
const ROTATE_COS = Math.cos(94 * DEG);
const ROTATE_SIN = Math.sin(94 * DEG);

type QuadraticRoots = { sr: number; si: number; lr: number; li: number };

/**
 * Roots of `a x^2 + b1 x + c`: a small one `(sr, si)` and a large one
 * `(lr, li)`, written to avoid cancellation.
 */
function solveQuadratic(a: number, b1: number, c: number): QuadraticRoots {
  const out = { sr: 0, si: 0, lr: 0, li: 0 };
  if (a === 0) {
    if (b1 !== 0) out.sr = -c / b1;
    return out;
  }
  if (c === 0) {
    out.lr = -b1 / a;
    return out;
  }
  const b = b1 / 2;
  let d: number;
  let e: number;
  if (Math.abs(b) < Math.abs(c)) {
    e = c >= 0 ? a : -a;
    e = b * (b / Math.abs(c)) - e;
    d = Math.sqrt(Math.abs(e)) * Math.sqrt(Math.abs(c));
  } else {
    e = 1 - (a / b) * (c / b);
    d = Math.sqrt(Math.abs(e)) * Math.abs(b);
  }
  if (e >= 0) {
    if (b >= 0) d = -d;
    out.lr = (d - b) / a;
    if (out.lr !== 0) out.sr = c / out.lr / a;
  } else {
    out.lr = -b / a;
    out.sr = out.lr;
    out.si = Math.abs(d / a);
    out.li = -out.si;
  }
  return out;
}

/**
 * State of one Jenkins–Traub run. `p` holds the current (deflated)
 * polynomial in descending order, `k` the shift polynomial, and the scalar
 * fields carry the recurrence coefficients between the stages.
 */
class JenkinsTraub {
  private readonly p: number[];
  private readonly qp: number[];
  private readonly k: number[];
  private readonly qk: number[];
  private readonly svk: number[];
  /** Degree of the current polynomial; `nn = n + 1` coefficients. */
  private n: number;
  private nn: number;

  private a = 0;
  private b = 0;
  private c = 0;
  private d = 0;
  private e = 0;
  private f = 0;
  private g = 0;
  private h = 0;
  private a1 = 0;
  private a3 = 0;
  private a7 = 0;

  private szr = 0;
  private szi = 0;
  private lzr = 0;
  private lzi = 0;

  constructor(descending: ReadonlyArray<number>) {
    this.p = [...descending];
    this.nn = descending.length;
    this.n = this.nn - 1;
    this.qp = Array(this.nn).fill(0);
    this.k = Array(this.nn).fill(0);
    this.qk = Array(this.nn).fill(0);
    this.svk = Array(this.nn).fill(0);
  }

  /**
   * Divides `src[0..len)` by `x^2 + u x + v` into `dst`; returns the last two
   * quotient entries `[last, secondLast]`, which encode the remainder.
   */
  private divideQuadratic(len: number, u: number, v: number, src: number[], dst: number[]): [number, number] {
    let b = src[0];
    let a = -(b * u) + src[1];
    dst[0] = b;
    dst[1] = a;
    for (let i = 2; i < len; i += 1) {
      dst[i] = -(a * u + b * v) + src[i];
      b = a;
      a = dst[i];
    }
    return [a, b];
  }

  /** Picks the recurrence form for the next K polynomial: 3 when K divides evenly. */
  private shiftType(u: number, v: number): 1 | 2 | 3 {
    const { n, k, a, b } = this;
    [this.c, this.d] = this.divideQuadratic(n, u, v, k, this.qk);
    const { c, d } = this;
    if (Math.abs(c) <= 100 * EPS * Math.abs(k[n - 1]) && Math.abs(d) <= 100 * EPS * Math.abs(k[n - 2])) {
      return 3;
    }
    this.h = v * b;
    if (Math.abs(d) >= Math.abs(c)) {
      this.e = a / d;
      this.f = c / d;
      this.g = u * b;
      this.a1 = this.f * b - a;
      this.a3 = this.e * (this.g + a) + this.h * (b / d);
      this.a7 = this.h + (this.f + u) * a;
      return 2;
    }
    this.e = a / c;
    this.f = d / c;
    this.g = this.e * u;
    this.a1 = -(a * (d / c)) + b;
    this.a3 = this.e * a + (this.g + this.h / c) * b;
    this.a7 = this.g * d + this.h * this.f + a;
    return 1;
  }

  private nextK(type: 1 | 2 | 3): void {
    const { n, k, qk, qp, a, b, a1 } = this;
    if (type === 3) {
      k[0] = 0;
      k[1] = 0;
      for (let i = 2; i < n; i += 1) k[i] = qk[i - 2];
      return;
    }
    if (Math.abs(a1) > 10 * EPS * Math.abs(type === 1 ? b : a)) {
      this.a7 /= a1;
      this.a3 /= a1;
      k[0] = qp[0];
      k[1] = qp[1] - this.a7 * qp[0];
      for (let i = 2; i < n; i += 1) k[i] = qp[i] - this.a7 * qp[i - 1] + this.a3 * qk[i - 2];
    } else {
      k[0] = 0;
      k[1] = -this.a7 * qp[0];
      for (let i = 2; i < n; i += 1) k[i] = this.a3 * qk[i - 2] - this.a7 * qp[i - 1];
    }
  }

  /** New quadratic factor estimate `[u, v]`; `[0, 0]` when none can be formed. */
  private estimateFactor(type: 1 | 2 | 3, u: number, v: number): [number, number] {
    if (type === 3) return [0, 0];
    const { n, k, p, a, b, c, d, f, g, h, a1, a3, a7 } = this;
    const a4 = type !== 2 ? a + u * b + h * f : (a + g) * f + h;
    const a5 = type !== 2 ? c + (u + v * f) * d : (f + u) * c + v * d;
    const b1 = -k[n - 1] / p[n];
    const b2 = -(k[n - 2] + b1 * p[n - 1]) / p[n];
    const c1 = v * b2 * a1;
    const c2 = b1 * a7;
    const c3 = b1 * b1 * a3;
    const c4 = c1 - c2 - c3;
    const temp = b1 * a4 - c4 + a5;
    if (temp === 0) return [0, 0];
    return [u - (u * (c3 + c2) + v * (b1 * a1 + b2 * a7)) / temp, v * (1 + c4 / temp)];
  }

  private setRoots(roots: QuadraticRoots): void {
    this.szr = roots.sr;
    this.szi = roots.si;
    this.lzr = roots.lr;
    this.lzi = roots.li;
  }

  /** Stage three for a quadratic factor; returns the number of roots found (0 or 2). */
  private quadraticIterate(uu: number, vv: number): number {
    const { n, nn, p, qp } = this;
    let steps = 0;
    let tried = false;
    let omp = 0;
    let relstp = 0;
    let u = uu;
    let v = vv;
    let vi = 0;
    do {
      this.setRoots(solveQuadratic(1, u, v));
      // Roots of very different modulus mean the factor is not converging.
      if (Math.abs(Math.abs(this.szr) - Math.abs(this.lzr)) > 0.01 * Math.abs(this.lzr)) break;
      [this.a, this.b] = this.divideQuadratic(nn, u, v, p, qp);
      const { a, b } = this;
      const mp = Math.abs(-(this.szr * b) + a) + Math.abs(this.szi * b);
      const zm = Math.sqrt(Math.abs(v));
      const t = -this.szr * b;
      let ee = 2 * Math.abs(qp[0]);
      for (let i = 1; i < n; i += 1) ee = ee * zm + Math.abs(qp[i]);
      ee = ee * zm + Math.abs(a + t);
      ee = (ee * 9 + 2 * Math.abs(t) - 7 * (Math.abs(a + t) + zm * Math.abs(b))) * EPS;
      if (mp <= 20 * ee) return 2;
      steps += 1;
      if (steps > 20) break;
      if (steps >= 2 && relstp <= 0.01 && mp >= omp && !tried) {
        // Stalled: nudge the factor and run a few fixed-shift steps before retrying.
        relstp = relstp < EPS ? Math.sqrt(EPS) : Math.sqrt(relstp);
        u -= u * relstp;
        v += v * relstp;
        [this.a, this.b] = this.divideQuadratic(nn, u, v, p, qp);
        for (let i = 0; i < 5; i += 1) this.nextK(this.shiftType(u, v));
        tried = true;
        steps = 0;
      }
      omp = mp;
      this.nextK(this.shiftType(u, v));
      const [ui, next] = this.estimateFactor(this.shiftType(u, v), u, v);
      vi = next;
      if (vi !== 0) {
        relstp = Math.abs((vi - v) / vi);
        u = ui;
        v = vi;
      }
    } while (vi !== 0);
    return 0;
  }

  /**
   * Stage three for a real root, starting at `start`. `weak` reports a
   * stalled iterate that suggests a cluster of roots near `s`.
   */
  private realIterate(start: number): { found: boolean; weak: boolean; s: number } {
    const { n, nn, p, qp, k, qk } = this;
    let steps = 0;
    let omp = 0;
    let t = 0;
    for (let s = start; ; s += t) {
      let pv = p[0];
      qp[0] = pv;
      for (let i = 1; i < nn; i += 1) {
        pv = pv * s + p[i];
        qp[i] = pv;
      }
      const mp = Math.abs(pv);
      const ms = Math.abs(s);
      let ee = 0.5 * Math.abs(qp[0]);
      for (let i = 1; i < nn; i += 1) ee = ee * ms + Math.abs(qp[i]);
      if (mp <= 20 * EPS * (2 * ee - mp)) {
        this.szr = s;
        this.szi = 0;
        return { found: true, weak: false, s };
      }
      steps += 1;
      if (steps > 10) return { found: false, weak: false, s: start };
      if (steps >= 2 && Math.abs(t) <= 0.001 * Math.abs(s - t) && mp > omp) {
        return { found: false, weak: true, s };
      }
      omp = mp;

      let kv = k[0];
      qk[0] = kv;
      for (let i = 1; i < n; i += 1) {
        kv = kv * s + k[i];
        qk[i] = kv;
      }
      if (Math.abs(kv) > Math.abs(k[n - 1]) * 10 * EPS) {
        const tt = -pv / kv;
        k[0] = qp[0];
        for (let i = 1; i < n; i += 1) k[i] = tt * qk[i - 1] + qp[i];
      } else {
        k[0] = 0;
        for (let i = 1; i < n; i += 1) k[i] = qk[i - 1];
      }
      kv = k[0];
      for (let i = 1; i < n; i += 1) kv = kv * s + k[i];
      t = Math.abs(k[n - 1]) * 10 * EPS < Math.abs(kv) ? -pv / kv : 0;
    }
  }

  private saveK(): void {
    for (let i = 0; i < this.n; i += 1) this.svk[i] = this.k[i];
  }

  private restoreK(): void {
    for (let i = 0; i < this.n; i += 1) this.k[i] = this.svk[i];
  }

  /**
   * Stage two: up to `steps` fixed-shift iterations with shift `sr` and
   * quadratic `x^2 + u x + v`, handing over to stage three once the real or
   * quadratic estimates settle. Returns the number of roots found.
   */
  private fixedShift(steps: number, sr: number, v: number, u: number): number {
    const { n, nn, p, k } = this;
    let betav = 0.25;
    let betas = 0.25;
    let oss = sr;
    let ovv = v;
    let ots = 0;
    let otv = 0;

    [this.a, this.b] = this.divideQuadratic(nn, u, v, p, this.qp);
    let type = this.shiftType(u, v);
    for (let j = 0; j < steps; j += 1) {
      this.nextK(type);
      type = this.shiftType(u, v);
      let [ui, vi] = this.estimateFactor(type, u, v);
      const vv = vi;
      const ss = k[n - 1] !== 0 ? -p[n] / k[n - 1] : 0;
      let tv = 1;
      let ts = 1;
      if (j !== 0 && type !== 3) {
        if (vv !== 0) tv = Math.abs((vv - ovv) / vv);
        if (ss !== 0) ts = Math.abs((ss - oss) / ss);
        const tvv = tv < otv ? tv * otv : 1;
        const tss = ts < ots ? ts * ots : 1;
        const vpass = tvv < betav;
        const spass = tss < betas;
        if (spass || vpass) {
          this.saveK();
          let s = ss;
          let stry = false;
          let vtry = false;
          let stage: 'quadratic' | 'real' | 'restore' = spass && (!vpass || tss < tvv) ? 'real' : 'quadratic';
          for (;;) {
            if (stage === 'quadratic') {
              const nz = this.quadraticIterate(ui, vi);
              if (nz > 0) return nz;
              vtry = true;
              betav *= 0.25;
              if (!stry && spass) {
                this.restoreK();
                stage = 'real';
              } else {
                stage = 'restore';
              }
            }
            if (stage === 'real') {
              const real = this.realIterate(s);
              if (real.found) return 1;
              stry = true;
              betas *= 0.25;
              if (real.weak) {
                s = real.s;
                ui = -(s + s);
                vi = s * s;
                stage = 'quadratic';
                continue;
              }
            }
            this.restoreK();
            if (vpass && !vtry) {
              stage = 'quadratic';
              continue;
            }
            break;
          }
          [this.a, this.b] = this.divideQuadratic(nn, u, v, p, this.qp);
          type = this.shiftType(u, v);
        }
      }
      ovv = vv;
      oss = ss;
      otv = tv;
      ots = ts;
    }
    return 0;
  }

  /** Cauchy lower bound on the moduli of the roots of the current polynomial. */
  private rootBound(): number {
    const { n, nn, p } = this;
    const pt = p.slice(0, nn).map(Math.abs);
    pt[n] = -pt[n];
    let x = Math.exp((Math.log(-pt[n]) - Math.log(pt[0])) / n);
    if (pt[n - 1] !== 0) x = Math.min(x, -pt[n] / pt[n - 1]);

    let xm = x;
    let ff: number;
    do {
      x = xm;
      xm = 0.1 * x;
      ff = pt[0];
      for (let i = 1; i < nn; i += 1) ff = ff * xm + pt[i];
    } while (ff > 0);

    let dx: number;
    do {
      ff = pt[0];
      let df = ff;
      for (let i = 1; i < n; i += 1) {
        ff = x * ff + pt[i];
        df = x * df + ff;
      }
      ff = x * ff + pt[n];
      dx = ff / df;
      x -= dx;
    } while (Math.abs(dx / x) > 0.005);
    return x;
  }

  /** Rescales by a power of two so the coefficients stay clear of underflow and overflow. */
  private rescale(): void {
    const { nn, p } = this;
    let maxModulus = 0;
    let minModulus = MAX;
    for (let i = 0; i < nn; i += 1) {
      const x = Math.abs(p[i]);
      if (x > maxModulus) maxModulus = x;
      if (x !== 0 && x < minModulus) minModulus = x;
    }
    let sc = MIN_NORMAL / EPS / minModulus;
    if ((sc < 2 && maxModulus >= 10) || (sc > 1 && MAX / sc >= maxModulus)) {
      if (sc === 0) sc = MIN_NORMAL;
      const factor = 2 ** Math.round(Math.log2(sc));
      if (factor !== 1) for (let i = 0; i < nn; i += 1) p[i] *= factor;
    }
  }

  /** Stage one: five unshifted iterations starting from the scaled derivative. */
  private noShift(): void {
    const { n, p, k } = this;
    const nm1 = n - 1;
    for (let i = 1; i < n; i += 1) k[i] = ((n - i) * p[i]) / n;
    k[0] = p[0];
    const aa = p[n];
    const bb = p[nm1];
    let zero = k[nm1] === 0;
    for (let step = 0; step < 5; step += 1) {
      const cc = k[nm1];
      if (zero) {
        for (let j = nm1; j > 0; j -= 1) k[j] = k[j - 1];
        k[0] = 0;
        zero = k[nm1] === 0;
      } else {
        const t = -aa / cc;
        for (let j = nm1; j > 0; j -= 1) k[j] = t * k[j - 1] + p[j];
        k[0] = p[0];
        zero = Math.abs(k[nm1]) <= Math.abs(bb) * EPS * 10;
      }
    }
  }

  solve(): Complex[] {
    const roots: Complex[] = [];
    let xx = Math.SQRT1_2;
    let yy = -xx;
    while (this.n >= 1) {
      const { n, p } = this;
      if (n === 1) {
        roots.push(complex(-p[1] / p[0]));
        break;
      }
      if (n === 2) {
        const q = solveQuadratic(p[0], p[1], p[2]);
        roots.push(complex(q.sr, q.si), complex(q.lr, q.li));
        break;
      }

      this.rescale();
      const bnd = this.rootBound();
      this.noShift();
      const saved = this.k.slice(0, n);

      let found = 0;
      for (let attempt = 1; attempt <= 20 && found === 0; attempt += 1) {
        // Rotate the shift by 94 degrees so successive attempts probe new directions.
        const next = -ROTATE_SIN * yy + ROTATE_COS * xx;
        yy = ROTATE_SIN * xx + ROTATE_COS * yy;
        xx = next;
        const sr = bnd * xx;
        this.qk.fill(0);
        this.svk.fill(0);
        found = this.fixedShift(20 * attempt, sr, bnd, -2 * sr);
        if (found === 0) for (let i = 0; i < n; i += 1) this.k[i] = saved[i];
      }
      if (found === 0) throw doesNotConverge(`no root found after 20 shifts at degree ${n}`);

      roots.push(complex(this.szr, this.szi));
      if (found === 2) roots.push(complex(this.lzr, this.lzi));
      this.nn -= found;
      this.n = this.nn - 1;
      for (let i = 0; i < this.nn; i += 1) this.p[i] = this.qp[i];
    }
    return roots;
  }
}

/**
 * All roots of a real polynomial by the Jenkins–Traub three-stage method.
 * `coefficients[i]` multiplies `x^i`; roots at the origin come first.
 */
export function findAllRoots(coefficients: ReadonlyArray<number>): Complex[] {
  if (coefficients.length === 0) throw invalidArgument('polynomial has no coefficients');
  if (coefficients.some((c) => !Number.isFinite(c))) throw invalidArgument('coefficients must be finite');
  if (coefficients[coefficients.length - 1] === 0) throw invalidArgument('leading coefficient is zero');

  const roots: Complex[] = [];
  let low = 0;
  while (low < coefficients.length - 1 && coefficients[low] === 0) {
    roots.push(complex(0));
    low += 1;
  }
  const descending = coefficients.slice(low).reverse();
  if (descending.length > 1) roots.push(...new JenkinsTraub(descending).solve());
  return roots;
}

/** Horner evaluation of a real polynomial at a complex point. */
export function evaluatePolynomial(coefficients: ReadonlyArray<number>, x: Complex): Complex {
  let acc = complex(0);
  for (let i = coefficients.length - 1; i >= 0; i -= 1) acc = cadd(cmul(acc, x), complex(coefficients[i]));
  return acc;
}

/** Ascending coefficients of `lead * prod (x - r)`. */
export function polynomialFromRoots(roots: ReadonlyArray<number>, lead = 1): number[] {
  let out = [lead];
  for (const r of roots) {
    const next: number[] = Array(out.length + 1).fill(0);
    out.forEach((c, i) => {
      next[i + 1] += c;
      next[i] -= c * r;
    });
    out = next;
  }
  return out;
}
