import { doesNotConverge, invalidArgument } from '../errors';
import { cabs, cadd, complex, cdiv, cmul, cscale, csqrt, csub, type Complex } from './complex';
import { createRandom, type RandomSource } from './random';

/** Complex polynomial, coefficient of `x^i` at index `i`. */
export type ComplexPolynomial = ReadonlyArray<Complex>;

export type LaguerreOptions = {
  /** Absolute tolerance on `|p(x)|` and on the step size. Default 1e-15. */
  eps?: number;
  maxIterations?: number;
  /** Source of starting points. Default: a fixed-seed stream. */
  random?: RandomSource;
};

const ZERO = complex(0);

/**
 * Evaluates `p(x)` and returns the quotient of `p` by `(x - root)` alongside,
 * which is the deflated polynomial when `x` is a root.
 */
export function hornerEval(p: ComplexPolynomial, x: Complex): { value: Complex; quotient: Complex[] } {
  const n = p.length;
  if (n === 0) return { value: ZERO, quotient: [ZERO] };
  const quotient: Complex[] = Array(Math.max(1, n - 1)).fill(ZERO);
  for (let i = n - 1; i > 0; i -= 1) {
    quotient[i - 1] = i < n - 1 ? cadd(p[i], cmul(quotient[i], x)) : p[i];
  }
  return { value: n === 1 ? p[0] : cadd(p[0], cmul(quotient[0], x)), quotient };
}

export function derivative(p: ComplexPolynomial): Complex[] {
  const out: Complex[] = Array(Math.max(1, p.length - 1)).fill(ZERO);
  for (let i = 1; i < p.length; i += 1) out[i - 1] = cscale(p[i], i);
  return out;
}

function magnitude(p: ComplexPolynomial, x: Complex): number {
  const r = cabs(x);
  let total = 0;
  for (let i = p.length - 1; i >= 0; i -= 1) total = total * r + cabs(p[i]);
  return total;
}

/** Laguerre iteration from `x0` towards a single root of `p`. */
export function findOneRoot(p: ComplexPolynomial, x0: Complex, options: LaguerreOptions = {}): Complex {
  const eps = options.eps ?? 1e-15;
  const maxIterations = options.maxIterations ?? 10000;
  const n = p.length - 1;
  if (n < 1) throw invalidArgument('polynomial must have degree at least 1');
  const p1 = derivative(p);
  const p2 = derivative(p1);

  let x = x0;
  for (let i = 0; i < maxIterations; i += 1) {
    const y = hornerEval(p, x).value;
    if (cabs(y) <= eps) return x;
    const g = cdiv(hornerEval(p1, x).value, y);
    const h = csub(cmul(g, g), cdiv(hornerEval(p2, x).value, y));
    const r = csqrt(cscale(csub(cscale(h, n), cmul(g, g)), n - 1));
    const d1 = cadd(g, r);
    const d2 = csub(g, r);
    const a = cdiv(complex(n), cabs(d1) - cabs(d2) > eps ? d1 : d2);
    const next = csub(x, a);
    if (cabs(a) <= eps || (next.re === x.re && next.im === x.im)) return next;
    x = next;
  }

  // Rounding can keep the iterate bouncing between neighbours of a root; accept
  // it when the residual is at the noise floor of the evaluation.
  const residual = cabs(hornerEval(p, x).value);
  if (Number.isFinite(residual) && residual <= 1e-9 * Math.max(1, magnitude(p, x))) return x;
  throw doesNotConverge(`Laguerre iteration stalled at ${x.re}${x.im < 0 ? '-' : '+'}${Math.abs(x.im)}i`);
}

/**
 * All roots of `p`: each one is found on the deflated polynomial, polished
 * against the original, then divided out.
 */
export function findAllRootsComplex(p: ComplexPolynomial, options: LaguerreOptions = {}): Complex[] {
  if (p.length < 2 || cabs(p[p.length - 1]) === 0) {
    throw invalidArgument('polynomial must have degree at least 1 and a non-zero leading coefficient');
  }
  const random = options.random ?? createRandom(1);
  const roots: Complex[] = [];
  let q: Complex[] = [...p];
  while (q.length > 2) {
    const start = complex(random(), random());
    const z = findOneRoot(p, findOneRoot(q, start, options), options);
    q = hornerEval(q, z).quotient;
    roots.push(z);
  }
  roots.push(cdiv(cscale(q[0], -1), q[1]));
  return roots;
}
