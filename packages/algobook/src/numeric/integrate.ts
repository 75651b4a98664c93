import { invalidArgument } from '../errors';

export type IntegrateOptions = {
  /** Absolute tolerance per interval. Default 1e-10. */
  eps?: number;
  /** Recursion cap. Default `ceil(log2((b - a) / eps))`, at most 64. */
  maxDepth?: number;
};

/** Simpson's three-point estimate of the integral of `f` over `[a, b]`. */
export function simpson(f: (x: number) => number, a: number, b: number): number {
  return ((b - a) / 6) * (f(a) + 4 * f((a + b) / 2) + f(b));
}

/**
 * Adaptive Simpson quadrature. Each interval compares the sum of its two
 * halves against its own estimate and splits further until they agree
 * within `eps` or the depth cap is reached.
 */
export function integrate(
  f: (x: number) => number,
  a: number,
  b: number,
  options: IntegrateOptions = {},
): number {
  if (!Number.isFinite(a) || !Number.isFinite(b)) throw invalidArgument('integration bounds must be finite');
  const eps = options.eps ?? 1e-10;
  if (!(eps > 0)) throw invalidArgument(`eps ${eps} must be positive`);
  if (a === b) return 0;
  const maxDepth = options.maxDepth ?? Math.min(64, Math.max(1, Math.ceil(Math.log2(Math.abs(b - a) / eps))));

  const adapt = (lo: number, hi: number, whole: number, depth: number): number => {
    const mid = (lo + hi) / 2;
    const left = simpson(f, lo, mid);
    const right = simpson(f, mid, hi);
    if (depth >= maxDepth || Math.abs(left + right - whole) < eps) return left + right;
    return adapt(lo, mid, left, depth + 1) + adapt(mid, hi, right, depth + 1);
  };
  return adapt(a, b, simpson(f, a, b), 0);
}
