import { invalidArgument, overflow } from '../errors';
import { gcd, isPrime, mulmod, WORD_LIMIT } from './modular';
import { createRandom, randomBigInt, type RandomSource } from './random';

export type FactorizeOptions = {
  /** Primes up to this bound are found by trial division. Default 1e6. */
  trialDivisionCutoff?: number;
  /** Seeds Pollard rho. Default: a fixed-seed stream. */
  random?: RandomSource;
};

function checkInput(n: bigint): void {
  if (n < 1n) throw invalidArgument(`${n} must be a positive integer`);
  if (n >= WORD_LIMIT) throw overflow(`${n} does not fit below 2^63`);
}

const absDiff = (a: bigint, b: bigint) => (a > b ? a - b : b - a);

/**
 * Brent's variant of Pollard rho: returns a non-trivial factor of the
 * composite `n`, or `n` itself when the chosen sequence fails (retry with
 * fresh randomness).
 */
export function pollardRhoBrent(n: bigint, random: RandomSource = createRandom(1)): bigint {
  checkInput(n);
  if (n < 4n || isPrime(n)) throw invalidArgument(`${n} is not composite`);
  if (n % 2n === 0n) return 2n;

  const step = (v: bigint, c: bigint) => (mulmod(v, v, n) + c) % n;
  let y = randomBigInt(random, n - 1n) + 1n;
  const c = randomBigInt(random, n - 1n) + 1n;
  const batch = Number(randomBigInt(random, n - 1n) + 1n);
  let g = 1n;
  let q = 1n;
  let x = 0n;
  let ys = 0n;

  for (let r = 1; g === 1n; r *= 2) {
    x = y;
    for (let i = 0; i < r; i += 1) y = step(y, c);
    for (let k = 0; k < r && g === 1n; k += batch) {
      ys = y;
      const limit = Math.min(batch, r - k);
      for (let j = 0; j < limit; j += 1) {
        y = step(y, c);
        q = mulmod(q, absDiff(x, y), n);
      }
      g = gcd(q, n);
    }
  }
  if (g === n) {
    // The batched product overshot; replay one step at a time from the last checkpoint.
    do {
      ys = step(ys, c);
      g = gcd(absDiff(x, ys), n);
    } while (g <= 1n);
  }
  return g;
}

/** Plain trial division; fine up to roughly 10^12. */
export function trialFactorize(n: bigint): bigint[] {
  checkInput(n);
  if (n <= 3n) return [n];
  const out: bigint[] = [];
  let rest = n;
  for (let i = 2n; i * i <= rest; i += 1n) {
    while (rest % i === 0n) {
      out.push(i);
      rest /= i;
    }
  }
  if (rest > 1n) out.push(rest);
  return out;
}

/**
 * Prime factors of `n` with multiplicity, ascending: trial division over a
 * 6k±1 wheel up to the cutoff, then Miller–Rabin and Pollard rho on what
 * remains. Returns `[1n]` for 1.
 */
export function primeFactorize(n: bigint, options: FactorizeOptions = {}): bigint[] {
  checkInput(n);
  if (n <= 3n) return [n];
  const limit = options.trialDivisionCutoff ?? 1_000_000;
  if (!Number.isFinite(limit) || limit < 0) {
    throw invalidArgument(`trial division cutoff ${limit} must be a finite non-negative number`);
  }
  const cutoff = BigInt(Math.floor(limit));
  const random = options.random ?? createRandom(1);

  const out: bigint[] = [];
  let rest = n;
  for (const p of [2n, 3n]) {
    while (rest % p === 0n) {
      out.push(p);
      rest /= p;
    }
  }
  for (let i = 5n, w = 2n; i <= cutoff && i * i <= rest; i += w, w = 6n - w) {
    while (rest % i === 0n) {
      out.push(i);
      rest /= i;
    }
  }

  const split = (m: bigint): void => {
    if (m === 1n) return;
    if (isPrime(m)) {
      out.push(m);
      return;
    }
    let p = m;
    while (p === m) p = pollardRhoBrent(m, random);
    split(p);
    split(m / p);
  };
  if (rest > 1n) {
    if (rest <= cutoff * cutoff) out.push(rest);
    else split(rest);
  }
  return out.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/** Every positive divisor of `n`, ascending; empty for `n < 1`. */
export function divisors(n: bigint): bigint[] {
  if (n < 1n) return [];
  const low: bigint[] = [];
  const high: bigint[] = [];
  for (let i = 1n; i * i <= n; i += 1n) {
    if (n % i === 0n) {
      low.push(i);
      if (i * i !== n) high.push(n / i);
    }
  }
  return [...low, ...high.reverse()];
}

/**
 * Fermat's difference-of-squares search for a factor of `n`; quick when `n`
 * has two factors near its square root. Returns 2 for even `n` and 1 when
 * `n` is an odd prime.
 */
export function fermat(n: bigint): bigint {
  checkInput(n);
  if (n % 2n === 0n) return 2n;
  let x = isqrt(n);
  let y = 0n;
  let r = x * x - n;
  while (r !== 0n) {
    if (r < 0n) {
      r += x + x + 1n;
      x += 1n;
    } else {
      r -= y + y + 1n;
      y += 1n;
    }
  }
  return x - y;
}

/** Floor of the square root by Newton's method. */
export function isqrt(n: bigint): bigint {
  if (n < 0n) throw invalidArgument(`${n} has no real square root`);
  if (n < 2n) return n;
  let x = BigInt(Math.floor(Math.sqrt(Number(n))));
  while (x * x > n) x -= 1n;
  while ((x + 1n) * (x + 1n) <= n) x += 1n;
  return x;
}

/** Euler's phi by trial division. */
export function totient(n: number): number {
  if (!Number.isSafeInteger(n) || n < 1) throw invalidArgument(`${n} must be a positive integer`);
  let rest = n;
  let out = n;
  for (let i = 2; i * i <= rest; i += 1) {
    if (rest % i === 0) {
      while (rest % i === 0) rest /= i;
      out -= out / i;
    }
  }
  if (rest > 1) out -= out / rest;
  return out;
}

/** `phi(0..n)` by subtracting each value from its proper multiples. */
export function totientTable(n: number): number[] {
  if (!Number.isSafeInteger(n) || n < 0) throw invalidArgument(`${n} must be a non-negative integer`);
  const phi = Array.from({ length: n + 1 }, (_, i) => i);
  for (let i = 1; i <= n; i += 1) {
    for (let j = 2 * i; j <= n; j += i) phi[j] -= phi[i];
  }
  return phi;
}
