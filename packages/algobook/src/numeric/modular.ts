import { invalidArgument, overflow } from '../errors';

/** Exclusive upper bound on every operand of the 64-bit routines. */
export const WORD_LIMIT = 1n << 63n;

function checkOperand(x: bigint, what: string): void {
  if (x < 0n) throw invalidArgument(`${what} ${x} must be non-negative`);
  if (x >= WORD_LIMIT) throw overflow(`${what} ${x} does not fit below 2^63`);
}

function checkModulus(m: bigint): void {
  if (m <= 0n) throw invalidArgument(`modulus ${m} must be positive`);
  if (m >= WORD_LIMIT) throw overflow(`modulus ${m} does not fit below 2^63`);
}

// Operands are already validated; every intermediate stays below 2^64.
function mulmodUnchecked(a: bigint, b: bigint, m: bigint): bigint {
  let acc = 0n;
  let x = a % m;
  for (let n = b; n > 0n; n >>= 1n) {
    if (n & 1n) acc = (acc + x) % m;
    x = (x << 1n) % m;
  }
  return acc % m;
}

function powmodUnchecked(base: bigint, exp: bigint, m: bigint): bigint {
  let acc = 1n % m;
  let x = base % m;
  for (let n = exp; n > 0n; n >>= 1n) {
    if (n & 1n) acc = mulmodUnchecked(acc, x, m);
    x = mulmodUnchecked(x, x, m);
  }
  return acc;
}

/** `(a * b) mod m` by doubling and adding over the bits of `b`. */
export function mulmod(a: bigint, b: bigint, m: bigint): bigint {
  checkOperand(a, 'a');
  checkOperand(b, 'b');
  checkModulus(m);
  return mulmodUnchecked(a, b, m);
}

export function powmod(base: bigint, exp: bigint, m: bigint): bigint {
  checkOperand(base, 'base');
  checkOperand(exp, 'exponent');
  checkModulus(m);
  return powmodUnchecked(base, exp, m);
}

const abs = (x: bigint) => (x < 0n ? -x : x);

export function gcd(a: bigint, b: bigint): bigint {
  let x = abs(a);
  let y = abs(b);
  while (y !== 0n) [x, y] = [y, x % y];
  return x;
}

/** Bezout coefficients: `a * x + b * y = g` with `g = gcd(a, b)`. */
export function extendedGcd(a: bigint, b: bigint): { g: bigint; x: bigint; y: bigint } {
  let [oldR, r] = [a, b];
  let [oldS, s] = [1n, 0n];
  let [oldT, t] = [0n, 1n];
  while (r !== 0n) {
    const q = oldR / r;
    [oldR, r] = [r, oldR - q * r];
    [oldS, s] = [s, oldS - q * s];
    [oldT, t] = [t, oldT - q * t];
  }
  return oldR < 0n ? { g: -oldR, x: -oldS, y: -oldT } : { g: oldR, x: oldS, y: oldT };
}

export function modInverse(a: bigint, m: bigint): bigint {
  checkModulus(m);
  const { g, x } = extendedGcd(((a % m) + m) % m, m);
  if (g !== 1n) throw invalidArgument(`${a} has no inverse modulo ${m}`);
  return ((x % m) + m) % m;
}

const WITNESSES = [2n, 3n, 5n, 7n, 11n, 13n, 17n, 19n, 23n, 29n, 31n, 37n];

/** Deterministic Miller–Rabin for every `n < 2^63`. */
export function isPrime(n: bigint): boolean {
  if (n >= WORD_LIMIT) throw overflow(`${n} does not fit below 2^63`);
  if (n < 2n) return false;
  for (const p of WITNESSES) {
    if (n % p === 0n) return n === p;
  }
  let d = n - 1n;
  let s = 0;
  while ((d & 1n) === 0n) {
    d >>= 1n;
    s += 1;
  }
  for (const a of WITNESSES) {
    let x = powmodUnchecked(a, d, n);
    if (x === 1n || x === n - 1n) continue;
    let witnessed = true;
    for (let j = 1; j < s && witnessed; j += 1) {
      x = mulmodUnchecked(x, x, n);
      if (x === n - 1n) witnessed = false;
    }
    if (witnessed) return false;
  }
  return true;
}
