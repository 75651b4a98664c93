import { describe, expect, it } from 'vitest';

import { isAlgorithmError } from '../src/errors';
import {
  createRandom,
  divisors,
  extendedGcd,
  fermat,
  gcd,
  isPrime,
  isqrt,
  modInverse,
  mulmod,
  pollardRhoBrent,
  powmod,
  primeFactorize,
  randomBigInt,
  totient,
  totientTable,
  trialFactorize,
  WORD_LIMIT,
} from '../src/numeric';

describe('numeric extra', () => {
  describe('modular arithmetic', () => {
    it('multiplies near the word limit without losing bits', () => {
      expect(mulmod(1n << 62n, 4n, WORD_LIMIT - 25n)).toBe(50n);
      expect(mulmod(0n, 123n, 7n)).toBe(0n);
      expect(mulmod(6n, 7n, 1n)).toBe(0n);
    });

    it('raises to a power', () => {
      expect(powmod(2n, 10n, 1000n)).toBe(24n);
      expect(powmod(5n, 0n, 1n)).toBe(0n);
      expect(powmod(3n, 200n, 1000000007n)).toBe(powmod(9n, 100n, 1000000007n));
    });

    it('classifies invalid operands', () => {
      try {
        mulmod(WORD_LIMIT, 1n, 7n);
        expect.unreachable();
      } catch (error) {
        expect(isAlgorithmError(error, 'overflow')).toBe(true);
      }
      expect(() => mulmod(-1n, 1n, 7n)).toThrow('invalid_argument');
      expect(() => powmod(2n, 3n, 0n)).toThrow('modulus 0 must be positive');
      expect(() => powmod(2n, 3n, WORD_LIMIT)).toThrow('overflow');
    });

    it('computes gcds and inverses', () => {
      expect(gcd(-12n, 18n)).toBe(6n);
      expect(gcd(0n, 0n)).toBe(0n);
      expect(extendedGcd(240n, 46n)).toEqual({ g: 2n, x: -9n, y: 47n });
      expect(modInverse(3n, 11n)).toBe(4n);
      expect(modInverse(-3n, 11n)).toBe(7n);
      expect(() => modInverse(6n, 9n)).toThrow('6 has no inverse modulo 9');
    });
  });

  describe('primality', () => {
    it('recognises small primes and composites', () => {
      const primes = [2n, 3n, 5n, 7n, 11n, 13n, 97n, 1000003n, 100000037n];
      for (const p of primes) expect(isPrime(p)).toBe(true);
      for (const c of [0n, 1n, 4n, 91n, 561n, 1000001n]) expect(isPrime(c)).toBe(false);
    });

    it('rejects strong pseudoprimes to small bases', () => {
      expect(isPrime(3215031751n)).toBe(false);
      expect(isPrime(3825123056546413051n)).toBe(false);
    });

    it('handles large primes below the word limit', () => {
      expect(isPrime((1n << 61n) - 1n)).toBe(true);
      expect(isPrime(WORD_LIMIT - 25n)).toBe(true);
      expect(() => isPrime(WORD_LIMIT)).toThrow('overflow');
    });
  });

  describe('factorization', () => {
    it('factorizes a product of large primes', () => {
      const n = 4n * 3n * 1000003n * 100000037n;
      expect(n).toBe(1200004044001332n);
      expect(primeFactorize(n)).toEqual([2n, 2n, 3n, 1000003n, 100000037n]);
    });

    it('splits remainders above the trial-division cutoff', () => {
      const options = { trialDivisionCutoff: 100, random: createRandom(7) };
      expect(primeFactorize(1000003n * 100000037n, options)).toEqual([1000003n, 100000037n]);
      expect(primeFactorize(101n * 101n * 103n, options)).toEqual([101n, 101n, 103n]);
      expect(primeFactorize(25n, { trialDivisionCutoff: 0 })).toEqual([5n, 5n]);
    });

    it('rejects a negative or non-finite cutoff', () => {
      expect(() => primeFactorize(25n, { trialDivisionCutoff: -5 })).toThrow(
        'invalid_argument: trial division cutoff -5 must be a finite non-negative number',
      );
      try {
        primeFactorize(49n, { trialDivisionCutoff: Number.NaN });
        expect.unreachable();
      } catch (error) {
        expect(isAlgorithmError(error, 'invalid_argument')).toBe(true);
      }
      expect(() => primeFactorize(49n, { trialDivisionCutoff: Infinity })).toThrow('invalid_argument');
    });

    it('handles small inputs', () => {
      expect(primeFactorize(1n)).toEqual([1n]);
      expect(primeFactorize(2n)).toEqual([2n]);
      expect(primeFactorize(360n)).toEqual([2n, 2n, 2n, 3n, 3n, 5n]);
      expect(trialFactorize(360n)).toEqual([2n, 2n, 2n, 3n, 3n, 5n]);
      expect(trialFactorize(97n)).toEqual([97n]);
      expect(() => primeFactorize(0n)).toThrow('invalid_argument');
      expect(() => primeFactorize(WORD_LIMIT)).toThrow('overflow');
    });

    it('finds a non-trivial factor with Pollard rho', () => {
      const n = 8051n;
      const factor = pollardRhoBrent(n, createRandom(3));
      expect([83n, 97n, n]).toContain(factor);
      expect(pollardRhoBrent(1000n)).toBe(2n);
      expect(() => pollardRhoBrent(13n)).toThrow('13 is not composite');
    });

    it('finds factors near the square root with Fermat', () => {
      expect(fermat(5959n)).toBe(59n);
      expect(fermat(15n)).toBe(3n);
      expect(fermat(9n)).toBe(3n);
      expect(fermat(10n)).toBe(2n);
      expect(fermat(7n)).toBe(1n);
    });

    it('lists divisors', () => {
      expect(divisors(36n)).toEqual([1n, 2n, 3n, 4n, 6n, 9n, 12n, 18n, 36n]);
      expect(divisors(1n)).toEqual([1n]);
      expect(divisors(0n)).toEqual([]);
    });

    it('takes integer square roots', () => {
      expect(isqrt(0n)).toBe(0n);
      expect(isqrt(15n)).toBe(3n);
      expect(isqrt(16n)).toBe(4n);
      expect(isqrt((1n << 62n) + 5n)).toBe(1n << 31n);
      expect(() => isqrt(-1n)).toThrow('invalid_argument');
    });
  });

  describe('totient', () => {
    it('counts coprime residues', () => {
      expect(totient(1)).toBe(1);
      expect(totient(9)).toBe(6);
      expect(totient(36)).toBe(12);
      expect(totient(1234567)).toBe(1224720);
      expect(() => totient(0)).toThrow('invalid_argument');
    });

    it('tabulates phi', () => {
      expect(totientTable(10)).toEqual([0, 1, 1, 2, 2, 4, 2, 6, 4, 6, 4]);
      expect(totientTable(0)).toEqual([0]);
      const table = totientTable(200);
      for (const n of [1, 64, 97, 120, 199, 200]) expect(table[n]).toBe(totient(n));
    });
  });

  describe('random', () => {
    it('replays a seeded stream', () => {
      const a = createRandom(42);
      const b = createRandom(42);
      const first = [a(), a(), a()];
      expect([b(), b(), b()]).toEqual(first);
      for (const value of first) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });

    it('draws bigints below the bound', () => {
      const random = createRandom(5);
      for (let i = 0; i < 100; i += 1) {
        const value = randomBigInt(random, 1000n);
        expect(value >= 0n && value < 1000n).toBe(true);
      }
      expect(randomBigInt(random, 1n)).toBe(0n);
      expect(() => randomBigInt(random, 0n)).toThrow('invalid_argument');
    });
  });
});
