import { invalidArgument } from '../errors';

/** Uniform source over `[0, 1)`. `Math.random` qualifies. */
export type RandomSource = () => number;

/** Deterministic mulberry32 stream, so randomized routines replay exactly under a fixed seed. */
export function createRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform bigint in `[0, bound)`, assembled 32 bits at a time. */
export function randomBigInt(random: RandomSource, bound: bigint): bigint {
  if (bound <= 0n) throw invalidArgument(`bound ${bound} must be positive`);
  let bits = 0;
  for (let b = bound - 1n; b > 0n; b >>= 1n) bits += 1;
  const words = Math.max(1, Math.ceil(bits / 32));
  const mask = (1n << BigInt(bits)) - 1n;
  // Rejection keeps the draw uniform; each attempt succeeds with probability > 1/2.
  for (;;) {
    let value = 0n;
    for (let w = 0; w < words; w += 1) {
      value = (value << 32n) | BigInt(Math.floor(random() * 4294967296));
    }
    value &= mask;
    if (value < bound) return value;
  }
}
