import type { Bit } from '../core/dgim.js';

export interface RandomBitsOptions {
  length: number;
  /** Chance that a bit is 1. Defaults to 0.5. */
  probability?: number;
  /** Fixes the sequence; omit to draw from Math.random. */
  seed?: number;
}

/** Small 32-bit PRNG (mulberry32), returns floats in [0, 1). */
export function mulberry32(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (s + 0x6d2b79f5) >>> 0;
    let t = s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Lazily yields `length` random bits. */
export function* randomBits(opts: RandomBitsOptions): Generator<Bit, void, undefined> {
  const p = opts.probability ?? 0.5;
  if (!Number.isInteger(opts.length) || opts.length < 0) {
    throw new RangeError(`length must be a non-negative integer, got ${opts.length}`);
  }
  if (!(p >= 0 && p <= 1)) throw new RangeError(`probability must be in [0, 1], got ${p}`);
  const rand = opts.seed === undefined ? Math.random : mulberry32(opts.seed);
  for (let i = 0; i < opts.length; i++) yield rand() < p ? 1 : 0;
}

export function toBit(value: boolean): Bit {
  return value ? 1 : 0;
}
