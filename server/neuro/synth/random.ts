import { randomInt } from "node:crypto";

/**
 * Entropy for one generation call. Implementations own their state; nothing
 * here touches process-wide randomness.
 */
export interface RandomSource {
  /** Uniform in [0, 1). */
  next(): number;
  /** Standard normal draw. */
  gaussian(): number;
}

export const hashStringToSeed = (input: string): number => {
  let h = 2166136261 >>> 0;
  for (let i = 0; i < input.length; i += 1) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
};

const mulberry32 = (seed: number): (() => number) => {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

export class SeededRandomSource implements RandomSource {
  readonly seed: number;
  private uniform: () => number;
  private spare: number | null = null;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    this.uniform = mulberry32(this.seed);
  }

  next(): number {
    return this.uniform();
  }

  // Box-Muller; the second variate of each pair is cached for the next call.
  gaussian(): number {
    if (this.spare !== null) {
      const val = this.spare;
      this.spare = null;
      return val;
    }
    const u = Math.max(1e-12, this.uniform());
    const v = Math.max(1e-12, this.uniform());
    const mag = Math.sqrt(-2 * Math.log(u));
    this.spare = mag * Math.sin(2 * Math.PI * v);
    return mag * Math.cos(2 * Math.PI * v);
  }
}

export const normalizeSeed = (seed: number | string): number =>
  typeof seed === "string" ? hashStringToSeed(seed) : seed >>> 0;

export const createRandomSource = (seed: number | string): RandomSource =>
  new SeededRandomSource(normalizeSeed(seed));

export const createEntropySource = (): RandomSource =>
  new SeededRandomSource(randomInt(0, 0x100000000));
