import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { DEFAULT_CLUSTER_LAYOUT } from "../synth/cluster-layout.js";
import {
  clusterActivation,
  synthesizeClusterBatch,
  synthesizeClusterSignal,
} from "../synth/cluster-mode.js";
import { createRandomSource, type RandomSource } from "../synth/random.js";

class ScriptedRandom implements RandomSource {
  private index = 0;
  constructor(private readonly values: number[]) {}

  next(): number {
    if (this.index >= this.values.length) {
      throw new Error(`script exhausted after ${this.values.length} draws`);
    }
    const value = this.values[this.index];
    this.index += 1;
    return value;
  }

  gaussian(): number {
    return this.next();
  }

  get consumed(): number {
    return this.index;
  }
}

const constantRandom = (value: number): RandomSource => ({
  next: () => value,
  gaussian: () => value,
});

const repeat = (value: number, count: number) => new Array<number>(count).fill(value);

const mean = (values: number[]) => values.reduce((acc, v) => acc + v, 0) / values.length;

describe("cluster activation", () => {
  it("depends only on the sine term at full strength", () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0, max: 1, noNaN: true, maxExcluded: true }),
        fc.double({ min: 0, max: 1, noNaN: true, maxExcluded: true }),
        (u1, u2) => {
          expect(clusterActivation(u1, u2, 1)).toBe(Math.sin(u1) ** 2);
        },
      ),
    );
  });

  it("stays within [0, 1] for strengths in [0, 1]", () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0, max: 1, noNaN: true }),
        fc.double({ min: 0, max: 1, noNaN: true }),
        fc.double({ min: 0, max: 1, noNaN: true }),
        (u1, u2, strength) => {
          const activation = clusterActivation(u1, u2, strength);
          expect(activation).toBeGreaterThanOrEqual(0);
          expect(activation).toBeLessThanOrEqual(1);
        },
      ),
    );
  });
});

describe("cluster signal synthesis", () => {
  it("scales each channel by its cluster activation", () => {
    expect(synthesizeClusterSignal(1, DEFAULT_CLUSTER_LAYOUT, constantRandom(0.5))).toEqual(
      repeat(23, 12),
    );
    expect(synthesizeClusterSignal(0, DEFAULT_CLUSTER_LAYOUT, constantRandom(0.5))).toEqual(
      repeat(77, 12),
    );
    expect(synthesizeClusterSignal(0.5, DEFAULT_CLUSTER_LAYOUT, constantRandom(0.5))).toEqual(
      repeat(50, 12),
    );
  });

  it("adds noise after clamping, only when the per-channel draw is below 0.1", () => {
    const rng = new ScriptedRandom([
      ...repeat(0, 10),
      ...repeat(0.5, 12),
      0, 0,
      0.5,
      0.05, 0.9,
      ...repeat(0.5, 9),
    ]);
    const signal = synthesizeClusterSignal(1, DEFAULT_CLUSTER_LAYOUT, rng);
    expect(signal).toEqual([-25, 0, 20, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
    expect(rng.consumed).toBe(36);
  });

  it("clamps to 200 before noise can push past it", () => {
    const rng = new ScriptedRandom([
      ...repeat(0, 10),
      ...repeat(0.5, 12),
      0, 0.9,
      ...repeat(0.5, 11),
    ]);
    const signal = synthesizeClusterSignal(-3, DEFAULT_CLUSTER_LAYOUT, rng);
    expect(signal).toEqual([220, ...repeat(200, 11)]);
  });

  it("keeps every value an integer within [-25, 225]", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 40 }),
        fc.double({ min: 0, max: 1, noNaN: true }),
        fc.integer(),
        (numSignals, clusterStrength, seed) => {
          const batch = synthesizeClusterBatch({
            numSignals,
            clusterStrength,
            layout: DEFAULT_CLUSTER_LAYOUT,
            rng: createRandomSource(seed),
          });
          expect(batch).toHaveLength(numSignals);
          for (const signal of batch) {
            expect(signal).toHaveLength(12);
            for (const value of signal) {
              expect(Number.isInteger(value)).toBe(true);
              expect(value).toBeGreaterThanOrEqual(-25);
              expect(value).toBeLessThanOrEqual(225);
            }
          }
        },
      ),
      { numRuns: 50 },
    );
  });

  it("tracks the expected sine and cosine means over many signals", () => {
    // E[sin^2 U] = 1/2 - sin(2)/4, E[cos^2 U] = 1/2 + sin(2)/4, E[u3*100+50] = 100
    const sineOnly = synthesizeClusterBatch({
      numSignals: 2000,
      clusterStrength: 1,
      layout: DEFAULT_CLUSTER_LAYOUT,
      rng: createRandomSource(1234),
    }).flat();
    const cosineOnly = synthesizeClusterBatch({
      numSignals: 2000,
      clusterStrength: 0,
      layout: DEFAULT_CLUSTER_LAYOUT,
      rng: createRandomSource(1234),
    }).flat();
    expect(mean(sineOnly)).toBeGreaterThan(25.5);
    expect(mean(sineOnly)).toBeLessThan(29);
    expect(mean(cosineOnly)).toBeGreaterThan(71);
    expect(mean(cosineOnly)).toBeLessThan(74.5);
  });

  it("never exceeds the sine ceiling at full strength before noise", () => {
    // sin^2(1) * 150 is the largest reachable pre-noise value.
    const ceiling = Math.round(Math.sin(1) ** 2 * 150);
    const batch = synthesizeClusterBatch({
      numSignals: 500,
      clusterStrength: 1,
      layout: DEFAULT_CLUSTER_LAYOUT,
      rng: createRandomSource(99),
    });
    for (const value of batch.flat()) {
      expect(value).toBeLessThanOrEqual(ceiling + 25);
    }
  });
});
