import {
  SIGNAL_CHANNEL_COUNT,
  type ClusterLayout,
  type Signal,
  type SignalBatch,
} from "../schemas/neuro.schemas.js";
import type { RandomSource } from "./random.js";

export const CLUSTER_VALUE_MIN = 0;
export const CLUSTER_VALUE_MAX = 200;
export const CLUSTER_NOISE_PROBABILITY = 0.1;
export const CLUSTER_NOISE_SPAN = 50;

export type ClusterSynthesisInput = {
  numSignals: number;
  clusterStrength: number;
  layout: ClusterLayout;
  rng: RandomSource;
};

const clamp = (value: number, min: number, max: number) =>
  Math.min(max, Math.max(min, value));

/**
 * Strength-weighted blend of two independent draws. A heuristic stand-in for
 * how strongly a neuron group responds, not a probability.
 */
export const clusterActivation = (u1: number, u2: number, strength: number): number =>
  Math.sin(u1) ** 2 * strength + Math.cos(u2) ** 2 * (1 - strength);

export const synthesizeClusterSignal = (
  clusterStrength: number,
  layout: ClusterLayout,
  rng: RandomSource,
): Signal => {
  const activations = layout.map(() => {
    const u1 = rng.next();
    const u2 = rng.next();
    return clusterActivation(u1, u2, clusterStrength);
  });

  const signal: Signal = new Array<number>(SIGNAL_CHANNEL_COUNT).fill(0);
  layout.forEach((cluster, idx) => {
    const activation = activations[idx];
    for (const channel of cluster.channels) {
      signal[channel] = Math.round(activation * (rng.next() * 100 + 50));
    }
  });

  // Noise lands after the clamp, so values can leave [0, 200] by up to 25.
  for (let ch = 0; ch < signal.length; ch += 1) {
    let value = clamp(signal[ch], CLUSTER_VALUE_MIN, CLUSTER_VALUE_MAX);
    if (rng.next() < CLUSTER_NOISE_PROBABILITY) {
      value = Math.round(value + rng.next() * CLUSTER_NOISE_SPAN - CLUSTER_NOISE_SPAN / 2);
    }
    signal[ch] = value;
  }
  return signal;
};

export const synthesizeClusterBatch = (input: ClusterSynthesisInput): SignalBatch => {
  const { numSignals, clusterStrength, layout, rng } = input;
  const batch: SignalBatch = new Array<Signal>(numSignals);
  for (let i = 0; i < numSignals; i += 1) {
    batch[i] = synthesizeClusterSignal(clusterStrength, layout, rng);
  }
  return batch;
};
