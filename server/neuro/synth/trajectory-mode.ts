import {
  SIGNAL_CHANNEL_COUNT,
  type KinematicPose,
  type NoiseType,
  type Signal,
  type SignalBatch,
  type TrajectorySeries,
} from "../schemas/neuro.schemas.js";
import { InvalidDurationError } from "./errors.js";
import type { RandomSource } from "./random.js";

export const TRAJECTORY_SCALE = 1024;

// Absorbs float error in duration / samplePeriod (0.3 / 0.1 = 2.9999999999999996).
const STEP_TOLERANCE = 1e-9;

const wholeSteps = (span: number, samplePeriod: number): number =>
  Math.floor(span / samplePeriod + STEP_TOLERANCE);

export type TrajectorySynthesisInput = {
  start: KinematicPose;
  end: KinematicPose;
  samplePeriod: number;
  numSignals: number;
  noiseType: NoiseType;
  noiseAmplitude: number;
  rng: RandomSource;
};

type Axis = "x" | "y" | "z";
const AXES: readonly Axis[] = ["x", "y", "z"];

export const computeSampleCount = (
  start: KinematicPose,
  end: KinematicPose,
  samplePeriod: number,
): number => {
  const numSamples = wholeSteps(end.duration - start.duration, samplePeriod) + 1;
  if (numSamples <= 0 || end.duration <= start.duration) {
    throw new InvalidDurationError(
      `end duration ${end.duration} must exceed start duration ${start.duration} (numSamples=${numSamples})`,
      numSamples,
    );
  }
  return numSamples;
};

/**
 * Baseline from the fields after the spatial coordinates, scaled and
 * truncated. The pose has only five such fields, so the sixth slot is 0.
 */
export const orientationBaseline = (pose: KinematicPose): number[] => {
  const fields = [pose.roll, pose.pitch, pose.yaw, pose.duration, pose.flag, 0];
  return fields.map((value) => Math.trunc(value * TRAJECTORY_SCALE));
};

export const drawNoise = (rng: RandomSource, noiseType: NoiseType, amplitude: number): number => {
  switch (noiseType) {
    case "gaussian":
      return rng.gaussian() * amplitude;
    case "uniform":
      return (rng.next() * 2 - 1) * amplitude;
  }
};

export const interpolateAxis = (
  start: KinematicPose,
  end: KinematicPose,
  axis: Axis,
  t: number,
  numSamples: number,
): number => start[axis] + ((end[axis] - start[axis]) * t) / numSamples;

/**
 * Walks one trial from t = samplePeriod to end.duration, writing each step
 * into the same signal and handing it to `visit`. Channels 6-11 keep the
 * baseline for the whole walk. Returns the number of steps taken.
 */
export const walkTrajectoryTrial = (
  input: Omit<TrajectorySynthesisInput, "numSignals">,
  numSamples: number,
  signal: Signal,
  visit?: (signal: Signal, t: number) => void,
): number => {
  const { start, end, samplePeriod, noiseType, noiseAmplitude, rng } = input;
  const lastStep = wholeSteps(end.duration, samplePeriod);
  let steps = 0;
  for (let k = 1; k <= lastStep; k += 1) {
    const t = k * samplePeriod;
    AXES.forEach((axis, idx) => {
      const coord = interpolateAxis(start, end, axis, t, numSamples);
      const noise = drawNoise(rng, noiseType, noiseAmplitude);
      signal[idx] = Math.round((coord + noise) * TRAJECTORY_SCALE);
      signal[idx + 3] = Math.round(coord * TRAJECTORY_SCALE);
    });
    steps += 1;
    visit?.(signal, t);
  }
  return steps;
};

const seedSignal = (baseline: readonly number[]): Signal => {
  const signal: Signal = new Array<number>(SIGNAL_CHANNEL_COUNT);
  for (let ch = 0; ch < SIGNAL_CHANNEL_COUNT; ch += 1) {
    signal[ch] = baseline[ch % baseline.length];
  }
  return signal;
};

/** Terminal-sample output: only the last time step of each trial survives. */
export const synthesizeTrajectoryBatch = (input: TrajectorySynthesisInput): SignalBatch => {
  const numSamples = computeSampleCount(input.start, input.end, input.samplePeriod);
  const baseline = orientationBaseline(input.start);
  const batch: SignalBatch = new Array<Signal>(input.numSignals);
  for (let i = 0; i < input.numSignals; i += 1) {
    const signal = seedSignal(baseline);
    walkTrajectoryTrial(input, numSamples, signal);
    batch[i] = signal;
  }
  return batch;
};

export const synthesizeTrajectorySeries = (input: TrajectorySynthesisInput): TrajectorySeries => {
  const numSamples = computeSampleCount(input.start, input.end, input.samplePeriod);
  const baseline = orientationBaseline(input.start);
  const series: TrajectorySeries = new Array<Signal[]>(input.numSignals);
  for (let i = 0; i < input.numSignals; i += 1) {
    const signal = seedSignal(baseline);
    const steps: Signal[] = [];
    const taken = walkTrajectoryTrial(input, numSamples, signal, (current) => {
      steps.push([...current]);
    });
    series[i] = taken > 0 ? steps : [signal];
  }
  return series;
};
