import type {
  ClusterLayout,
  ClusterSignalOptions,
  KinematicPose,
  NoiseType,
  SignalBatch,
  TrajectorySeries,
  TrajectorySignalOptions,
} from "../schemas/neuro.schemas.js";
import {
  ClusterSignalOptionsSchema,
  SynthesizerOptionsSchema,
  TrajectorySignalOptionsSchema,
  type TTrajectorySignalOptions,
} from "../schemas/synth.schemas.js";
import {
  DEFAULT_CLUSTER_LAYOUT,
  copyClusterLayout,
  validateClusterLayout,
} from "./cluster-layout.js";
import { synthesizeClusterBatch } from "./cluster-mode.js";
import { InvalidArgumentError, formatZodIssues } from "./errors.js";
import { assertKinematicPose } from "./kinematic-pose.js";
import { createEntropySource, createRandomSource, type RandomSource } from "./random.js";
import {
  synthesizeTrajectoryBatch,
  synthesizeTrajectorySeries,
  type TrajectorySynthesisInput,
} from "./trajectory-mode.js";

export type NeuralSignalSynthesizerOptions = {
  /** Time step of the trajectory walk, in the same unit as pose durations. */
  samplePeriod?: number;
  /**
   * Shared source consumed sequentially by calls that pass no seed. Without
   * one, each such call draws a fresh source from system entropy.
   */
  random?: RandomSource;
  layout?: ClusterLayout;
};

/**
 * Synthesizes motor-intent channel data from a start/end kinematic pose pair.
 * Holds configuration only; every call returns freshly built signals.
 */
export class NeuralSignalSynthesizer {
  readonly samplePeriod: number;
  readonly layout: ClusterLayout;
  private random?: RandomSource;

  constructor(options: NeuralSignalSynthesizerOptions = {}) {
    const parsed = SynthesizerOptionsSchema.safeParse({ samplePeriod: options.samplePeriod });
    if (!parsed.success) {
      throw new InvalidArgumentError(`invalid synthesizer options: ${formatZodIssues(parsed.error)}`);
    }
    this.samplePeriod = parsed.data.samplePeriod;
    if (options.layout) {
      const layout = copyClusterLayout(options.layout);
      validateClusterLayout(layout);
      this.layout = layout;
    } else {
      this.layout = DEFAULT_CLUSTER_LAYOUT;
    }
    this.random = options.random;
  }

  generateClusterSignals(
    start: KinematicPose,
    end: KinematicPose,
    numSignals?: number,
    clusterStrength?: number,
  ): SignalBatch;
  generateClusterSignals(
    start: KinematicPose,
    end: KinematicPose,
    options?: ClusterSignalOptions,
  ): SignalBatch;
  generateClusterSignals(
    start: KinematicPose,
    end: KinematicPose,
    numSignalsOrOptions?: number | ClusterSignalOptions,
    clusterStrength?: number,
  ): SignalBatch {
    assertKinematicPose(start, "start");
    assertKinematicPose(end, "end");
    const raw: ClusterSignalOptions =
      typeof numSignalsOrOptions === "object"
        ? numSignalsOrOptions
        : { numSignals: numSignalsOrOptions, clusterStrength };
    const parsed = ClusterSignalOptionsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidArgumentError(`invalid cluster options: ${formatZodIssues(parsed.error)}`);
    }
    return synthesizeClusterBatch({
      numSignals: parsed.data.numSignals,
      clusterStrength: parsed.data.clusterStrength,
      layout: this.layout,
      rng: this.resolveRandom(parsed.data.seed),
    });
  }

  generateTrajectorySignals(
    start: KinematicPose,
    end: KinematicPose,
    numSignals?: number,
    noiseType?: NoiseType,
    noiseAmplitude?: number,
  ): SignalBatch;
  generateTrajectorySignals(
    start: KinematicPose,
    end: KinematicPose,
    options?: TrajectorySignalOptions,
  ): SignalBatch;
  generateTrajectorySignals(
    start: KinematicPose,
    end: KinematicPose,
    numSignalsOrOptions?: number | TrajectorySignalOptions,
    noiseType?: NoiseType,
    noiseAmplitude?: number,
  ): SignalBatch {
    const raw: TrajectorySignalOptions =
      typeof numSignalsOrOptions === "object"
        ? numSignalsOrOptions
        : { numSignals: numSignalsOrOptions, noiseType, noiseAmplitude };
    return synthesizeTrajectoryBatch(this.resolveTrajectoryInput(start, end, raw));
  }

  /** Same walk as `generateTrajectorySignals`, keeping every time step. */
  generateTrajectorySeries(
    start: KinematicPose,
    end: KinematicPose,
    options: TrajectorySignalOptions = {},
  ): TrajectorySeries {
    return synthesizeTrajectorySeries(this.resolveTrajectoryInput(start, end, options));
  }

  private resolveTrajectoryInput(
    start: KinematicPose,
    end: KinematicPose,
    raw: TrajectorySignalOptions,
  ): TrajectorySynthesisInput {
    const startPose = assertKinematicPose(start, "start");
    const endPose = assertKinematicPose(end, "end");
    const parsed = TrajectorySignalOptionsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidArgumentError(`invalid trajectory options: ${formatZodIssues(parsed.error)}`);
    }
    const options: TTrajectorySignalOptions = parsed.data;
    return {
      start: startPose,
      end: endPose,
      samplePeriod: this.samplePeriod,
      numSignals: options.numSignals,
      noiseType: options.noiseType,
      noiseAmplitude: options.noiseAmplitude,
      rng: this.resolveRandom(options.seed),
    };
  }

  private resolveRandom(seed?: number | string): RandomSource {
    if (seed !== undefined) {
      return createRandomSource(seed);
    }
    return this.random ?? createEntropySource();
  }
}
