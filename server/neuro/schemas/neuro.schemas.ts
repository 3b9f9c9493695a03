export const SIGNAL_CHANNEL_COUNT = 12;
export const KINEMATIC_POSE_FIELD_COUNT = 8;

export type NoiseType = "gaussian" | "uniform";

/**
 * Start or end state of a motion intent. Field order matches the positional
 * tuple form: spatial coordinates, orientation angles, duration, flag.
 */
export interface KinematicPose {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly roll: number;
  readonly pitch: number;
  readonly yaw: number;
  readonly duration: number;
  /** 0 or 1 */
  readonly flag: number;
}

export type KinematicPoseTuple = readonly [
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
];

/** One time sample across all 12 channels; integer values. */
export type Signal = number[];

export type SignalBatch = Signal[];

/** Per trial, one signal per time step in step order. */
export type TrajectorySeries = Signal[][];

export interface ClusterDefinition {
  name: string;
  channels: readonly number[];
}

export type ClusterLayout = readonly ClusterDefinition[];

export interface ClusterSignalOptions {
  numSignals?: number;
  clusterStrength?: number;
  seed?: number | string;
}

export interface TrajectorySignalOptions {
  numSignals?: number;
  noiseType?: NoiseType;
  noiseAmplitude?: number;
  seed?: number | string;
}
