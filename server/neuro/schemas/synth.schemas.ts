import { z } from "zod";

const finite = () => z.number().finite();

/** Largest magnitude a pose field or noise amplitude may take; scaled channels stay finite. */
export const POSE_FIELD_LIMIT = 1e12;

const poseField = () => finite().min(-POSE_FIELD_LIMIT).max(POSE_FIELD_LIMIT);

export const NoiseTypeSchema = z.enum(["gaussian", "uniform"]);

export const SeedSchema = z.union([z.number().int(), z.string().min(1)]);

export const KinematicPoseSchema = z.object({
  x: poseField(),
  y: poseField(),
  z: poseField(),
  roll: poseField(),
  pitch: poseField(),
  yaw: poseField(),
  duration: poseField(),
  flag: z.union([z.literal(0), z.literal(1)]),
});

export const KinematicPoseTupleSchema = z.tuple([
  poseField(),
  poseField(),
  poseField(),
  poseField(),
  poseField(),
  poseField(),
  poseField(),
  finite(),
]);

export const ClusterSignalOptionsSchema = z.object({
  numSignals: z.number().int().positive().default(1024),
  clusterStrength: finite().default(0.5),
  seed: SeedSchema.optional(),
});

export const TrajectorySignalOptionsSchema = z.object({
  numSignals: z.number().int().positive().default(1024),
  noiseType: NoiseTypeSchema.default("gaussian"),
  noiseAmplitude: finite().nonnegative().max(POSE_FIELD_LIMIT).default(1),
  seed: SeedSchema.optional(),
});

export const SynthesizerOptionsSchema = z.object({
  samplePeriod: finite().positive().default(1),
});

export type TClusterSignalOptions = z.infer<typeof ClusterSignalOptionsSchema>;
export type TTrajectorySignalOptions = z.infer<typeof TrajectorySignalOptionsSchema>;
