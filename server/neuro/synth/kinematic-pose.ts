import type { KinematicPose, KinematicPoseTuple } from "../schemas/neuro.schemas.js";
import { KinematicPoseSchema, KinematicPoseTupleSchema } from "../schemas/synth.schemas.js";
import { InvalidArgumentError, formatZodIssues } from "./errors.js";

export type KinematicPoseInput = Partial<Omit<KinematicPose, "flag">> & {
  flag?: number | boolean;
};

export const createKinematicPose = (input: KinematicPoseInput = {}): KinematicPose => {
  const flag = typeof input.flag === "boolean" ? (input.flag ? 1 : 0) : input.flag ?? 0;
  const parsed = KinematicPoseSchema.safeParse({
    x: input.x ?? 0,
    y: input.y ?? 0,
    z: input.z ?? 0,
    roll: input.roll ?? 0,
    pitch: input.pitch ?? 0,
    yaw: input.yaw ?? 0,
    duration: input.duration ?? 0,
    flag,
  });
  if (!parsed.success) {
    throw new InvalidArgumentError(`invalid kinematic pose: ${formatZodIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
};

/** Flag values other than 0 collapse to 1. */
export const poseFromTuple = (values: readonly number[]): KinematicPose => {
  const parsed = KinematicPoseTupleSchema.safeParse(values);
  if (!parsed.success) {
    throw new InvalidArgumentError(
      `kinematic pose needs 8 finite values: ${formatZodIssues(parsed.error)}`,
    );
  }
  const [x, y, z, roll, pitch, yaw, duration, flag] = parsed.data;
  return createKinematicPose({ x, y, z, roll, pitch, yaw, duration, flag: flag !== 0 });
};

export const poseToTuple = (pose: KinematicPose): KinematicPoseTuple => [
  pose.x,
  pose.y,
  pose.z,
  pose.roll,
  pose.pitch,
  pose.yaw,
  pose.duration,
  pose.flag,
];

/** Re-validates a pose handed in by a caller; frozen poses pass through. */
export const assertKinematicPose = (pose: KinematicPose, label: string): KinematicPose => {
  const parsed = KinematicPoseSchema.safeParse(pose);
  if (!parsed.success) {
    throw new InvalidArgumentError(`invalid ${label} pose: ${formatZodIssues(parsed.error)}`);
  }
  return Object.isFrozen(pose) ? pose : Object.freeze(parsed.data);
};
