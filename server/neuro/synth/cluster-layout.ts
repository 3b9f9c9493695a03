import {
  SIGNAL_CHANNEL_COUNT,
  type ClusterDefinition,
  type ClusterLayout,
} from "../schemas/neuro.schemas.js";
import { InvalidArgumentError } from "./errors.js";

export const DEFAULT_CLUSTER_SIZES: readonly number[] = Object.freeze([4, 3, 2, 2, 1]);
export const DEFAULT_CLUSTER_NAMES: readonly string[] = Object.freeze([
  "hand",
  "arm",
  "wrist",
  "shoulder",
  "grip",
]);

/**
 * Assigns consecutive channel ranges to clusters using a running offset, then
 * checks the result covers every signal channel exactly once.
 */
export const buildClusterLayout = (
  sizes: readonly number[],
  names: readonly string[] = [],
): ClusterLayout => {
  let offset = 0;
  const clusters: ClusterDefinition[] = sizes.map((size, idx) => {
    if (!Number.isInteger(size) || size <= 0) {
      throw new InvalidArgumentError(`cluster ${idx} has invalid size ${size}`);
    }
    const channels = Object.freeze(
      Array.from({ length: size }, (_, j) => offset + j),
    );
    offset += size;
    return Object.freeze({ name: names[idx] ?? `cluster-${idx + 1}`, channels });
  });
  const layout = Object.freeze(clusters);
  validateClusterLayout(layout);
  return layout;
};

export const validateClusterLayout = (layout: ClusterLayout): void => {
  const owner = new Array<string | undefined>(SIGNAL_CHANNEL_COUNT).fill(undefined);
  for (const cluster of layout) {
    for (const channel of cluster.channels) {
      if (!Number.isInteger(channel) || channel < 0 || channel >= SIGNAL_CHANNEL_COUNT) {
        throw new InvalidArgumentError(`cluster ${cluster.name} references channel ${channel} outside 0..${SIGNAL_CHANNEL_COUNT - 1}`);
      }
      const existing = owner[channel];
      if (existing !== undefined) {
        throw new InvalidArgumentError(`channel ${channel} is shared by clusters ${existing} and ${cluster.name}`);
      }
      owner[channel] = cluster.name;
    }
  }
  const missing = owner.flatMap((name, channel) => (name === undefined ? [channel] : []));
  if (missing.length > 0) {
    throw new InvalidArgumentError(`channels ${missing.join(",")} belong to no cluster`);
  }
};

/** Frozen deep copy, so later edits to the caller's arrays cannot reach it. */
export const copyClusterLayout = (layout: ClusterLayout): ClusterLayout =>
  Object.freeze(
    layout.map((cluster) =>
      Object.freeze({ name: cluster.name, channels: Object.freeze([...cluster.channels]) }),
    ),
  );

// [[0,1,2,3],[4,5,6],[7,8],[9,10],[11]]
export const DEFAULT_CLUSTER_LAYOUT: ClusterLayout = buildClusterLayout(
  DEFAULT_CLUSTER_SIZES,
  DEFAULT_CLUSTER_NAMES,
);
