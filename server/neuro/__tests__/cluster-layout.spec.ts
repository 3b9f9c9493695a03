import { describe, expect, it } from "vitest";
import {
  DEFAULT_CLUSTER_LAYOUT,
  buildClusterLayout,
  copyClusterLayout,
  validateClusterLayout,
} from "../synth/cluster-layout.js";
import { InvalidArgumentError } from "../synth/errors.js";

describe("cluster layout", () => {
  it("partitions the 12 channels into consecutive groups of 4,3,2,2,1", () => {
    expect(DEFAULT_CLUSTER_LAYOUT.map((cluster) => [...cluster.channels])).toEqual([
      [0, 1, 2, 3],
      [4, 5, 6],
      [7, 8],
      [9, 10],
      [11],
    ]);
    expect(DEFAULT_CLUSTER_LAYOUT.map((cluster) => cluster.name)).toEqual([
      "hand",
      "arm",
      "wrist",
      "shoulder",
      "grip",
    ]);
  });

  it("assigns every channel to exactly one cluster", () => {
    const seen = DEFAULT_CLUSTER_LAYOUT.flatMap((cluster) => [...cluster.channels]);
    expect(seen).toHaveLength(12);
    expect(new Set(seen).size).toBe(12);
    expect([...seen].sort((a, b) => a - b)).toEqual(
      Array.from({ length: 12 }, (_, idx) => idx),
    );
  });

  it("is frozen", () => {
    expect(Object.isFrozen(DEFAULT_CLUSTER_LAYOUT)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CLUSTER_LAYOUT[0].channels)).toBe(true);
  });

  it("rejects sizes that overflow the channel count", () => {
    expect(() => buildClusterLayout([4, 3, 2, 2, 2])).toThrow(
      "cluster cluster-5 references channel 12 outside 0..11",
    );
  });

  it("rejects sizes that leave channels unassigned", () => {
    expect(() => buildClusterLayout([4, 3, 2, 2])).toThrow("channels 11 belong to no cluster");
  });

  it("rejects non-positive sizes", () => {
    expect(() => buildClusterLayout([0, 12])).toThrow(InvalidArgumentError);
  });

  it("rejects overlapping hand-written layouts", () => {
    expect(() =>
      validateClusterLayout([
        { name: "a", channels: [0, 1, 2, 3, 4, 5] },
        { name: "b", channels: [5, 6, 7, 8, 9, 10, 11] },
      ]),
    ).toThrow("channel 5 is shared by clusters a and b");
  });

  it("accepts a custom exhaustive layout", () => {
    const layout = buildClusterLayout([6, 6], ["left"]);
    expect(layout.map((cluster) => cluster.name)).toEqual(["left", "cluster-2"]);
    expect(layout.map((cluster) => [...cluster.channels])).toEqual([
      [0, 1, 2, 3, 4, 5],
      [6, 7, 8, 9, 10, 11],
    ]);
  });

  it("copies layouts into frozen arrays", () => {
    const channels = Array.from({ length: 12 }, (_, idx) => idx);
    const copy = copyClusterLayout([{ name: "all", channels }]);
    channels.length = 2;
    expect(copy[0].channels).toHaveLength(12);
    expect(Object.isFrozen(copy)).toBe(true);
    expect(Object.isFrozen(copy[0])).toBe(true);
    expect(Object.isFrozen(copy[0].channels)).toBe(true);
  });
});
