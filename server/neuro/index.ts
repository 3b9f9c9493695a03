export * from "./schemas/neuro.schemas.js";
export * from "./schemas/synth.schemas.js";
export * from "./synth/errors.js";
export * from "./synth/random.js";
export * from "./synth/kinematic-pose.js";
export * from "./synth/cluster-layout.js";
export * from "./synth/cluster-mode.js";
export * from "./synth/trajectory-mode.js";
export * from "./synth/synthesizer.js";
export * from "./synth/format.js";
export * from "./synth/config.js";
