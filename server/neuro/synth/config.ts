import { z } from "zod";
import type { KinematicPose } from "../schemas/neuro.schemas.js";
import { NoiseTypeSchema } from "../schemas/synth.schemas.js";
import { InvalidArgumentError, formatZodIssues } from "./errors.js";
import { poseFromTuple } from "./kinematic-pose.js";

export type SynthCliArgs = {
  mode?: string;
  signals?: string;
  strength?: string;
  noise?: string;
  amplitude?: string;
  samplePeriod?: string;
  seed?: string;
  start?: string;
  end?: string;
  format?: string;
  series?: boolean;
  verbose?: boolean;
  help?: boolean;
};

export const SYNTH_USAGE = [
  "usage: neuro-synth [options]",
  "  --mode cluster|trajectory   generation mode (default cluster)",
  "  -n, --signals <int>         number of signals (default 1024)",
  "  --strength <float>          cluster strength (default 0.5)",
  "  --noise gaussian|uniform    trajectory noise model (default gaussian)",
  "  --amplitude <float>         trajectory noise amplitude (default 1)",
  "  --sample-period <float>     trajectory time step (default 1)",
  "  --seed <int|string>         reproducible output",
  "  --start <8 numbers>         comma-separated start pose",
  "  --end <8 numbers>           comma-separated end pose",
  "  --format text|json          output format (default text)",
  "  --series                    trajectory mode: emit every time step",
  "  --verbose                   print resolved config to stderr",
].join("\n");

type ValueFlagKey = Exclude<keyof SynthCliArgs, "series" | "verbose" | "help">;

const VALUE_FLAGS = new Map<string, ValueFlagKey>([
  ["--mode", "mode"],
  ["-n", "signals"],
  ["--signals", "signals"],
  ["--strength", "strength"],
  ["--noise", "noise"],
  ["--amplitude", "amplitude"],
  ["--sample-period", "samplePeriod"],
  ["--seed", "seed"],
  ["--start", "start"],
  ["--end", "end"],
  ["--format", "format"],
]);

export const parseSynthArgs = (argv: readonly string[]): SynthCliArgs => {
  const parsed: SynthCliArgs = {};
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const key = VALUE_FLAGS.get(token);
    if (token === "--series") {
      parsed.series = true;
    } else if (token === "--verbose") {
      parsed.verbose = true;
    } else if (token === "-h" || token === "--help") {
      parsed.help = true;
    } else if (key) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new InvalidArgumentError(`${token} expects a value`);
      }
      parsed[key] = value;
      i += 1;
    } else {
      throw new InvalidArgumentError(`unknown argument ${token}`);
    }
  }
  return parsed;
};

const readString = (value: string | undefined): string | undefined => {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

export const readSynthEnv = (env: NodeJS.ProcessEnv = process.env): SynthCliArgs => ({
  mode: readString(env.NEURO_SYNTH_MODE),
  signals: readString(env.NEURO_SYNTH_SIGNALS),
  samplePeriod: readString(env.NEURO_SYNTH_SAMPLE_PERIOD),
  seed: readString(env.NEURO_SYNTH_SEED),
  format: readString(env.NEURO_SYNTH_FORMAT),
});

// Reference reach: a flag-style 1 sits in the duration slot.
export const DEFAULT_START_POSE: readonly number[] = Object.freeze([0, 0, 0, 0, 0, 0, 0, 0]);
export const DEFAULT_END_POSE: readonly number[] = Object.freeze([
  10,
  20,
  30,
  Math.PI / 2,
  Math.PI / 4,
  0,
  1,
  0,
]);

const PoseListSchema = z
  .string()
  .transform((value) => value.split(",").map((part) => Number(part.trim())));

const SeedInputSchema = z
  .string()
  .min(1)
  .transform((value) => (/^-?\d+$/.test(value) ? Number(value) : value));

export const SynthCliConfigSchema = z.object({
  mode: z.enum(["cluster", "trajectory"]).default("cluster"),
  numSignals: z.coerce.number().int().positive().default(1024),
  clusterStrength: z.coerce.number().finite().default(0.5),
  noiseType: NoiseTypeSchema.default("gaussian"),
  noiseAmplitude: z.coerce.number().finite().nonnegative().default(1),
  samplePeriod: z.coerce.number().finite().positive().default(1),
  seed: SeedInputSchema.optional(),
  start: PoseListSchema.optional(),
  end: PoseListSchema.optional(),
  format: z.enum(["text", "json"]).default("text"),
  series: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type SynthCliConfig = Omit<z.infer<typeof SynthCliConfigSchema>, "start" | "end"> & {
  start: KinematicPose;
  end: KinematicPose;
};

/** Command-line values win over environment values. */
export const resolveSynthConfig = (
  args: SynthCliArgs,
  env: SynthCliArgs = {},
): SynthCliConfig => {
  const parsed = SynthCliConfigSchema.safeParse({
    mode: args.mode ?? env.mode,
    numSignals: args.signals ?? env.signals,
    clusterStrength: args.strength ?? env.strength,
    noiseType: args.noise ?? env.noise,
    noiseAmplitude: args.amplitude ?? env.amplitude,
    samplePeriod: args.samplePeriod ?? env.samplePeriod,
    seed: args.seed ?? env.seed,
    start: args.start ?? env.start,
    end: args.end ?? env.end,
    format: args.format ?? env.format,
    series: args.series ?? env.series,
    verbose: args.verbose ?? env.verbose,
  });
  if (!parsed.success) {
    throw new InvalidArgumentError(formatZodIssues(parsed.error));
  }
  const { start, end, ...rest } = parsed.data;
  return {
    ...rest,
    start: poseFromTuple(start ?? DEFAULT_START_POSE),
    end: poseFromTuple(end ?? DEFAULT_END_POSE),
  };
};
