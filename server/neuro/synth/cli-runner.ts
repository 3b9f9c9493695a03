import { parseSynthArgs, readSynthEnv, resolveSynthConfig, SYNTH_USAGE } from "./config.js";
import { isNeuroSynthError } from "./errors.js";
import { formatSignalOutput, type SignalOutput } from "./format.js";
import { poseToTuple } from "./kinematic-pose.js";
import { NeuralSignalSynthesizer } from "./synthesizer.js";

export type SynthCliIo = {
  out: (text: string) => void;
  err: (text: string) => void;
};

const consoleIo: SynthCliIo = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

/** Returns the process exit code; never throws for bad input. */
export const runSynthCli = (
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  io: SynthCliIo = consoleIo,
): number => {
  try {
    const args = parseSynthArgs(argv);
    if (args.help) {
      io.out(SYNTH_USAGE);
      return 0;
    }
    const config = resolveSynthConfig(args, readSynthEnv(env));
    if (config.verbose) {
      io.err(
        JSON.stringify({
          ...config,
          start: poseToTuple(config.start),
          end: poseToTuple(config.end),
        }),
      );
    }
    const synthesizer = new NeuralSignalSynthesizer({ samplePeriod: config.samplePeriod });
    let output: SignalOutput;
    if (config.mode === "cluster") {
      output = {
        kind: "batch",
        signals: synthesizer.generateClusterSignals(config.start, config.end, {
          numSignals: config.numSignals,
          clusterStrength: config.clusterStrength,
          seed: config.seed,
        }),
      };
    } else {
      const trajectoryOptions = {
        numSignals: config.numSignals,
        noiseType: config.noiseType,
        noiseAmplitude: config.noiseAmplitude,
        seed: config.seed,
      };
      output = config.series
        ? {
            kind: "series",
            series: synthesizer.generateTrajectorySeries(config.start, config.end, trajectoryOptions),
          }
        : {
            kind: "batch",
            signals: synthesizer.generateTrajectorySignals(config.start, config.end, trajectoryOptions),
          };
    }
    io.out(formatSignalOutput(output, config.format));
    if (config.verbose) {
      io.err(`generated ${config.numSignals} ${config.mode} signals`);
    }
    return 0;
  } catch (error) {
    if (isNeuroSynthError(error)) {
      io.err(`error [${error.code}]: ${error.message}`);
      return error.code === "InvalidArgument" ? 2 : 1;
    }
    throw error;
  }
};
