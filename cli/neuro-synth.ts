#!/usr/bin/env -S tsx
import { runSynthCli } from "../server/neuro/synth/cli-runner.js";

try {
  process.exitCode = runSynthCli(process.argv.slice(2));
} catch (err) {
  console.error(err);
  process.exit(1);
}
