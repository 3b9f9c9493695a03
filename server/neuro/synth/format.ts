import type { SignalBatch, TrajectorySeries } from "../schemas/neuro.schemas.js";

export type SignalOutputFormat = "text" | "json";

export type SignalOutput =
  | { kind: "batch"; signals: SignalBatch }
  | { kind: "series"; series: TrajectorySeries };

/** One signal per line, channel values separated by single spaces. */
export const formatSignalBatchText = (batch: SignalBatch): string =>
  batch.map((signal) => signal.join(" ")).join("\n");

/** Trials separated by a blank line, one time step per line. */
export const formatTrajectorySeriesText = (series: TrajectorySeries): string =>
  series.map((trial) => formatSignalBatchText(trial)).join("\n\n");

export const formatSignalOutput = (output: SignalOutput, format: SignalOutputFormat): string => {
  if (format === "json") {
    return output.kind === "series"
      ? JSON.stringify({ series: output.series })
      : JSON.stringify({ signals: output.signals });
  }
  return output.kind === "series"
    ? formatTrajectorySeriesText(output.series)
    : formatSignalBatchText(output.signals);
};
