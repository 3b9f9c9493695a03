import type { ZodError } from "zod";

export type NeuroSynthErrorCode = "InvalidArgument" | "InvalidDuration";

export class NeuroSynthError extends Error {
  code: NeuroSynthErrorCode;
  status: number;
  constructor(code: NeuroSynthErrorCode, message: string, status = 400) {
    super(message);
    this.code = code;
    this.status = status;
    this.name = "NeuroSynthError";
  }
}

export class InvalidArgumentError extends NeuroSynthError {
  constructor(message: string) {
    super("InvalidArgument", message);
    this.name = "InvalidArgumentError";
  }
}

export class InvalidDurationError extends NeuroSynthError {
  numSamples: number;
  constructor(message: string, numSamples: number) {
    super("InvalidDuration", message);
    this.numSamples = numSamples;
    this.name = "InvalidDurationError";
  }
}

export const formatZodIssues = (error: ZodError): string =>
  error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "value";
      return `${path}: ${issue.message}`;
    })
    .join("; ");

export const isNeuroSynthError = (error: unknown): error is NeuroSynthError =>
  error instanceof NeuroSynthError;
