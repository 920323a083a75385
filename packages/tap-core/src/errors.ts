import type { RecordingLabel } from "./types";

export type TapErrorCode = "RECORDING_IN_PROGRESS" | "CLASSIFIER_UNAVAILABLE" | "INVALID_WINDOW";

export class TapError extends Error {
  constructor(
    readonly code: TapErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RecordingInProgressError extends TapError {
  constructor(readonly activeLabel: RecordingLabel) {
    super("RECORDING_IN_PROGRESS", `A "${activeLabel}" window is still being recorded`);
  }
}

/** Raised when a classifier cannot be initialized; fatal before a session starts. */
export class ClassifierUnavailableError extends TapError {
  constructor(message: string, cause?: unknown) {
    super("CLASSIFIER_UNAVAILABLE", message, { cause });
  }
}

export class InvalidWindowError extends TapError {
  constructor(message: string) {
    super("INVALID_WINDOW", message);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
