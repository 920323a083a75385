import type { SessionStatus } from "./types";

export function describeStatus(status: SessionStatus): string {
  switch (status.type) {
    case "idle":
      return status.mode === "recording" ? "Ready to record." : "Inference mode active.";
    case "recording-ready":
      return "Ready to record.";
    case "recording":
      return `Recording "${status.label}" window... (${status.count}/${status.target})`;
    case "saved":
      return status.location ? `Saved "${status.label}" window: ${status.location}` : `Saved "${status.label}" window`;
    case "accumulating":
      return `Buffering... (${status.count}/${status.target})`;
    case "waiting":
      return "Waiting for tap...";
    case "fired":
      return `TAP! (${Math.trunc(status.confidence * 100)}%)`;
    case "hand-absent":
      return "Waiting for hand.";
    case "model-not-ready":
      return "Model not ready";
    case "error":
      return status.message;
  }
}
