import { RecordingInProgressError } from "./errors";
import type { FeatureSample, LabeledWindow, RecordingLabel } from "./types";

export interface RecordingWindowOptions {
  windowSize?: number;
  now?: () => number;
}

const DEFAULTS: Required<RecordingWindowOptions> = {
  windowSize: 25,
  now: () => Date.now(),
};

type RecorderState = { phase: "idle" } | { phase: "filling"; label: RecordingLabel };

export class RecordingWindowManager {
  private readonly options: Required<RecordingWindowOptions>;
  private state: RecorderState = { phase: "idle" };
  private buffer: FeatureSample[] = [];

  constructor(opts?: RecordingWindowOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
  }

  get filling(): boolean {
    return this.state.phase === "filling";
  }

  get label(): RecordingLabel | undefined {
    return this.state.phase === "filling" ? this.state.label : undefined;
  }

  progress(): { count: number; target: number } {
    return { count: this.buffer.length, target: this.options.windowSize };
  }

  start(label: RecordingLabel): void {
    if (this.state.phase === "filling") {
      throw new RecordingInProgressError(this.state.label);
    }
    this.buffer = [];
    this.state = { phase: "filling", label };
  }

  /** Appends while filling. Returns the completed window on the append that fills it. */
  push(sample: FeatureSample): LabeledWindow | null {
    if (this.state.phase !== "filling") return null;
    this.buffer.push({ ...sample });
    if (this.buffer.length < this.options.windowSize) return null;
    return this.finalize();
  }

  abort(): boolean {
    const wasFilling = this.filling;
    this.state = { phase: "idle" };
    this.buffer = [];
    return wasFilling;
  }

  private finalize(): LabeledWindow {
    if (this.state.phase !== "filling") {
      throw new Error("finalize called while idle");
    }
    const window: LabeledWindow = {
      label: this.state.label,
      capturedAt: new Date(this.options.now()),
      samples: this.buffer,
    };
    this.state = { phase: "idle" };
    this.buffer = [];
    return window;
  }
}

export { DEFAULTS as defaultRecordingWindowOptions };
