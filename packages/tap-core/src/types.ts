export interface Landmark {
  x: number;
  y: number;
  z?: number;
}

/** One detector answer. Fewer than `minLandmarks` points means no hand. */
export interface HandObservation {
  timestamp: number;
  landmarks: readonly Landmark[];
}

export interface FeatureSample {
  relativeVelocityY: number;
  relativeAccelerationY: number;
  palmStabilityScore: number;
}

export type RecordingLabel = "tap" | "background";

export const RECORDING_LABELS: readonly RecordingLabel[] = ["tap", "background"];

export interface LabeledWindow {
  label: RecordingLabel;
  capturedAt: Date;
  samples: FeatureSample[];
}

/** Channel-major window: velocity, acceleration, stability; each oldest to newest. */
export type FeatureTensor = readonly [
  velocity: readonly number[],
  acceleration: readonly number[],
  stability: readonly number[],
];

export interface ClassificationResult {
  label: string;
  confidence: number;
  scores?: Readonly<Record<string, number>>;
}

export interface TapClassifier {
  classify(tensor: FeatureTensor): Promise<ClassificationResult>;
}

export interface WindowSink {
  /** Resolves with a description of where the window went (a path, a key). */
  persist(window: LabeledWindow): Promise<string | void>;
}

export interface LandmarkDetector<TFrame> {
  detect(frame: TFrame): Promise<HandObservation>;
}

export type SessionMode = "recording" | "inference";

export interface ActionEvent {
  type: "tap";
  confidence: number;
  timestamp: number;
}

export interface CooldownState {
  active: boolean;
  until: number;
}

export type SessionStatus =
  | { type: "idle"; mode: SessionMode }
  | { type: "recording-ready" }
  | { type: "recording"; label: RecordingLabel; count: number; target: number }
  | { type: "saved"; label: RecordingLabel; location?: string }
  | { type: "accumulating"; count: number; target: number }
  | { type: "waiting" }
  | { type: "fired"; confidence: number }
  | { type: "hand-absent" }
  | { type: "model-not-ready" }
  | { type: "error"; message: string };

export type TapSessionError =
  | { type: "recording-in-progress"; label: RecordingLabel }
  | { type: "classification-failed"; error: unknown }
  | { type: "persistence-failed"; label: RecordingLabel; error: unknown };

export interface SessionSnapshot {
  mode: SessionMode;
  recording: { filling: boolean; label?: RecordingLabel; count: number; target: number };
  inference: { count: number; target: number; cooldown: CooldownState };
}

export type Logger = Pick<Console, "info" | "warn" | "error">;
