export * from "./types";
export * from "./errors";
export * from "./FeatureExtractor";
export * from "./ModeController";
export * from "./RecordingWindowManager";
export * from "./InferenceGate";
export * from "./SerialQueue";
export * from "./TapSession";
export * from "./DetectionLoop";
export { describeStatus } from "./status";
