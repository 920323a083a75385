export { ensureTfjsBackend } from "./backend";
export { createTFJSHandDetector, StubHandDetector, toHandObservation } from "./handDetector";
export type {
  DetectedHand,
  DetectedKeypoint,
  DetectorInput,
  HandFrameInput,
  TFJSHandDetectorOptions,
} from "./handDetector";
export { TfjsTapClassifier, defaultTfjsTapClassifierOptions } from "./TfjsTapClassifier";
export type { PredictingModel, TfjsTapClassifierOptions } from "./TfjsTapClassifier";
export { loadTapClassifier, ModelJsonSchema } from "./loadTapClassifier";
export type { LoadTapClassifierOptions, ModelJson } from "./loadTapClassifier";
