import type { HandObservation, Landmark, LandmarkDetector, Logger } from "@tapsense/tap-core";
import { ensureTfjsBackend } from "./backend";

type HandPoseModule = typeof import("@tensorflow-models/hand-pose-detection");
type HandPoseDetector = Awaited<ReturnType<HandPoseModule["createDetector"]>>;
export type DetectorInput = Parameters<HandPoseDetector["estimateHands"]>[0];

export interface HandFrameInput {
  input: DetectorInput;
  width: number;
  height: number;
  timestamp?: number;
}

export interface DetectedKeypoint {
  x: number;
  y: number;
  z?: number;
}

export interface DetectedHand {
  handedness?: string;
  keypoints?: DetectedKeypoint[];
}

export interface TFJSHandDetectorOptions {
  modelType?: "lite" | "full";
  maxHands?: number;
  flipHorizontal?: boolean;
  detectorModelUrl?: string;
  landmarkModelUrl?: string;
  now?: () => number;
  logger?: Logger;
}

async function loadDetector(options: TFJSHandDetectorOptions): Promise<HandPoseDetector> {
  await ensureTfjsBackend();
  const handPoseDetection = await import("@tensorflow-models/hand-pose-detection");
  const { SupportedModels } = handPoseDetection;
  return handPoseDetection.createDetector(SupportedModels.MediaPipeHands, {
    runtime: "tfjs",
    modelType: options.modelType ?? "full",
    maxHands: options.maxHands ?? 1,
    detectorModelUrl: options.detectorModelUrl,
    landmarkModelUrl: options.landmarkModelUrl,
  });
}

class TFJSHandDetector implements LandmarkDetector<HandFrameInput> {
  private detector: Promise<HandPoseDetector> | null;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(private readonly options: TFJSHandDetectorOptions) {
    this.detector = null;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? console;
  }

  async detect(frame: HandFrameInput): Promise<HandObservation> {
    const timestamp = frame.timestamp ?? this.now();
    if (!frame.width || !frame.height) {
      return { timestamp, landmarks: [] };
    }
    try {
      if (!this.detector) {
        this.detector = loadDetector(this.options);
      }
      const detector = await this.detector;
      const hands = await detector.estimateHands(frame.input, { flipHorizontal: !!this.options.flipHorizontal });
      return toHandObservation(hands, frame, timestamp);
    } catch (err) {
      this.logger.error("handtracking-tfjs estimateHands failed", err);
      // Drop the detector so the next frame re-creates it.
      this.detector = null;
      return { timestamp, landmarks: [] };
    }
  }
}

/** The model loads on the first frame with a size and is memoized after that. */
export function createTFJSHandDetector(options: TFJSHandDetectorOptions = {}): LandmarkDetector<HandFrameInput> {
  return new TFJSHandDetector(options);
}

/** First hand only; keypoints in pixels are scaled into [0,1] by the frame size. */
export function toHandObservation(
  hands: readonly DetectedHand[],
  size: { width: number; height: number },
  timestamp: number
): HandObservation {
  const hand = hands[0];
  if (!hand) return { timestamp, landmarks: [] };
  const width = size.width || 1;
  const height = size.height || 1;

  const landmarks: Landmark[] = (hand.keypoints ?? []).map((kp) => {
    const isNormalized = kp.x >= 0 && kp.x <= 1 && kp.y >= 0 && kp.y <= 1;
    const x = isNormalized ? kp.x : kp.x / width;
    const y = isNormalized ? kp.y : kp.y / height;
    return { x: clamp01(x), y: clamp01(y), z: kp.z };
  });
  return { timestamp, landmarks };
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Never sees a hand. For wiring sessions where no camera is available. */
export class StubHandDetector implements LandmarkDetector<unknown> {
  constructor(private readonly now: () => number = () => Date.now()) {}

  async detect(_frame: unknown): Promise<HandObservation> {
    return { timestamp: this.now(), landmarks: [] };
  }
}
