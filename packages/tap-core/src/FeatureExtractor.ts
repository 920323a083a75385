import type { FeatureSample, Landmark } from "./types";

export const LANDMARK = {
  WRIST: 0,
  INDEX_TIP: 8,
  MIDDLE_MCP: 9,
  RING_MCP: 13,
  PINKY_MCP: 17,
} as const;

export interface FeatureExtractorOptions {
  /** Landmark count below which the hand is treated as absent. */
  minLandmarks?: number;
}

const DEFAULTS: Required<FeatureExtractorOptions> = {
  minLandmarks: 18,
};

export const ZERO_SAMPLE: Readonly<FeatureSample> = Object.freeze({
  relativeVelocityY: 0,
  relativeAccelerationY: 0,
  palmStabilityScore: 0,
});

/**
 * Turns consecutive landmark sets into vertical motion features of the index
 * fingertip relative to the wrist. Memory never spans a detection gap: an absent
 * hand clears it, so the first frame after a gap always yields zeros.
 */
export class FeatureExtractor {
  private readonly options: Required<FeatureExtractorOptions>;
  private lastLandmarks: readonly Landmark[] | null = null;
  private lastVelocity: number | null = null;

  constructor(opts?: FeatureExtractorOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
    if (this.options.minLandmarks <= LANDMARK.PINKY_MCP) {
      throw new RangeError(`minLandmarks must exceed ${LANDMARK.PINKY_MCP}, got ${this.options.minLandmarks}`);
    }
  }

  isPresent(landmarks: readonly Landmark[]): boolean {
    return landmarks.length >= this.options.minLandmarks;
  }

  next(landmarks: readonly Landmark[]): FeatureSample {
    if (!this.isPresent(landmarks)) {
      this.reset();
      return { ...ZERO_SAMPLE };
    }

    const last = this.lastLandmarks;
    this.lastLandmarks = landmarks;
    if (!last) {
      return { ...ZERO_SAMPLE };
    }

    const wristVel = deltaY(landmarks, last, LANDMARK.WRIST);
    const indexVel = deltaY(landmarks, last, LANDMARK.INDEX_TIP);
    const relativeVelocityY = indexVel - wristVel;
    const relativeAccelerationY = relativeVelocityY - (this.lastVelocity ?? 0);
    const palmStabilityScore =
      Math.abs(wristVel) +
      Math.abs(deltaY(landmarks, last, LANDMARK.MIDDLE_MCP)) +
      Math.abs(deltaY(landmarks, last, LANDMARK.RING_MCP)) +
      Math.abs(deltaY(landmarks, last, LANDMARK.PINKY_MCP));

    this.lastVelocity = relativeVelocityY;
    return { relativeVelocityY, relativeAccelerationY, palmStabilityScore };
  }

  hasMemory(): boolean {
    return this.lastLandmarks !== null;
  }

  reset(): void {
    this.lastLandmarks = null;
    this.lastVelocity = null;
  }
}

export { DEFAULTS as defaultFeatureExtractorOptions };

function deltaY(current: readonly Landmark[], previous: readonly Landmark[], index: number): number {
  return current[index].y - previous[index].y;
}
