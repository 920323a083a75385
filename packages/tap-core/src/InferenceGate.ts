import type { ActionEvent, ClassificationResult, CooldownState, FeatureSample, FeatureTensor } from "./types";

export interface InferenceGateOptions {
  windowSize?: number;
  /** Compared against the classifier's raw confidence, in whatever scale it reports. */
  confidenceThreshold?: number;
  cooldownMs?: number;
  actionLabel?: string;
}

const DEFAULTS: Required<InferenceGateOptions> = {
  windowSize: 25,
  confidenceThreshold: 1.9,
  cooldownMs: 1000,
  actionLabel: "tap",
};

export type GateStep =
  | { kind: "accumulating"; count: number; target: number }
  | { kind: "ready"; tensor: FeatureTensor };

export type GateDecision =
  | { kind: "fired"; event: ActionEvent }
  | { kind: "waiting" }
  | { kind: "suppressed" };

/**
 * Rolling three-channel window over feature samples plus the threshold/cooldown
 * rule that turns classifier output into discrete actions.
 */
export class InferenceGate {
  private readonly options: Required<InferenceGateOptions>;
  private velocity: number[] = [];
  private acceleration: number[] = [];
  private stability: number[] = [];
  private cooldown: CooldownState = { active: false, until: 0 };

  constructor(opts?: InferenceGateOptions) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
  }

  get size(): number {
    return Math.min(this.velocity.length, this.acceleration.length, this.stability.length);
  }

  get warm(): boolean {
    return this.size === this.options.windowSize;
  }

  get cooldownState(): CooldownState {
    return { ...this.cooldown };
  }

  push(sample: FeatureSample): GateStep {
    const cap = this.options.windowSize;
    appendRolling(this.velocity, sample.relativeVelocityY, cap);
    appendRolling(this.acceleration, sample.relativeAccelerationY, cap);
    appendRolling(this.stability, sample.palmStabilityScore, cap);

    if (!this.warm) {
      return { kind: "accumulating", count: this.size, target: cap };
    }
    return { kind: "ready", tensor: [[...this.velocity], [...this.acceleration], [...this.stability]] };
  }

  evaluate(result: ClassificationResult, now: number): GateDecision {
    const qualifies =
      result.label === this.options.actionLabel && result.confidence >= this.options.confidenceThreshold;
    if (this.cooldown.active) {
      return { kind: "suppressed" };
    }
    if (!qualifies) {
      return { kind: "waiting" };
    }
    this.cooldown = { active: true, until: now + this.options.cooldownMs };
    return { kind: "fired", event: { type: "tap", confidence: result.confidence, timestamp: now } };
  }

  /**
   * Ends the cooldown. The caller's deadline timer is the authority; `until` is
   * informational, since wall-clock time may drift from timer time.
   */
  clearCooldown(): boolean {
    if (!this.cooldown.active) return false;
    this.cooldown = { active: false, until: 0 };
    return true;
  }

  reset(): void {
    this.velocity = [];
    this.acceleration = [];
    this.stability = [];
    this.cooldown = { active: false, until: 0 };
  }
}

export { DEFAULTS as defaultInferenceGateOptions };

function appendRolling(values: number[], value: number, cap: number): void {
  if (values.length >= cap) {
    values.shift();
  }
  values.push(value);
}
