import { describe, expect, it } from "vitest";
import { InferenceGate } from "../src";
import type { FeatureSample } from "../src";

const sample = (v: number, a = 0, s = 0): FeatureSample => ({
  relativeVelocityY: v,
  relativeAccelerationY: a,
  palmStabilityScore: s,
});

function warmGate(gate: InferenceGate, count = 25): void {
  for (let i = 0; i < count; i++) gate.push(sample(i));
}

describe("InferenceGate window", () => {
  it("reports accumulation until every stream holds 25 samples", () => {
    const gate = new InferenceGate();
    for (let i = 1; i < 25; i++) {
      expect(gate.push(sample(i))).toEqual({ kind: "accumulating", count: i, target: 25 });
    }
    const step = gate.push(sample(25));
    expect(step.kind).toBe("ready");
  });

  it("evicts the oldest sample once full and stays at capacity", () => {
    const gate = new InferenceGate({ windowSize: 3 });
    gate.push(sample(1, 10, 100));
    gate.push(sample(2, 20, 200));
    gate.push(sample(3, 30, 300));
    const step = gate.push(sample(4, 40, 400));

    expect(gate.size).toBe(3);
    expect(step).toEqual({
      kind: "ready",
      tensor: [
        [2, 3, 4],
        [20, 30, 40],
        [200, 300, 400],
      ],
    });
  });

  it("reset empties the window", () => {
    const gate = new InferenceGate();
    warmGate(gate);
    gate.reset();
    expect(gate.size).toBe(0);
    expect(gate.warm).toBe(false);
  });
});

describe("InferenceGate firing rule", () => {
  it("fires once for a confident tap and then holds a cooldown", () => {
    const gate = new InferenceGate({ confidenceThreshold: 1.9, cooldownMs: 1000 });
    const first = gate.evaluate({ label: "tap", confidence: 2.0 }, 5000);
    expect(first).toEqual({ kind: "fired", event: { type: "tap", confidence: 2.0, timestamp: 5000 } });
    expect(gate.cooldownState).toEqual({ active: true, until: 6000 });

    expect(gate.evaluate({ label: "tap", confidence: 2.0 }, 5500)).toEqual({ kind: "suppressed" });
  });

  it("never fires for background", () => {
    const gate = new InferenceGate({ confidenceThreshold: 0 });
    expect(gate.evaluate({ label: "background", confidence: 100 }, 0)).toEqual({ kind: "waiting" });
    expect(gate.cooldownState.active).toBe(false);
  });

  it("waits when the tap confidence is below threshold", () => {
    const gate = new InferenceGate({ confidenceThreshold: 1.9 });
    expect(gate.evaluate({ label: "tap", confidence: 1.89 }, 0)).toEqual({ kind: "waiting" });
  });

  it("treats a confidence equal to the threshold as qualifying", () => {
    const gate = new InferenceGate({ confidenceThreshold: 1.9 });
    expect(gate.evaluate({ label: "tap", confidence: 1.9 }, 0).kind).toBe("fired");
  });

  it("clears the cooldown on request whatever the clock says", () => {
    const gate = new InferenceGate({ cooldownMs: 1000 });
    gate.evaluate({ label: "tap", confidence: 2 }, 5000);
    expect(gate.clearCooldown()).toBe(true);
    expect(gate.cooldownState).toEqual({ active: false, until: 0 });
    expect(gate.evaluate({ label: "tap", confidence: 2 }, 4990).kind).toBe("fired");
  });

  it("reports nothing to clear when no cooldown is active", () => {
    expect(new InferenceGate().clearCooldown()).toBe(false);
  });
});
