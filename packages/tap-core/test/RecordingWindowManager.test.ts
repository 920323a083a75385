import { describe, expect, it } from "vitest";
import { RecordingInProgressError, RecordingWindowManager } from "../src";
import type { FeatureSample } from "../src";

const sample = (v: number): FeatureSample => ({
  relativeVelocityY: v,
  relativeAccelerationY: 0,
  palmStabilityScore: 0,
});

describe("RecordingWindowManager", () => {
  it("ignores samples while idle", () => {
    const recorder = new RecordingWindowManager();
    expect(recorder.push(sample(1))).toBeNull();
    expect(recorder.progress()).toEqual({ count: 0, target: 25 });
  });

  it("completes on the 25th sample and returns to idle in the same step", () => {
    const recorder = new RecordingWindowManager({ now: () => 1_700_000_000_000 });
    recorder.start("tap");
    for (let i = 0; i < 24; i++) {
      expect(recorder.push(sample(i))).toBeNull();
    }
    expect(recorder.progress().count).toBe(24);

    const window = recorder.push(sample(24));
    expect(window?.label).toBe("tap");
    expect(window?.samples).toHaveLength(25);
    expect(window?.samples[0].relativeVelocityY).toBe(0);
    expect(window?.samples[24].relativeVelocityY).toBe(24);
    expect(window?.capturedAt.getTime()).toBe(1_700_000_000_000);
    expect(recorder.filling).toBe(false);
    expect(recorder.progress().count).toBe(0);
  });

  it("rejects a second start without touching the filling window", () => {
    const recorder = new RecordingWindowManager();
    recorder.start("tap");
    recorder.push(sample(1));
    recorder.push(sample(2));

    expect(() => recorder.start("background")).toThrow(RecordingInProgressError);
    expect(recorder.label).toBe("tap");
    expect(recorder.progress().count).toBe(2);
  });

  it("abort discards the filling window", () => {
    const recorder = new RecordingWindowManager({ windowSize: 3 });
    recorder.start("background");
    recorder.push(sample(1));
    expect(recorder.abort()).toBe(true);
    expect(recorder.filling).toBe(false);
    expect(recorder.abort()).toBe(false);
  });
});
