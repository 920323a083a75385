import type { HandObservation, Landmark } from "../src";

type HandPose = {
  wristY?: number;
  indexY?: number;
  knuckleY?: number;
  count?: number;
};

export function buildLandmarks({ wristY = 0.8, indexY = 0.4, knuckleY = 0.6, count = 21 }: HandPose = {}): Landmark[] {
  const landmarks: Landmark[] = Array.from({ length: count }, () => ({ x: 0.5, y: 0.5, z: 0 }));
  const set = (index: number, y: number) => {
    if (index < count) landmarks[index] = { x: 0.5, y, z: 0 };
  };
  set(0, wristY); // wrist
  set(8, indexY); // index tip
  set(9, knuckleY); // middle mcp
  set(13, knuckleY); // ring mcp
  set(17, knuckleY); // pinky mcp
  return landmarks;
}

export function observe(landmarks: Landmark[], timestamp = 0): HandObservation {
  return { timestamp, landmarks };
}

export const absent = (timestamp = 0): HandObservation => ({ timestamp, landmarks: [] });

export const silentLogger = { info: () => {}, warn: () => {}, error: () => {} };
