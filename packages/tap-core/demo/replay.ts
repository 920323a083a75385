import { describeStatus, TapSession } from "../src";
import type { ClassificationResult, FeatureTensor, Landmark } from "../src";

// Replays a synthetic fingertip dip through an inference session with a
// classifier that calls anything moving faster than 0.03/frame a tap.
const classifier = {
  async classify(tensor: FeatureTensor): Promise<ClassificationResult> {
    const peak = Math.max(...tensor[0].map(Math.abs));
    return peak > 0.03 ? { label: "tap", confidence: 2 } : { label: "background", confidence: 2 };
  },
};

const session = new TapSession({
  classifier,
  sink: null,
  onAction: (event) => console.log("action", event),
  onStatus: (status) => console.log(describeStatus(status)),
  options: { initialMode: "inference" },
});

function hand(indexY: number): Landmark[] {
  return Array.from({ length: 21 }, (_, i) => ({ x: 0.5, y: i === 8 ? indexY : 0.6 }));
}

for (let frame = 0; frame < 40; frame++) {
  const dip = frame >= 28 && frame < 32 ? 0.05 * (frame - 27) : 0;
  await session.submit({ timestamp: frame * 33, landmarks: hand(0.4 + dip) });
}
await session.settled();
session.dispose();
