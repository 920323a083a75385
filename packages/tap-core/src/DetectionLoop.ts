import type { HandObservation, LandmarkDetector, Logger } from "./types";

export interface DetectionLoopOptions {
  signal?: AbortSignal;
  now?: () => number;
  logger?: Logger;
}

type ObservationConsumer = {
  submit(observation: HandObservation): Promise<void>;
};

/**
 * Feeds frames through the detector one at a time, in order, and hands each
 * answer to the consumer before asking for the next frame. A detector that
 * throws counts as "no hand" for that frame; a consumer that throws loses only
 * that frame.
 */
export async function runDetectionLoop<TFrame>(
  detector: LandmarkDetector<TFrame>,
  frames: AsyncIterable<TFrame>,
  consumer: ObservationConsumer,
  options: DetectionLoopOptions = {}
): Promise<number> {
  const now = options.now ?? (() => Date.now());
  const logger = options.logger ?? console;
  let processed = 0;

  for await (const frame of frames) {
    if (options.signal?.aborted) break;
    let observation: HandObservation;
    try {
      observation = await detector.detect(frame);
    } catch (err) {
      logger.error("tap-core landmark detection failed", err);
      observation = { timestamp: now(), landmarks: [] };
    }
    try {
      await consumer.submit(observation);
    } catch (err) {
      logger.error("tap-core frame processing failed", err);
    }
    processed += 1;
  }
  return processed;
}
