import * as tf from "@tensorflow/tfjs-core";

let backendReady: Promise<string> | null = null;

/**
 * Picks WebGL where a DOM exists and the CPU kernels everywhere else. Memoized;
 * the first call decides the backend for the process.
 */
export async function ensureTfjsBackend(): Promise<string> {
  if (backendReady) return backendReady;
  backendReady = (async () => {
    await import("@tensorflow/tfjs-backend-cpu");
    if (typeof document !== "undefined") {
      await import("@tensorflow/tfjs-backend-webgl");
      try {
        if (tf.getBackend() === "webgl" || (await tf.setBackend("webgl"))) {
          await tf.ready();
          return tf.getBackend();
        }
      } catch (err) {
        console.warn("handtracking-tfjs WebGL unavailable, using CPU", err);
      }
    }
    await tf.setBackend("cpu");
    await tf.ready();
    return tf.getBackend();
  })();
  return backendReady;
}
