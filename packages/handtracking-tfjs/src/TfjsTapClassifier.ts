import { tensor3d, tidy } from "@tensorflow/tfjs-core";
import type { Tensor } from "@tensorflow/tfjs-core";
import { InvalidWindowError } from "@tapsense/tap-core";
import type { ClassificationResult, FeatureTensor, TapClassifier } from "@tapsense/tap-core";

/** The slice of a tfjs-layers model the classifier needs. */
export interface PredictingModel {
  predict(x: Tensor): Tensor | Tensor[];
}

export interface TfjsTapClassifierOptions {
  /** Output index → label, in the order the model was trained with. */
  labels?: readonly string[];
  windowSize?: number;
}

const DEFAULTS: Required<TfjsTapClassifierOptions> = {
  labels: ["background", "tap"],
  windowSize: 25,
};

const CHANNELS = 3;

/**
 * Runs a [1, 3, N] feature window through a model and reports the top output.
 * Scores pass through untouched, so a threshold must be set in the model's own
 * output scale (logits and probabilities differ).
 */
export class TfjsTapClassifier implements TapClassifier {
  private readonly options: Required<TfjsTapClassifierOptions>;

  constructor(
    private readonly model: PredictingModel,
    opts?: TfjsTapClassifierOptions
  ) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
  }

  async classify(window: FeatureTensor): Promise<ClassificationResult> {
    const size = this.options.windowSize;
    if (window.length !== CHANNELS || window.some((channel) => channel.length !== size)) {
      throw new InvalidWindowError(`expected ${CHANNELS}x${size} window, got ${window.map((c) => c.length).join("/")}`);
    }

    const flat = new Float32Array(CHANNELS * size);
    window.forEach((channel, c) => flat.set(channel, c * size));

    const output = tidy(() => {
      const prediction = this.model.predict(tensor3d(flat, [1, CHANNELS, size]));
      return Array.isArray(prediction) ? prediction[0] : prediction;
    });
    let values: number[];
    try {
      values = Array.from(await output.data());
    } finally {
      output.dispose();
    }

    const { labels } = this.options;
    if (values.length !== labels.length) {
      throw new Error(`model produced ${values.length} scores for ${labels.length} labels`);
    }

    let best = 0;
    const scores: Record<string, number> = {};
    values.forEach((value, i) => {
      scores[labels[i]] = value;
      if (value > values[best]) best = i;
    });
    return { label: labels[best], confidence: values[best], scores };
  }
}

export { DEFAULTS as defaultTfjsTapClassifierOptions };
