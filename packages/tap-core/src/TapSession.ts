import { describeError, RecordingInProgressError } from "./errors";
import { FeatureExtractor } from "./FeatureExtractor";
import { InferenceGate } from "./InferenceGate";
import type { GateDecision } from "./InferenceGate";
import { ModeController } from "./ModeController";
import type { ModeTransition } from "./ModeController";
import { RecordingWindowManager } from "./RecordingWindowManager";
import { SerialQueue } from "./SerialQueue";
import type {
  ActionEvent,
  ClassificationResult,
  FeatureSample,
  FeatureTensor,
  HandObservation,
  LabeledWindow,
  Logger,
  RecordingLabel,
  SessionMode,
  SessionSnapshot,
  SessionStatus,
  TapClassifier,
  TapSessionError,
  WindowSink,
} from "./types";

export interface TapSessionOptions {
  windowSize?: number;
  minLandmarks?: number;
  confidenceThreshold?: number;
  cooldownMs?: number;
  actionLabel?: string;
  initialMode?: SessionMode;
  /** Drop both windows and any cooldown when the mode changes. */
  clearWindowsOnModeChange?: boolean;
  now?: () => number;
  logger?: Logger;
}

const DEFAULTS: Required<TapSessionOptions> = {
  windowSize: 25,
  minLandmarks: 18,
  confidenceThreshold: 1.9,
  cooldownMs: 1000,
  actionLabel: "tap",
  initialMode: "recording",
  clearWindowsOnModeChange: true,
  now: () => Date.now(),
  logger: console,
};

export type TapSessionConfig = {
  /** `null` when the model failed to load; inference then reports not-ready. */
  classifier: TapClassifier | null;
  sink: WindowSink | null;
  onAction?: (event: ActionEvent) => void;
  onStatus?: (status: SessionStatus) => void;
  onModeChange?: (transition: ModeTransition) => void;
  onError?: (err: TapSessionError) => void;
  onWindowSaved?: (window: LabeledWindow, location?: string) => void;
  options?: TapSessionOptions;
};

export function resolveTapSessionOptions(opts?: TapSessionOptions): Required<TapSessionOptions> {
  const resolved = { ...DEFAULTS, ...(opts ?? {}) };
  if (!Number.isInteger(resolved.windowSize) || resolved.windowSize <= 0) {
    throw new RangeError(`windowSize must be a positive integer, got ${resolved.windowSize}`);
  }
  if (!Number.isFinite(resolved.cooldownMs) || resolved.cooldownMs < 0) {
    throw new RangeError(`cooldownMs must be >= 0, got ${resolved.cooldownMs}`);
  }
  if (!Number.isFinite(resolved.confidenceThreshold)) {
    throw new RangeError(`confidenceThreshold must be finite, got ${resolved.confidenceThreshold}`);
  }
  return resolved;
}

/**
 * One gesture session: feature extraction, mode routing, window capture and
 * gated inference. All state changes run on a single serial queue; classifier,
 * sink and cooldown timer report back by enqueueing tasks.
 */
export class TapSession {
  private readonly options: Required<TapSessionOptions>;
  private readonly queue = new SerialQueue();
  private readonly extractor: FeatureExtractor;
  private readonly modes: ModeController;
  private readonly recorder: RecordingWindowManager;
  private readonly gate: InferenceGate;
  private readonly inflight = new Set<Promise<void>>();
  private cooldownTimer: ReturnType<typeof setTimeout> | null = null;
  // Bumped whenever the inference window is dropped so late results are ignored.
  private epoch = 0;
  private disposed = false;

  constructor(private readonly config: TapSessionConfig) {
    this.options = resolveTapSessionOptions(config.options);
    const { windowSize, minLandmarks, now } = this.options;
    this.extractor = new FeatureExtractor({ minLandmarks });
    this.modes = new ModeController(this.options.initialMode);
    this.recorder = new RecordingWindowManager({ windowSize, now });
    this.gate = new InferenceGate({
      windowSize,
      confidenceThreshold: this.options.confidenceThreshold,
      cooldownMs: this.options.cooldownMs,
      actionLabel: this.options.actionLabel,
    });
    const onModeChange = config.onModeChange;
    if (onModeChange) {
      this.modes.subscribe(onModeChange);
    }
  }

  get mode(): SessionMode {
    return this.modes.current;
  }

  submit(observation: HandObservation): Promise<void> {
    return this.queue.enqueue(() => this.processFrame(observation));
  }

  async consume(observations: AsyncIterable<HandObservation>): Promise<void> {
    for await (const observation of observations) {
      if (this.disposed) break;
      await this.submit(observation);
    }
  }

  startRecording(label: RecordingLabel): Promise<boolean> {
    return this.queue.enqueue(() => {
      if (this.disposed) return false;
      if (this.modes.current !== "recording") {
        this.options.logger.warn(`tap-core ignoring "${label}" recording request outside recording mode`);
        return false;
      }
      try {
        this.recorder.start(label);
      } catch (err) {
        if (err instanceof RecordingInProgressError) {
          this.config.onError?.({ type: "recording-in-progress", label: err.activeLabel });
          return false;
        }
        throw err;
      }
      // The window must not inherit velocity from before the request.
      this.extractor.reset();
      this.emitStatus({ type: "recording", label, ...this.recorder.progress() });
      return true;
    });
  }

  setMode(mode: SessionMode): Promise<ModeTransition> {
    return this.queue.enqueue(() => {
      const transition = this.modes.transition(mode);
      if (!transition.changed) return transition;
      if (this.options.clearWindowsOnModeChange) {
        this.recorder.abort();
        this.resetInference();
      }
      this.emitStatus({ type: "idle", mode });
      return transition;
    });
  }

  snapshot(): SessionSnapshot {
    return {
      mode: this.modes.current,
      recording: { filling: this.recorder.filling, label: this.recorder.label, ...this.recorder.progress() },
      inference: { count: this.gate.size, target: this.options.windowSize, cooldown: this.gate.cooldownState },
    };
  }

  /** Resolves once queued work and outstanding classifier/sink calls have settled. */
  async settled(): Promise<void> {
    while (this.inflight.size > 0 || this.queue.size > 0) {
      await Promise.allSettled([...this.inflight]);
      await this.queue.drain();
    }
  }

  dispose(): void {
    this.disposed = true;
    this.epoch += 1;
    this.clearCooldownTimer();
  }

  private processFrame(observation: HandObservation): void {
    if (this.disposed) return;
    const sample = this.extractor.next(observation.landmarks);
    const present = this.extractor.isPresent(observation.landmarks);

    switch (this.modes.current) {
      case "recording":
        this.handleRecording(sample, present);
        break;
      case "inference":
        this.handleInference(sample, present);
        break;
    }
  }

  private handleRecording(sample: FeatureSample, present: boolean): void {
    if (!present) {
      if (!this.recorder.filling) this.emitStatus({ type: "recording-ready" });
      return;
    }
    const label = this.recorder.label;
    const completed = this.recorder.push(sample);
    if (completed) {
      this.persist(completed);
    } else if (label) {
      this.emitStatus({ type: "recording", label, ...this.recorder.progress() });
    }
  }

  private handleInference(sample: FeatureSample, present: boolean): void {
    if (!present) {
      this.emitStatus({ type: "hand-absent" });
      return;
    }
    const classifier = this.config.classifier;
    if (!classifier) {
      this.emitStatus({ type: "model-not-ready" });
      return;
    }

    const step = this.gate.push(sample);
    if (step.kind === "accumulating") {
      this.emitStatus({ type: "accumulating", count: step.count, target: step.target });
      return;
    }
    this.classify(classifier, step.tensor);
  }

  private classify(classifier: TapClassifier, tensor: FeatureTensor): void {
    const epoch = this.epoch;
    const call = Promise.resolve().then(() => classifier.classify(tensor));
    this.track(
      call.then(
        (result) => this.queue.enqueue(() => this.applyResult(result, epoch)),
        (error: unknown) => this.queue.enqueue(() => this.classificationFailed(error, epoch))
      )
    );
  }

  private applyResult(result: ClassificationResult, epoch: number): void {
    if (this.disposed || epoch !== this.epoch || this.modes.current !== "inference") return;
    const decision: GateDecision = this.gate.evaluate(result, this.options.now());
    switch (decision.kind) {
      case "fired":
        this.scheduleCooldownExpiry();
        this.config.onAction?.(decision.event);
        this.emitStatus({ type: "fired", confidence: decision.event.confidence });
        break;
      case "waiting":
        this.emitStatus({ type: "waiting" });
        break;
      case "suppressed":
        break;
    }
  }

  private classificationFailed(error: unknown, epoch: number): void {
    if (this.disposed || epoch !== this.epoch) return;
    this.options.logger.error("tap-core classification failed", error);
    this.config.onError?.({ type: "classification-failed", error });
  }

  private persist(window: LabeledWindow): void {
    const sink = this.config.sink;
    if (!sink) {
      this.persistFailed(window, new Error("no window sink configured"));
      return;
    }
    const call = Promise.resolve().then(() => sink.persist(window));
    this.track(
      call.then(
        (location) =>
          this.queue.enqueue(() => this.persisted(window, typeof location === "string" ? location : undefined)),
        (error: unknown) => this.queue.enqueue(() => this.persistFailed(window, error))
      )
    );
  }

  private persisted(window: LabeledWindow, location?: string): void {
    if (this.disposed) return;
    this.options.logger.info(`tap-core saved "${window.label}" window`, location ?? "");
    this.config.onWindowSaved?.(window, location);
    this.emitStatus({ type: "saved", label: window.label, location });
  }

  private persistFailed(window: LabeledWindow, error: unknown): void {
    if (this.disposed) return;
    this.options.logger.error(`tap-core failed to save "${window.label}" window`, error);
    this.config.onError?.({ type: "persistence-failed", label: window.label, error });
    this.emitStatus({ type: "error", message: `Save failed: ${describeError(error)}` });
  }

  private scheduleCooldownExpiry(): void {
    this.clearCooldownTimer();
    this.cooldownTimer = setTimeout(() => {
      this.cooldownTimer = null;
      this.track(
        this.queue.enqueue(() => {
          if (!this.disposed) this.gate.clearCooldown();
        })
      );
    }, this.options.cooldownMs);
  }

  private clearCooldownTimer(): void {
    if (this.cooldownTimer !== null) {
      clearTimeout(this.cooldownTimer);
      this.cooldownTimer = null;
    }
  }

  private resetInference(): void {
    this.epoch += 1;
    this.clearCooldownTimer();
    this.gate.reset();
  }

  private track(task: Promise<unknown>): void {
    const tracked = task.then(
      () => undefined,
      (err: unknown) => {
        this.options.logger.error("tap-core session task failed", err);
      }
    );
    this.inflight.add(tracked);
    void tracked.finally(() => {
      this.inflight.delete(tracked);
    });
  }

  private emitStatus(status: SessionStatus): void {
    this.config.onStatus?.(status);
  }
}

export { DEFAULTS as defaultTapSessionOptions };
