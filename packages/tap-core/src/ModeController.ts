import type { SessionMode } from "./types";

export interface ModeTransition {
  from: SessionMode;
  to: SessionMode;
  changed: boolean;
}

export type ModeListener = (transition: ModeTransition) => void;

export class ModeController {
  private mode: SessionMode;
  private readonly listeners = new Set<ModeListener>();

  constructor(initial: SessionMode = "recording") {
    this.mode = initial;
  }

  get current(): SessionMode {
    return this.mode;
  }

  /** Switches mode. Buffers are untouched; callers decide what a switch implies. */
  transition(to: SessionMode): ModeTransition {
    const from = this.mode;
    const result: ModeTransition = { from, to, changed: from !== to };
    if (!result.changed) return result;
    this.mode = to;
    for (const listener of this.listeners) {
      listener(result);
    }
    return result;
  }

  subscribe(listener: ModeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
