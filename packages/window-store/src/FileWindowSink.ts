import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { LabeledWindow, Logger, RecordingLabel, WindowSink } from "@tapsense/tap-core";

export interface FileWindowSinkOptions {
  /** Write into `<dir>/<label>/` so the folder is a ready training set. */
  groupByLabel?: boolean;
  logger?: Logger;
}

const DEFAULTS: Required<FileWindowSinkOptions> = {
  groupByLabel: true,
  logger: console,
};

const MAX_NAME_ATTEMPTS = 10;

export class FileWindowSink implements WindowSink {
  private readonly options: Required<FileWindowSinkOptions>;

  constructor(
    private readonly dir: string,
    opts?: FileWindowSinkOptions
  ) {
    this.options = { ...DEFAULTS, ...(opts ?? {}) };
  }

  async persist(window: LabeledWindow): Promise<string> {
    const target = this.options.groupByLabel ? path.join(this.dir, window.label) : this.dir;
    await mkdir(target, { recursive: true });
    const body = JSON.stringify(window.samples);
    const base = windowFileName(window.label, window.capturedAt);

    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const name = attempt === 0 ? base : base.replace(/\.json$/, `_${attempt}.json`);
      const file = path.join(target, name);
      try {
        await writeFile(file, body, { encoding: "utf8", flag: "wx" });
        this.options.logger.info("window-store saved", file);
        return file;
      } catch (err) {
        if (!isExistsError(err)) throw err;
      }
    }
    throw new Error(`window-store: no free file name for ${base} in ${target}`);
  }
}

/** `<label>_window_<yyyyMMdd_HHmmss_SSS>.json`, stamped in the local time zone. */
export function windowFileName(label: RecordingLabel, capturedAt: Date): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, "0");
  const stamp =
    `${capturedAt.getFullYear()}${pad(capturedAt.getMonth() + 1)}${pad(capturedAt.getDate())}` +
    `_${pad(capturedAt.getHours())}${pad(capturedAt.getMinutes())}${pad(capturedAt.getSeconds())}` +
    `_${pad(capturedAt.getMilliseconds(), 3)}`;
  return `${label}_window_${stamp}.json`;
}

function isExistsError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

export { DEFAULTS as defaultFileWindowSinkOptions };
