import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { describeError, RECORDING_LABELS } from "@tapsense/tap-core";
import type { FeatureSample, FeatureTensor, Logger, RecordingLabel } from "@tapsense/tap-core";
import { z } from "zod";

export const FeatureSampleSchema = z.object({
  relativeVelocityY: z.number().finite(),
  relativeAccelerationY: z.number().finite(),
  palmStabilityScore: z.number().finite(),
});

export function windowFileSchema(windowSize: number) {
  return z.array(FeatureSampleSchema).length(windowSize);
}

export interface DatasetEntry {
  label: RecordingLabel;
  file: string;
  samples: FeatureSample[];
}

export interface Dataset {
  entries: DatasetEntry[];
  skipped: { file: string; reason: string }[];
}

export interface LoadDatasetOptions {
  labels?: readonly RecordingLabel[];
  windowSize?: number;
  logger?: Logger;
}

/**
 * Reads `<root>/<label>/*.json` windows. Files that fail to parse or have the
 * wrong length are skipped and listed; a missing label folder is a warning.
 */
export async function loadDataset(root: string, options: LoadDatasetOptions = {}): Promise<Dataset> {
  const { labels = RECORDING_LABELS, windowSize = 25, logger = console } = options;
  const schema = windowFileSchema(windowSize);
  const dataset: Dataset = { entries: [], skipped: [] };

  for (const label of labels) {
    const dir = path.join(root, label);
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (err) {
      logger.warn(`window-store missing class folder ${dir}`, describeError(err));
      continue;
    }

    for (const name of names.filter((n) => n.endsWith(".json")).sort()) {
      const file = path.join(dir, name);
      try {
        const raw: unknown = JSON.parse(await readFile(file, "utf8"));
        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
          dataset.skipped.push({ file, reason: parsed.error.issues[0]?.message ?? "invalid window" });
          continue;
        }
        dataset.entries.push({ label, file, samples: parsed.data });
      } catch (err) {
        dataset.skipped.push({ file, reason: describeError(err) });
      }
    }
  }

  if (dataset.skipped.length) {
    logger.warn(`window-store skipped ${dataset.skipped.length} invalid window file(s)`);
  }
  return dataset;
}

export function toFeatureTensor(samples: readonly FeatureSample[]): FeatureTensor {
  return [
    samples.map((s) => s.relativeVelocityY),
    samples.map((s) => s.relativeAccelerationY),
    samples.map((s) => s.palmStabilityScore),
  ];
}
