import type { RecordingLabel, TapClassifier } from "@tapsense/tap-core";
import { describeError, RECORDING_LABELS } from "@tapsense/tap-core";
import { toFeatureTensor } from "./dataset";
import type { DatasetEntry } from "./dataset";

export interface EvaluationReport {
  labels: readonly RecordingLabel[];
  total: number;
  correct: number;
  accuracy: number;
  /** Rows are the recorded label, columns the prediction, both in `labels` order. */
  confusion: number[][];
  perClass: ClassReport[];
  failures: { file: string; reason: string }[];
}

export interface ClassReport {
  label: RecordingLabel;
  precision: number;
  recall: number;
  f1: number;
  /** Evaluated windows recorded under this label. */
  support: number;
}

/**
 * Runs every entry through the classifier in order. Predictions outside
 * `labels` count as wrong and are left out of the matrix.
 */
export async function evaluateClassifier(
  classifier: TapClassifier,
  entries: readonly DatasetEntry[],
  labels: readonly RecordingLabel[] = RECORDING_LABELS
): Promise<EvaluationReport> {
  const confusion = labels.map(() => labels.map(() => 0));
  const failures: EvaluationReport["failures"] = [];
  let total = 0;
  let correct = 0;

  for (const entry of entries) {
    const row = labels.indexOf(entry.label);
    if (row < 0) continue;
    let predicted: string;
    try {
      predicted = (await classifier.classify(toFeatureTensor(entry.samples))).label;
    } catch (err) {
      failures.push({ file: entry.file, reason: describeError(err) });
      continue;
    }
    total += 1;
    if (predicted === entry.label) correct += 1;
    const col = labels.findIndex((label) => label === predicted);
    if (col >= 0) confusion[row][col] += 1;
  }

  return {
    labels,
    total,
    correct,
    accuracy: total ? correct / total : 0,
    confusion,
    perClass: classReports(labels, confusion),
    failures,
  };
}

/** Precision, recall and F1 per label from a confusion matrix; 0 where undefined. */
export function classReports(labels: readonly RecordingLabel[], confusion: readonly number[][]): ClassReport[] {
  return labels.map((label, i) => {
    const hits = confusion[i][i];
    const support = confusion[i].reduce((sum, n) => sum + n, 0);
    const predicted = confusion.reduce((sum, row) => sum + row[i], 0);
    const precision = predicted ? hits / predicted : 0;
    const recall = support ? hits / support : 0;
    const f1 = precision + recall ? (2 * precision * recall) / (precision + recall) : 0;
    return { label, precision, recall, f1, support };
  });
}
