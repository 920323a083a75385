import { readFile } from "node:fs/promises";
import path from "node:path";
import { io } from "@tensorflow/tfjs-core";
import { loadLayersModel } from "@tensorflow/tfjs-layers";
import { ClassifierUnavailableError, describeError } from "@tapsense/tap-core";
import { z } from "zod";
import { ensureTfjsBackend } from "./backend";
import { TfjsTapClassifier } from "./TfjsTapClassifier";
import type { TfjsTapClassifierOptions } from "./TfjsTapClassifier";

const WeightEntrySchema = z.object({
  name: z.string(),
  shape: z.array(z.number().int().nonnegative()),
  dtype: z.enum(["float32", "int32", "bool"]),
});

export const ModelJsonSchema = z.object({
  modelTopology: z.record(z.unknown()),
  weightsManifest: z.array(
    z.object({
      paths: z.array(z.string().min(1)),
      weights: z.array(WeightEntrySchema),
    })
  ),
});

export type ModelJson = z.infer<typeof ModelJsonSchema>;

export interface LoadTapClassifierOptions extends TfjsTapClassifierOptions {
  modelFile?: string;
}

/**
 * Loads a tfjs-layers model saved as `model.json` plus weight shards from a
 * directory. Every failure surfaces as ClassifierUnavailableError.
 */
export async function loadTapClassifier(
  modelDir: string,
  options: LoadTapClassifierOptions = {}
): Promise<TfjsTapClassifier> {
  const { modelFile = "model.json", ...classifierOptions } = options;
  try {
    await ensureTfjsBackend();
    const raw: unknown = JSON.parse(await readFile(path.join(modelDir, modelFile), "utf8"));
    const manifest = ModelJsonSchema.parse(raw);

    const shards = await Promise.all(
      manifest.weightsManifest.flatMap((group) => group.paths).map((p) => readFile(path.join(modelDir, p)))
    );
    const weightData = new Uint8Array(shards.reduce((total, shard) => total + shard.byteLength, 0));
    let offset = 0;
    for (const shard of shards) {
      weightData.set(shard, offset);
      offset += shard.byteLength;
    }

    const model = await loadLayersModel(
      io.fromMemory({
        modelTopology: manifest.modelTopology,
        weightSpecs: manifest.weightsManifest.flatMap((group) => group.weights),
        weightData: weightData.buffer,
      })
    );
    return new TfjsTapClassifier(model, classifierOptions);
  } catch (err) {
    throw new ClassifierUnavailableError(`Cannot load tap classifier from ${modelDir}: ${describeError(err)}`, err);
  }
}
