import { promises as fs } from 'fs';
import * as path from 'path';
import * as tf from '@tensorflow/tfjs';

type WeightDtype = tf.io.WeightsManifestEntry['dtype'];

const WEIGHT_DTYPES: readonly WeightDtype[] = ['float32', 'int32', 'bool', 'string', 'complex64'];

interface WeightsGroup {
  paths: string[];
  weights: tf.io.WeightsManifestEntry[];
}

interface LayersModelJson {
  modelTopology: object;
  weightsManifest: WeightsGroup[];
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, 'utf8');
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

/**
 * Loads a Keras model exported in the TensorFlow.js layers format
 * (`model.json` plus the binary weight shards listed in its manifest).
 */
export async function loadLayersModel(modelJsonPath: string): Promise<tf.LayersModel> {
  const modelJson = parseLayersModelJson(await readJsonFile(modelJsonPath), modelJsonPath);
  const baseDir = path.dirname(modelJsonPath);

  const shardPaths = modelJson.weightsManifest.flatMap((group) => group.paths);
  const shards = await Promise.all(shardPaths.map((shard) => fs.readFile(path.join(baseDir, shard))));

  return tf.loadLayersModel(
    tf.io.fromMemory({
      modelTopology: modelJson.modelTopology,
      weightSpecs: modelJson.weightsManifest.flatMap((group) => group.weights),
      weightData: concatShards(shards),
    }),
  );
}

function concatShards(shards: Buffer[]): ArrayBuffer {
  const total = shards.reduce((sum, shard) => sum + shard.byteLength, 0);
  const weightData = new ArrayBuffer(total);
  const view = new Uint8Array(weightData);
  let offset = 0;
  for (const shard of shards) {
    view.set(shard, offset);
    offset += shard.byteLength;
  }
  return weightData;
}

function parseLayersModelJson(value: unknown, source: string): LayersModelJson {
  if (!isObject(value)) {
    throw new Error(`${source} is not a model definition`);
  }
  const format: unknown = value['format'];
  if (format !== undefined && format !== 'layers-model') {
    throw new Error(`${source} has unsupported model format ${String(format)}`);
  }
  const modelTopology = value['modelTopology'];
  if (!isObject(modelTopology)) {
    throw new Error(`${source} has no modelTopology`);
  }
  const manifest = value['weightsManifest'];
  if (!Array.isArray(manifest)) {
    throw new Error(`${source} has no weightsManifest`);
  }
  return {
    modelTopology,
    weightsManifest: manifest.map((group: unknown) => parseWeightsGroup(group, source)),
  };
}

function parseWeightsGroup(value: unknown, source: string): WeightsGroup {
  if (!isObject(value)) {
    throw new Error(`${source} has a malformed weightsManifest group`);
  }
  const paths = value['paths'];
  const weights = value['weights'];
  if (!Array.isArray(paths) || !paths.every((p): p is string => typeof p === 'string')) {
    throw new Error(`${source} has a weightsManifest group without paths`);
  }
  if (!Array.isArray(weights)) {
    throw new Error(`${source} has a weightsManifest group without weights`);
  }
  return { paths, weights: weights.map((entry: unknown) => parseWeightEntry(entry, source)) };
}

function parseWeightEntry(value: unknown, source: string): tf.io.WeightsManifestEntry {
  if (!isObject(value)) {
    throw new Error(`${source} has a malformed weight entry`);
  }
  const { name, shape, dtype, quantization } = value;
  if (typeof name !== 'string' || !Array.isArray(shape) || !shape.every(isInteger)) {
    throw new Error(`${source} has a malformed weight entry`);
  }
  const weightDtype = WEIGHT_DTYPES.find((candidate) => candidate === dtype);
  if (!weightDtype) {
    throw new Error(`${source} weight ${name} has unsupported dtype ${String(dtype)}`);
  }
  if (quantization !== undefined) {
    throw new Error(`${source} weight ${name} is quantized, which is not supported`);
  }
  return { name, shape, dtype: weightDtype };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}
