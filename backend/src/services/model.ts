import * as tf from '@tensorflow/tfjs';
import type { ModelFormat } from '../config.js';
import { InferenceError } from '../errors.js';

/** The only capability the service needs from a loaded model. */
export interface LesionModel {
  predict(input: tf.Tensor4D): tf.Tensor | tf.Tensor[];
}

/**
 * Holds the model loaded at startup. The handle may be absent when loading
 * failed; callers check `current()` on every request.
 */
export class ModelProvider {
  constructor(private readonly model: LesionModel | null) {}

  current(): LesionModel | null {
    return this.model;
  }

  isReady(): boolean {
    return this.model !== null;
  }
}

export function resolveModelUrl(url: string): string {
  return url.startsWith('gs://') ? url.replace('gs://', 'https://storage.googleapis.com/') : url;
}

function fromGraphModel(graph: tf.GraphModel): LesionModel {
  return {
    predict(input) {
      const output = graph.predict(input);
      if (output instanceof tf.Tensor || Array.isArray(output)) {
        return output;
      }
      throw new InferenceError('Graph model returned named outputs; expected a score tensor');
    }
  };
}

export async function loadModel(url: string, format: ModelFormat): Promise<LesionModel> {
  const resolved = resolveModelUrl(url);
  if (format === 'graph') {
    return fromGraphModel(await tf.loadGraphModel(resolved));
  }
  return tf.loadLayersModel(resolved);
}

/**
 * Startup helper: a model that fails to load leaves the service running with
 * `/predict` answering 500 until the process is restarted with a working URL.
 */
export async function createModelProvider(url: string | undefined, format: ModelFormat): Promise<ModelProvider> {
  if (!url) {
    console.warn('[model] MODEL_URL is not set; predictions are disabled');
    return new ModelProvider(null);
  }

  try {
    const model = await loadModel(url, format);
    console.log(`[model] Loaded ${format} model from ${resolveModelUrl(url)}`);
    return new ModelProvider(model);
  } catch (error) {
    console.error('[model] Failed to load model:', error);
    return new ModelProvider(null);
  }
}
