import * as tf from '@tensorflow/tfjs';
import { InferenceError, TimeoutError } from '../errors.js';
import { LESION_LABELS, type InferenceResult, type PreprocessedImage } from '../types/contracts.js';
import { withTimeout } from '../utils/timeout.js';
import type { LesionModel } from './model.js';

export type ClassifyOptions = {
  timeoutMs: number;
};

/** Index of the highest score; the first index wins on exact ties. */
export function argMax(scores: ArrayLike<number>): number {
  let best = 0;
  for (let i = 1; i < scores.length; i += 1) {
    if (scores[i] > scores[best]) {
      best = i;
    }
  }
  return best;
}

export function toInferenceResult(scores: ArrayLike<number>): InferenceResult {
  if (scores.length !== LESION_LABELS.length) {
    throw new InferenceError(`Model returned ${scores.length} scores, expected ${LESION_LABELS.length}`);
  }

  for (let i = 0; i < scores.length; i += 1) {
    const score = scores[i];
    if (!Number.isFinite(score) || score < 0 || score > 1) {
      throw new InferenceError(`Model returned an out-of-range score (${score})`);
    }
  }

  const index = argMax(scores);
  const top = scores[index];
  return { confidence: top * 100, label: LESION_LABELS[index] };
}

async function readScores(model: LesionModel, image: PreprocessedImage): Promise<ArrayLike<number>> {
  const input = tf.tensor4d(image.data, [...image.shape]);
  let output: tf.Tensor | tf.Tensor[];
  try {
    output = model.predict(input);
  } catch (error) {
    throw new InferenceError('Model invocation failed', { cause: error });
  } finally {
    input.dispose();
  }

  try {
    const scores = Array.isArray(output) ? output[0] : output;
    if (!scores) {
      throw new InferenceError('Model returned no output tensor');
    }
    return await scores.data();
  } finally {
    tf.dispose(output);
  }
}

export async function classify(
  model: LesionModel,
  image: PreprocessedImage,
  options: ClassifyOptions
): Promise<InferenceResult> {
  let scores: ArrayLike<number>;
  try {
    scores = await withTimeout(readScores(model, image), options.timeoutMs, 'Model inference');
  } catch (error) {
    if (error instanceof TimeoutError) {
      console.error(`[classifier] ${error.message}`);
      throw new InferenceError(error.message, { cause: error });
    }
    if (error instanceof InferenceError) {
      throw error;
    }
    throw new InferenceError('Reading model output failed', { cause: error });
  }

  return toInferenceResult(scores);
}
