import { randomUUID } from 'crypto';
import { ApiError, ClientError, UnavailableError, toApiError } from '../errors.js';
import type { PredictionData, PredictionRecord, PreprocessedImage } from '../types/contracts.js';
import { withTimeout } from '../utils/timeout.js';
import { resolveAdvisory } from './advisory.js';
import { classify } from './classifier.js';
import type { ImageArchive } from './imageArchive.js';
import type { LesionModel, ModelProvider } from './model.js';
import type { PredictionRecordStore } from './predictionStore.js';
import { preprocessImage } from './preprocess.js';

export const SUCCESS_MESSAGE = 'Model is predicted successfully.';
export const BELOW_THRESHOLD_MESSAGE =
  'Model is predicted successfully but under threshold. Please use the correct picture.';

export type PredictionServiceOptions = {
  models: ModelProvider;
  store: PredictionRecordStore;
  archive?: ImageArchive | null;
  maxImageSizeBytes: number;
  inferenceTimeoutMs: number;
  persistTimeoutMs: number;
  confidenceThreshold: number;
};

export type PredictionOutcome =
  | { ok: true; record: PredictionRecord; message: string }
  | { ok: false; error: ApiError };

export function resultMessage(confidence: number, threshold: number): string {
  return confidence > threshold ? SUCCESS_MESSAGE : BELOW_THRESHOLD_MESSAGE;
}

export function toPredictionData(record: PredictionRecord): PredictionData {
  return {
    id: record.id,
    result: record.result,
    explanation: record.explanation,
    suggestion: record.suggestion,
    confidenceScore: record.confidence,
    createdAt: record.createdAt
  };
}

/**
 * Runs one upload through preprocess -> classify -> advise -> record.
 * Expected failures come back as `{ ok: false }`; the record write happens in
 * the background and never changes the outcome.
 */
export class PredictionService {
  constructor(private readonly options: PredictionServiceOptions) {}

  get maxImageSizeBytes(): number {
    return this.options.maxImageSizeBytes;
  }

  /** Checked before the upload is read. */
  model(): { ok: true; model: LesionModel } | { ok: false; error: ApiError } {
    const model = this.options.models.current();
    return model ? { ok: true, model } : { ok: false, error: new UnavailableError() };
  }

  async predict(model: LesionModel, upload: Buffer | undefined): Promise<PredictionOutcome> {
    if (!upload) {
      return { ok: false, error: new ClientError('No image provided', 'MISSING_IMAGE') };
    }

    try {
      const image = await preprocessImage(upload);
      const { confidence, label } = await classify(model, image, { timeoutMs: this.options.inferenceTimeoutMs });
      const { explanation, suggestion } = resolveAdvisory(label);

      const record: PredictionRecord = Object.freeze({
        id: randomUUID(),
        result: label,
        explanation,
        suggestion,
        confidence,
        createdAt: new Date().toISOString()
      });

      this.persist(record, upload, image);

      return { ok: true, record, message: resultMessage(confidence, this.options.confidenceThreshold) };
    } catch (error: unknown) {
      const apiError = toApiError(error, this.options.maxImageSizeBytes);
      if (apiError.kind === 'error') {
        console.error('[predict] Prediction failed:', error);
      }
      return { ok: false, error: apiError };
    }
  }

  private persist(record: PredictionRecord, upload: Buffer, image: PreprocessedImage): void {
    const { store, archive, persistTimeoutMs } = this.options;

    const writes: Array<{ target: string; done: Promise<unknown> }> = [
      {
        target: 'record',
        done: withTimeout(Promise.resolve().then(() => store.save(record)), persistTimeoutMs, `Saving prediction ${record.id}`)
      }
    ];

    if (archive) {
      writes.push({
        target: 'image',
        done: withTimeout(
          Promise.resolve().then(() => archive.store(record.id, upload, image.format)),
          persistTimeoutMs,
          `Archiving image ${record.id}`
        )
      });
    }

    void Promise.allSettled(writes.map(write => write.done)).then(results => {
      results.forEach((result, index) => {
        if (result.status === 'rejected') {
          console.error(`[predict] Failed to persist ${writes[index].target} for ${record.id}:`, result.reason);
        }
      });
    });
  }
}
