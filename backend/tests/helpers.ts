import type { Server } from 'http';
import type { Express } from 'express';
import sharp from 'sharp';
import * as tf from '@tensorflow/tfjs';
import type { LesionModel } from '../src/services/model.js';
import type { PredictionRecordStore } from '../src/services/predictionStore.js';
import type { PredictionRecord } from '../src/types/contracts.js';

export type Colour = { r: number; g: number; b: number };

export async function makeImage(
  width: number,
  height: number,
  format: 'jpeg' | 'png' = 'jpeg',
  background: Colour = { r: 180, g: 90, b: 70 }
): Promise<Buffer> {
  const image = sharp({ create: { width, height, channels: 3, background } });
  return format === 'png' ? image.png().toBuffer() : image.jpeg().toBuffer();
}

export class FakeModel implements LesionModel {
  readonly inputShapes: number[][] = [];

  constructor(private readonly respond: () => tf.Tensor | tf.Tensor[]) {}

  predict(input: tf.Tensor4D): tf.Tensor | tf.Tensor[] {
    this.inputShapes.push([...input.shape]);
    return this.respond();
  }
}

export function scoringModel(scores: number[]): FakeModel {
  return new FakeModel(() => tf.tensor2d([scores]));
}

export class InMemoryPredictionStore implements PredictionRecordStore {
  readonly records: PredictionRecord[] = [];

  async save(record: PredictionRecord): Promise<void> {
    this.records.push(record);
  }
}

export class FailingPredictionStore implements PredictionRecordStore {
  async save(): Promise<void> {
    throw new Error('store offline');
  }
}

export type RunningServer = { url: string; close: () => Promise<void> };

export function startServer(app: Express): Promise<RunningServer> {
  return new Promise(resolve => {
    const server: Server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      resolve({
        url: `http://127.0.0.1:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close(err => (err ? fail(err) : done()));
          })
      });
    });
  });
}

export function imageForm(buffer: Buffer, field = 'image', filename = 'lesion.jpg', type = 'image/jpeg'): FormData {
  const form = new FormData();
  form.append(field, new Blob([new Uint8Array(buffer)], { type }), filename);
  return form;
}
