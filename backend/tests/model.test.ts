import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import express from 'express';
import * as tf from '@tensorflow/tfjs';
import { classify } from '../src/services/classifier.js';
import { createModelProvider, loadModel, ModelProvider, resolveModelUrl } from '../src/services/model.js';
import { INPUT_SIZE, LESION_LABELS, type PreprocessedImage } from '../src/types/contracts.js';
import { startServer, type RunningServer } from './helpers.js';

let modelHost: RunningServer;

// Serves a tiny softmax model in the TF.js layers format.
beforeAll(async () => {
  const model = tf.sequential({
    layers: [
      tf.layers.globalAveragePooling2d({ inputShape: [INPUT_SIZE, INPUT_SIZE, 3] }),
      tf.layers.dense({ units: LESION_LABELS.length, activation: 'softmax' })
    ]
  });

  const saved: { artifacts?: tf.io.ModelArtifacts } = {};
  await model.save(
    tf.io.withSaveHandler(async artifacts => {
      saved.artifacts = artifacts;
      return { modelArtifactsInfo: { dateSaved: new Date(), modelTopologyType: 'JSON' } };
    })
  );
  model.dispose();

  const artifacts = saved.artifacts;
  if (!artifacts?.weightData) {
    throw new Error('model did not serialise its weights');
  }
  const chunks = Array.isArray(artifacts.weightData) ? artifacts.weightData : [artifacts.weightData];
  const weights = Buffer.concat(chunks.map(chunk => Buffer.from(chunk)));
  const modelJson = {
    format: 'layers-model',
    modelTopology: artifacts.modelTopology,
    weightsManifest: [{ paths: ['weights.bin'], weights: artifacts.weightSpecs }]
  };

  const app = express();
  app.get('/models/model.json', (_req, res) => res.json(modelJson));
  app.get('/models/weights.bin', (_req, res) => res.type('application/octet-stream').send(weights));
  modelHost = await startServer(app);
});

afterAll(async () => {
  await modelHost.close();
});

describe('resolveModelUrl', () => {
  it('rewrites gs:// locations to public storage URLs', () => {
    expect(resolveModelUrl('gs://lesion-models/v2/model.json')).toBe(
      'https://storage.googleapis.com/lesion-models/v2/model.json'
    );
  });

  it('leaves http URLs untouched', () => {
    expect(resolveModelUrl('https://models.example.com/model.json')).toBe('https://models.example.com/model.json');
  });
});

describe('ModelProvider', () => {
  it('reports an absent model as not ready', () => {
    const provider = new ModelProvider(null);

    expect(provider.isReady()).toBe(false);
    expect(provider.current()).toBeNull();
  });
});

describe('loadModel', () => {
  it('loads a layers model over HTTP that the classifier can run', async () => {
    const model = await loadModel(`${modelHost.url}/models/model.json`, 'layers');
    const image: PreprocessedImage = {
      shape: [1, INPUT_SIZE, INPUT_SIZE, 3],
      data: new Float32Array(INPUT_SIZE * INPUT_SIZE * 3).fill(0.25),
      format: 'png'
    };

    const result = await classify(model, image, { timeoutMs: 5_000 });

    expect(LESION_LABELS).toContain(result.label);
    expect(result.confidence).toBeGreaterThan(0);
    expect(result.confidence).toBeLessThanOrEqual(100);
  });
});

describe('createModelProvider', () => {
  it('starts without a model when no URL is configured', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const provider = await createModelProvider(undefined, 'layers');

    expect(provider.isReady()).toBe(false);
    expect(warn).toHaveBeenCalledWith('[model] MODEL_URL is not set; predictions are disabled');
    warn.mockRestore();
  });

  it('starts without a model when loading fails', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const provider = await createModelProvider(`${modelHost.url}/missing/model.json`, 'layers');

    expect(provider.isReady()).toBe(false);
    expect(error).toHaveBeenCalledWith('[model] Failed to load model:', expect.anything());
    error.mockRestore();
  });

  it('is ready once the model loads', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    const provider = await createModelProvider(`${modelHost.url}/models/model.json`, 'layers');

    expect(provider.isReady()).toBe(true);
    log.mockRestore();
  });
});
