import express, { type Express } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { createPredictRouter } from './routes/predict.js';
import { PredictionService, type PredictionServiceOptions } from './services/prediction.js';

export type AppDependencies = PredictionServiceOptions & {
  rateLimit: { windowMs: number; max: number };
};

export function createApp(deps: AppDependencies): Express {
  const { rateLimit: limits, ...serviceOptions } = deps;

  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use(
    rateLimit({
      windowMs: limits.windowMs,
      max: limits.max
    })
  );

  app.get('/health', (_req, res) => res.json({ ok: true, model: deps.models.isReady() ? 'ready' : 'unavailable' }));
  app.use('/predict', createPredictRouter(new PredictionService(serviceOptions)));

  return app;
}
