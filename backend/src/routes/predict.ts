import { type Request, type Response, Router } from 'express';
import multer from 'multer';
import { type ApiError, toApiError, toErrorBody } from '../errors.js';
import { type PredictionService, toPredictionData } from '../services/prediction.js';
import type { SuccessBody } from '../types/contracts.js';

function sendError(res: Response, error: ApiError): Response {
  return res.status(error.status).json(toErrorBody(error));
}

export function createPredictRouter(service: PredictionService): Router {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: service.maxImageSizeBytes, files: 1 }
  });

  function runUpload(req: Request, res: Response): Promise<void> {
    return new Promise((resolve, reject) => {
      upload.single('image')(req, res, err => {
        if (err) return reject(err);
        return resolve();
      });
    });
  }

  const router = Router();

  router.post('/', async (req, res) => {
    const available = service.model();
    if (!available.ok) {
      console.error(`[predict] ${available.error.message}`);
      return sendError(res, available.error);
    }

    try {
      await runUpload(req, res);
    } catch (error: unknown) {
      const apiError = toApiError(error, service.maxImageSizeBytes);
      if (apiError.kind === 'error') {
        console.error('[predict] Upload failed:', error);
      }
      return sendError(res, apiError);
    }

    const outcome = await service.predict(available.model, req.file?.buffer);
    if (!outcome.ok) {
      return sendError(res, outcome.error);
    }

    const body: SuccessBody = {
      status: 'success',
      message: outcome.message,
      data: toPredictionData(outcome.record)
    };
    return res.status(201).json(body);
  });

  return router;
}
