import { Router } from 'express';
import type { DiarizationService } from '../services/diarization.service';
import { createDiarizationRouter } from './diarization.routes';

export const createApiRouter = (
  service: Pick<DiarizationService, 'processAudio'>,
  maxFileSize: number
): Router => {
  const router = Router();

  router.use('/', createDiarizationRouter(service, maxFileSize));

  // Health check for API
  router.get('/health', (req, res) => {
    res.json({
      success: true,
      message: 'API is running',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
