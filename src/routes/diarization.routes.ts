import { Router } from 'express';
import { createDiarizationController } from '../controllers/diarization.controller';
import { createAudioUpload } from '../middleware/upload';
import { validate, schemas } from '../middleware/validate';
import type { DiarizationService } from '../services/diarization.service';

export const createDiarizationRouter = (
  service: Pick<DiarizationService, 'processAudio'>,
  maxFileSize: number
): Router => {
  const router = Router();
  const controller = createDiarizationController(service);
  const upload = createAudioUpload(maxFileSize);

  // Speaker-attributed transcription (mp4, m4a, mp3, wav)
  router.post('/diarize', upload.single('file'), validate(schemas.diarize), controller.diarize);

  return router;
};
