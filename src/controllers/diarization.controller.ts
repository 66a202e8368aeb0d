import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { assertAcceptableUpload } from '../middleware/upload';
import type { DiarizeOptions } from '../middleware/validate';
import type { DiarizationService } from '../services/diarization.service';
import { InvalidUploadError } from '../utils/errors';
import { logger } from '../config/logger';

export const createDiarizationController = (service: Pick<DiarizationService, 'processAudio'>) => ({
  /**
   * Upload an audio file and get back a speaker-attributed transcript
   */
  diarize: asyncHandler(async (req: Request, res: Response) => {
    const file = req.file;
    if (!file) {
      throw new InvalidUploadError('No file uploaded');
    }

    assertAcceptableUpload(file.originalname, file.mimetype);

    const options: DiarizeOptions = req.body ?? {};
    const result = await service.processAudio(file.buffer, file.originalname, {
      languageCode: options.languageCode,
      maxSpeakers: options.maxSpeakers,
    });

    logger.info(`Diarization finished for ${file.originalname}: ${result.transcription.length} segments`);
    res.json(result);
  }),
});
