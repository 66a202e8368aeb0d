import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { SPEAKER_LABELS_MAX, SPEAKER_LABELS_MIN } from '../config/settings';
import { AppError } from './errorHandler';

export const validate = (schema: Joi.ObjectSchema) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { error, value } = schema.validate(req.body ?? {}, {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      const errorMessage = error.details.map((detail) => detail.message).join(', ');
      next(new AppError(errorMessage, 400));
      return;
    }

    // Replace request body with validated value
    req.body = value;
    next();
  };
};

export interface DiarizeOptions {
  languageCode?: string;
  maxSpeakers?: number;
}

export const schemas = {
  diarize: Joi.object<DiarizeOptions>({
    languageCode: Joi.string()
      .pattern(/^[a-z]{2,3}-[A-Z]{2}$/)
      .optional()
      .messages({ 'string.pattern.base': '"languageCode" must look like ja-JP' }),
    maxSpeakers: Joi.number().integer().min(SPEAKER_LABELS_MIN).max(SPEAKER_LABELS_MAX).optional(),
  }),
};
