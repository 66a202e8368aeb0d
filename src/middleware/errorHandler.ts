import { Request, Response, NextFunction, RequestHandler } from 'express';
import { MulterError } from 'multer';
import { logger } from '../config/logger';

/**
 * Error carrying the HTTP status it should be answered with.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly isOperational: boolean;

  constructor(message: string, statusCode: number = 500, isOperational: boolean = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
  }
}

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Forward rejections of an async handler to the error middleware.
 */
export const asyncHandler = (fn: AsyncRequestHandler): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // express recognises error middleware by arity
  _next: NextFunction
): void => {
  if (err instanceof AppError && err.statusCode < 500) {
    logger.warn(`${req.method} ${req.path} rejected: ${err.message}`);
    res.status(err.statusCode).json({ success: false, message: err.message });
    return;
  }

  if (err instanceof MulterError) {
    logger.warn(`${req.method} ${req.path} upload rejected: ${err.message}`);
    res.status(400).json({ success: false, message: err.message });
    return;
  }

  const message = err instanceof Error ? err.message : String(err);
  const statusCode = err instanceof AppError ? err.statusCode : 500;

  logger.error(`${req.method} ${req.path} failed`, err instanceof Error ? err : { error: message });

  res.status(statusCode).json({
    success: false,
    message: `An error occurred: ${message}`,
  });
};
