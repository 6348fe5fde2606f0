import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import pg from 'pg';
import { config } from '@/config/config';
import { logger } from '@/utils/logger';
import { ApiError } from '@/utils/ApiError';

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  logger.error(`${error.message} - ${req.originalUrl} - ${req.method} - ${req.ip}`);

  const development = config.nodeEnv === 'development';

  if (error instanceof ApiError) {
    res.status(error.statusCode).json({
      success: false,
      message: error.message,
      ...(error.errors && { errors: error.errors }),
      ...(development && { stack: error.stack })
    });
    return;
  }

  // Upload errors
  if (error instanceof multer.MulterError) {
    res.status(400).json({
      success: false,
      message: 'Validation failed',
      errors: { [error.field ?? 'file']: [error.message] }
    });
    return;
  }

  // Database constraint errors
  if (error instanceof pg.DatabaseError && error.code === '23505') {
    res.status(400).json({
      success: false,
      message: 'Database operation failed',
      ...(development && { error: error.message })
    });
    return;
  }

  // Malformed JSON bodies from express.json()
  if (error instanceof SyntaxError && 'body' in error) {
    res.status(400).json({
      success: false,
      message: 'Malformed request body'
    });
    return;
  }

  // Default error
  res.status(500).json({
    success: false,
    message: 'Internal server error',
    ...(development && { stack: error.stack })
  });
};
