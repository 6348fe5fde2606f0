import { Request, Response, NextFunction } from 'express';
import { ApiError } from '@/utils/ApiError';

export const notFoundHandler = (req: Request, res: Response, next: NextFunction): void => {
  next(ApiError.notFound(`Route not found: ${req.method} ${req.originalUrl}`));
};
