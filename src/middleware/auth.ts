import { Request, Response, NextFunction, RequestHandler } from 'express';
import Joi from 'joi';
import jwt from 'jsonwebtoken';
import { config } from '@/config/config';
import { ApiError } from '@/utils/ApiError';
import type { UserRepository } from '@/repositories/user.repository';

const extractToken = (req: Request): string | undefined => {
  const header = req.header('Authorization');
  if (header?.startsWith('Bearer ')) {
    return header.slice('Bearer '.length);
  }

  const cookieToken: unknown = req.cookies?.accessToken;
  return typeof cookieToken === 'string' ? cookieToken : undefined;
};

const userIdSchema = Joi.string().guid({ separator: '-' }).required();

export const authenticate = (users: UserRepository): RequestHandler => {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const token = extractToken(req);

      if (!token) {
        throw ApiError.unauthorized('Access token required');
      }

      const decoded = jwt.verify(token, config.jwtSecret);
      const userId: unknown = typeof decoded === 'object' ? decoded.userId : undefined;

      if (typeof userId !== 'string' || userIdSchema.validate(userId).error) {
        throw ApiError.unauthorized('Invalid token');
      }

      const user = await users.findById(userId);

      if (!user) {
        throw ApiError.unauthorized('Invalid token');
      }

      if (user.status !== 'ACTIVE') {
        throw ApiError.unauthorized('Account is not active');
      }

      req.user = { id: user.id, email: user.email, username: user.username, status: user.status };
      next();
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        next(ApiError.unauthorized('Token expired'));
      } else if (error instanceof jwt.JsonWebTokenError) {
        next(ApiError.unauthorized('Invalid token'));
      } else {
        next(error);
      }
    }
  };
};

/** The authenticated user's id; only valid behind `authenticate`. */
export const currentUserId = (req: Request): string => {
  if (!req.user) {
    throw ApiError.unauthorized('Authentication required');
  }
  return req.user.id;
};
