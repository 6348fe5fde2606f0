import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import cookieParser from 'cookie-parser';
import rateLimit from 'express-rate-limit';
import { config } from '@/config/config';
import { logger } from '@/utils/logger';
import { authenticate } from '@/middleware/auth';
import { errorHandler } from '@/middleware/errorHandler';
import { notFoundHandler } from '@/middleware/notFoundHandler';
import { createCommunityRoutes } from '@/routes/community.routes';
import { createCategoryRoutes } from '@/routes/category.routes';
import { CommunityService } from '@/services/community.service';
import type { UserRepository } from '@/repositories/user.repository';
import type { CommunityRepository } from '@/repositories/community.repository';
import type { CategoryRepository } from '@/repositories/category.repository';

export interface AppRepositories {
  users: UserRepository;
  communities: CommunityRepository;
  categories: CategoryRepository;
}

export const createApp = (repositories: AppRepositories): Express => {
  const app = express();
  const communityService = new CommunityService(repositories.communities, repositories.categories);
  const apiPrefix = `/api/${config.apiVersion}`;

  // Security middleware
  app.use(helmet());
  app.use(cors({
    origin: config.corsOrigin,
    credentials: true
  }));

  // Rate limiting
  app.use('/api/', rateLimit({
    windowMs: config.rateLimitWindowMs,
    max: config.rateLimitMaxRequests,
    message: 'Too many requests from this IP, please try again later.'
  }));

  // Body parsing middleware
  app.use(compression());
  app.use(cookieParser());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  // Static file serving for uploads
  app.use('/uploads', express.static(config.uploadDir));

  // Logging middleware
  app.use(morgan('combined', { stream: { write: (message) => logger.info(message.trim()) } }));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv
    });
  });

  // API routes
  app.use(apiPrefix, authenticate(repositories.users));
  app.use(`${apiPrefix}/categories`, createCategoryRoutes(repositories.categories));
  app.use(apiPrefix, createCommunityRoutes(communityService));

  // Error handling middleware
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
