import { createServer } from 'http';
import { config } from '@/config/config';
import { db, disconnect } from '@/config/database';
import { logger } from '@/utils/logger';
import { createApp } from '@/app';
import { DrizzleUserRepository } from '@/repositories/user.repository';
import { DrizzleCommunityRepository } from '@/repositories/community.repository';
import { DrizzleCategoryRepository } from '@/repositories/category.repository';

const app = createApp({
  users: new DrizzleUserRepository(db),
  communities: new DrizzleCommunityRepository(db),
  categories: new DrizzleCategoryRepository(db)
});

const server = createServer(app);

server.listen(config.port, () => {
  logger.info(`Server running on port ${config.port} in ${config.nodeEnv} mode`);
});

// Graceful shutdown
const shutdown = (signal: string) => {
  logger.info(`${signal} received, shutting down`);
  server.close(() => {
    disconnect()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(`Failed to close database pool: ${String(error)}`);
        process.exit(1);
      });
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
