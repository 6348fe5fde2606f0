import dotenv from 'dotenv';

dotenv.config();

// Validate required environment variables
const requiredEnvVars = ['DATABASE_URL', 'JWT_SECRET'] as const;

for (const envVar of requiredEnvVars) {
  if (!process.env[envVar]) {
    throw new Error(`Missing required environment variable: ${envVar}`);
  }
}

const int = (value: string | undefined, fallback: number): number =>
  parseInt(value || String(fallback), 10);

export const config = {
  // Server
  nodeEnv: process.env.NODE_ENV || 'development',
  port: int(process.env.PORT, 3000),
  apiVersion: process.env.API_VERSION || 'v1',

  // Database
  databaseUrl: process.env.DATABASE_URL || '',

  // JWT
  jwtSecret: process.env.JWT_SECRET || '',

  // Rate Limiting
  rateLimitWindowMs: int(process.env.RATE_LIMIT_WINDOW_MS, 900000),
  rateLimitMaxRequests: int(process.env.RATE_LIMIT_MAX_REQUESTS, 100),

  // File Upload
  maxFileSize: int(process.env.MAX_FILE_SIZE, 10485760),
  uploadDir: process.env.UPLOAD_DIR || 'uploads',

  // Security
  corsOrigin: process.env.CORS_ORIGIN?.split(',') || ['http://localhost:3000'],

  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',
  logFile: process.env.LOG_FILE || 'logs/app.log',

  // Communities
  community: {
    categoriesMinAmount: int(process.env.COMMUNITY_CATEGORIES_MIN_AMOUNT, 1),
    categoriesMaxAmount: int(process.env.COMMUNITY_CATEGORIES_MAX_AMOUNT, 3),
    nameMaxLength: int(process.env.COMMUNITY_NAME_MAX_LENGTH, 32),
    titleMaxLength: int(process.env.COMMUNITY_TITLE_MAX_LENGTH, 32),
    descriptionMaxLength: int(process.env.COMMUNITY_DESCRIPTION_MAX_LENGTH, 500),
    rulesMaxLength: int(process.env.COMMUNITY_RULES_MAX_LENGTH, 1500),
    userAdjectiveMaxLength: int(process.env.COMMUNITY_USER_ADJECTIVE_MAX_LENGTH, 16),
    usersAdjectiveMaxLength: int(process.env.COMMUNITY_USERS_ADJECTIVE_MAX_LENGTH, 16)
  }
};

export type CommunityConfig = typeof config.community;
