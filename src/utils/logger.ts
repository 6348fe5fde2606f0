import winston from 'winston';
import { config } from '@/config/config';

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: config.nodeEnv === 'production'
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), winston.format.simple())
  })
];

if (config.nodeEnv !== 'test') {
  transports.push(new winston.transports.File({ filename: config.logFile }));
}

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'communities-api' },
  transports
});

export default logger;
