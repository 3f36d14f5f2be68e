import winston from 'winston';
import { getEnvironment } from './environment.js';

const env = getEnvironment();

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'picture-book-workflow' },
  transports: [
    new winston.transports.Console({
      silent: env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      ),
    }),
  ],
});

export { logger };
