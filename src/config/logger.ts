import winston from 'winston';
import { env } from './env';

const isTest = env.api.nodeEnv === 'test';

// Create logger instance
export const logger = winston.createLogger({
  level: env.logging.level,
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'video-metrics-answer' },
  transports: [
    // Write to console (stderr, so stdout carries only CLI replies)
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          return `${timestamp} [${level}]: ${message} ${
            Object.keys(meta).length ? JSON.stringify(meta) : ''
          }`;
        })
      )
    }),
  ],
});

// Write to file everywhere except tests
if (!isTest && env.logging.file) {
  logger.add(new winston.transports.File({
    filename: env.logging.file,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    )
  }));
}
