import winston from 'winston';
import { loggingConfig } from './config';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaString = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `${timestamp} [${level}]: ${message} ${metaString}`;
  })
);

const settings = loggingConfig();

export const logger = winston.createLogger({
  level: settings.level,
  format: logFormat,
  defaultMeta: { service: 'sox-engine' },
  silent: settings.isTest,
  transports: [
    new winston.transports.Console({
      format: settings.isDevelopment ? consoleFormat : logFormat,
      // keep stdout free for --json output
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
});
