import path from 'path';
import winston from 'winston';
import { config } from '../config';
import { getDocumentContext } from './documentContext';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom log format
const logFormat = printf(({ level, message, timestamp, ...metadata }) => {
  const ctx = getDocumentContext();
  const ctxMeta = ctx?.file ? { file: ctx.file } : {};
  const mergedMeta = { ...ctxMeta, ...metadata };

  let msg = `${timestamp} [${level}]: ${message}`;

  const metaKeys = Object.keys(mergedMeta);
  if (metaKeys.length > 0) {
    msg += ` ${JSON.stringify(mergedMeta)}`;
  }

  return msg;
});

// Create logger instance
const logger = winston.createLogger({
  level: config.logLevel,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(
        colorize(),
        logFormat
      ),
    }),
  ],
});

export function logFilePaths(logDir: string): { error: string; combined: string } {
  return {
    error: path.join(logDir, 'error.log'),
    combined: path.join(logDir, 'combined.log'),
  };
}

// File transports only when a log directory is configured
if (config.logDir) {
  const files = logFilePaths(config.logDir);
  logger.add(
    new winston.transports.File({
      filename: files.error,
      level: 'error',
    })
  );
  logger.add(
    new winston.transports.File({
      filename: files.combined,
    })
  );
}

export default logger;
