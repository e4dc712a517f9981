import winston from 'winston';
import { env } from './environment';

const LOG_FILE_MAX_BYTES = 5 * 1024 * 1024;

// Structured JSON for file transports
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Single-line console output; the component tag goes in front of the message
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, component, service: _service, ...meta }) => {
    const tag = typeof component === 'string' ? `[${component}] ` : '';
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${tag}${message}${metaStr}`;
  })
);

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: logFormat,
  defaultMeta: { service: 'checklist-api' },
  transports: [new winston.transports.Console({ format: consoleFormat })],
});

if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      maxsize: LOG_FILE_MAX_BYTES,
      maxFiles: 5,
    })
  );

  logger.add(
    new winston.transports.File({
      filename: 'logs/checklist.log',
      maxsize: LOG_FILE_MAX_BYTES,
      maxFiles: 5,
    })
  );
}

// Suppress logs in test environment
if (env.NODE_ENV === 'test') {
  logger.transports.forEach((t) => (t.silent = true));
}

/**
 * Logger tagged with the component that emits it
 */
export const createComponentLogger = (component: string): winston.Logger =>
  logger.child({ component });
