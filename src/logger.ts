import winston from 'winston';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logDir = process.env['LOG_DIR'] ?? 'logs';

// Custom log format
const logFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  let log = `${timestamp} [${level}]: ${message}`;

  // Add stack trace for errors
  if (stack) {
    log += `\n${stack}`;
  }

  // Add metadata if present
  if (Object.keys(meta).length > 0) {
    log += ` ${JSON.stringify(meta)}`;
  }

  return log;
});

const isTest = process.env['NODE_ENV'] === 'test';

// File output is skipped under test runs
const fileTransports = isTest
  ? []
  : [
      // File output for errors
      new winston.transports.File({
        filename: `${logDir}/error.log`,
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      // File output for all logs
      new winston.transports.File({
        filename: `${logDir}/combined.log`,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
    ];

export const logger = winston.createLogger({
  level: process.env['LOG_LEVEL'] ?? 'info',
  silent: isTest,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    logFormat
  ),
  transports: [
    // Console output with colors
    new winston.transports.Console({
      format: combine(
        colorize(),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
      ),
    }),
    ...fileTransports,
  ],
});

/**
 * Mask sensitive data in logs
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return '****';
  }
  return `${secret.substring(0, 4)}****${secret.substring(secret.length - 4)}`;
}

/**
 * Normalize an unknown thrown value to a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
