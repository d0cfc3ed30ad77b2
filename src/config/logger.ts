import winston from 'winston';
import { env, Environment } from './environment';

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

/**
 * Build the application logger.
 *
 * A single console transport writing to stderr, so report lines on stdout stay clean.
 * Silent under NODE_ENV=test.
 */
export function createAppLogger(
  settings: Pick<Environment, 'LOG_LEVEL' | 'NODE_ENV'>
): winston.Logger {
  const instance = winston.createLogger({
    level: settings.LOG_LEVEL,
    format: logFormat,
    defaultMeta: { service: 'bottle-stock-tracker' },
    transports: [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'debug'],
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, ...meta }) => {
            const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
            return `${timestamp} [${level}]: ${message}${metaStr}`;
          })
        ),
      }),
    ],
  });

  // Suppress logs in test environment
  if (settings.NODE_ENV === 'test') {
    instance.transports.forEach((t) => (t.silent = true));
  }

  return instance;
}

export const logger = createAppLogger(env);
