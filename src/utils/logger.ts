import winston from 'winston';
import type { AppConfig, LogLevel } from '../config.js';
import { LOG_LEVELS } from '../config.js';

// stdout carries the command output, so every level goes to stderr
const STDERR_LEVELS: string[] = [...LOG_LEVELS];

const baseFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
);

const jsonFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  return JSON.stringify({
    timestamp,
    level,
    message,
    ...meta,
  });
});

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
    const metaString = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `${timestamp} ${level}: ${message} ${metaString}`.trimEnd();
  }),
);

function createConsoleTransport(production: boolean): winston.transports.ConsoleTransportInstance {
  return new winston.transports.Console({
    stderrLevels: STDERR_LEVELS,
    format: production ? jsonFormat : consoleFormat,
  });
}

const consoleTransport = createConsoleTransport(process.env.NODE_ENV === 'production');

export const logger = winston.createLogger({
  level: 'warn',
  format: baseFormat,
  defaultMeta: { service: 'metric-sql' },
  transports: [consoleTransport],
});

// Specific loggers for different components
export const manifestLogger = logger.child({ component: 'manifest' });
export const engineLogger = logger.child({ component: 'engine' });
export const commandLogger = logger.child({ component: 'command' });

/** Applies the loaded configuration to the shared logger and its children. */
export function configureLogger(config: AppConfig): void {
  logger.level = config.logLevel;
  consoleTransport.format = config.production ? jsonFormat : consoleFormat;
}

/**
 * Logger for a single diagnostic channel with its own minimum severity,
 * independent of the shared logger's level.
 */
export function createChannelLogger(channel: string, level: LogLevel): winston.Logger {
  return winston.createLogger({
    level,
    format: baseFormat,
    defaultMeta: { service: 'metric-sql', channel },
    transports: [createConsoleTransport(process.env.NODE_ENV === 'production')],
  });
}
