/**
 * Pino logger with PII redaction
 *
 * Features:
 * - Redaction of visitor content, contact details and widget tokens
 * - Pretty printing in development
 * - Structured JSON logging in production, silent under test
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

import { createCensor, REDACTION_PATHS } from './redaction.js';

export { REDACTION_PATHS, redactString, maskToken, maskEmail } from './redaction.js';

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Component name, attached to every line */
  name?: string;
  /** Log level (default: based on NODE_ENV) */
  level?: string;
  /** Enable pretty printing (default: true in development) */
  pretty?: boolean;
  /** Additional redaction paths */
  additionalRedactionPaths?: string[];
}

/**
 * Narrow logging surface taken by services, so tests can hand in plain mocks
 */
export type ServiceLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

function getDefaultLevel(): string {
  const envLevel = process.env.LOG_LEVEL;
  if (envLevel) {
    return envLevel;
  }

  switch (process.env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'silent';
    default:
      return 'debug';
  }
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
}

/**
 * Build pino options; shared with Fastify so request logs get the same redaction
 */
export function createLoggerOptions(config: LoggerConfig = {}): LoggerOptions {
  const { name = 'chatrouter', level = getDefaultLevel(), additionalRedactionPaths = [] } = config;

  return {
    level,
    name,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: process.env.SERVICE_NAME ?? 'chatrouter',
      env: process.env.NODE_ENV ?? 'development',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    messageKey: 'msg',
    redact: {
      paths: [...REDACTION_PATHS, ...additionalRedactionPaths],
      censor: createCensor,
    },
  };
}

/**
 * Create a named logger
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const options = createLoggerOptions(config);
  const pretty = config.pretty ?? isDevelopment();

  if (pretty) {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
      },
    });
    return pino(options, transport);
  }

  return pino(options);
}

/**
 * Default logger instance
 */
export const logger: Logger = createLogger();

export type { Logger, LoggerOptions } from 'pino';
