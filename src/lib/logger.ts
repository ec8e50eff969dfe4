// Path: src/lib/logger.ts
// Centralized Pino logger for pulsar-ws-supervisor

import pino from 'pino';
import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);

const isTest = process.env.NODE_ENV === 'test';
const isDev = process.env.NODE_ENV !== 'production';

// Cache the result
let pinoPrettyAvailable: boolean | null = null;

/**
 * Pretty transport for local development, when pino-pretty is installed
 */
function createTransport(): pino.TransportSingleOptions | undefined {
  if (!isDev || isTest) {
    return undefined;
  }

  if (pinoPrettyAvailable === null) {
    try {
      require.resolve('pino-pretty');
      pinoPrettyAvailable = true;
    } catch {
      pinoPrettyAvailable = false;
    }
  }

  if (!pinoPrettyAvailable) {
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

function defaultLevel(): string {
  if (isTest) return 'silent';
  return isDev ? 'debug' : 'info';
}

/**
 * Base logger instance
 *
 * In development: pino-pretty with colorized output (if installed)
 * In production: JSON logs to stdout
 * Under test: silent unless LOG_LEVEL is set
 */
export const logger = pino({
  level: process.env.LOG_LEVEL ?? defaultLevel(),
  transport: createTransport(),
  base: {
    service: 'pulsar-ws-supervisor',
    pid: process.pid,
  },
  // Auth tokens travel in transport options and headers
  redact: {
    paths: [
      'token',
      'authToken',
      'transportOptions.authToken',
      'headers.authorization',
      'headers.Authorization',
    ],
    censor: '[REDACTED]',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Create a child logger with additional context
 *
 * @example
 * const log = createLogger({ module: 'producer' });
 * log.info({ topic: 'orders' }, 'Producer connected');
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return logger.child(context);
}

// Pre-configured module loggers
export const wsLogger = createLogger({ module: 'websocket' });
export const registryLogger = createLogger({ module: 'registry' });
export const supervisorLogger = createLogger({ module: 'supervisor' });
export const configLogger = createLogger({ module: 'config' });

/**
 * Flush logs before process exit
 */
export async function flushLogs(): Promise<void> {
  await new Promise((resolve) => {
    logger.flush();
    setTimeout(resolve, 100);
  });
}

export type Logger = pino.Logger;
