import pino from 'pino';
import { getLoggingConfig, type LoggingConfig } from './config.js';

type Destination = ReturnType<typeof pino.destination>;

export interface LoggerBundle {
  logger: pino.Logger;
  flush: () => Promise<void>;
  /** Best-effort synchronous flush before process.exit */
  flushSync: () => void;
}

const STANDARD_STREAMS: Partial<Record<string, number>> = { stdout: 1, stderr: 2 };

/**
 * File descriptor for stdout/stderr, the path otherwise
 */
export function resolveTarget(destination: string): number | string {
  return STANDARD_STREAMS[destination] ?? destination;
}

/**
 * Options handed to the pino-pretty transport. Files get uncoloured output.
 */
export function prettyOptions(destination: string): Record<string, unknown> {
  const target = resolveTarget(destination);
  const toFile = typeof target === 'string';
  return {
    colorize: !toFile,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
    destination: target,
    ...(toFile ? { mkdir: true, append: true } : {}),
  };
}

function openDestination(destination: string): Destination {
  const target = resolveTarget(destination);
  return typeof target === 'number'
    ? pino.destination({ dest: target, sync: false })
    : pino.destination({ dest: target, append: true, mkdir: true, sync: false });
}

export function buildLogger(config: LoggingConfig = getLoggingConfig()): LoggerBundle {
  const options: pino.LoggerOptions = {
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.format === 'pretty') {
    const transport = pino.transport({ target: 'pino-pretty', options: prettyOptions(config.destination) });
    const logger = pino(options, transport);
    return {
      logger,
      flush: () => flushLogger(logger),
      flushSync: () => {},
    };
  }

  const destination = openDestination(config.destination);
  const logger = pino(options, destination);
  return {
    logger,
    flush: () => flushLogger(logger),
    flushSync: () => destination.flushSync(),
  };
}

function flushLogger(logger: pino.Logger): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    logger.flush((err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
