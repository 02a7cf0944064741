import { pino, type Logger } from 'pino';

import type { Config } from './config.js';
import { formatOneLineError, formatOneLineUtf8 } from './util/text.js';

const MAX_LOG_ERROR_MESSAGE_BYTES = 512;

/**
 * The subset of a pino logger the engine calls. Any pino-compatible logger (including a
 * fastify request logger or a pino child) satisfies it.
 */
export type LoggerLike = {
  debug: (obj: object, msg?: string) => void;
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
};

export function createLogger(config: Pick<Config, 'LOG_LEVEL'>, name = 'capture-delta'): Logger {
  return pino({ name, level: config.LOG_LEVEL });
}

export const silentLogger: LoggerLike = pino({ level: 'silent' });

export function formatError(err: unknown): { message: string; name?: string; code?: string } {
  if (err instanceof Error) {
    const safeMessage = formatOneLineError(err, MAX_LOG_ERROR_MESSAGE_BYTES);
    const safeName = formatOneLineUtf8(err.name, 128) || 'Error';
    const code = 'code' in err ? err.code : undefined;
    return typeof code === 'string' ? { name: safeName, message: safeMessage, code } : { name: safeName, message: safeMessage };
  }
  return { message: formatOneLineError(err, MAX_LOG_ERROR_MESSAGE_BYTES) };
}
