/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * Pino outputs one JSON object per log line, which keeps update runs
 * machine-parseable: every adapter line carries a `collection` field, so a
 * single failing source can be filtered out of a busy nightly run.
 *
 * In development, raw JSON is hard to read, so we pipe it through `pino-pretty`
 * which adds colors, readable timestamps, and strips noisy fields like pid.
 *
 * The exported `Logger` type lets other modules declare "I need a logger"
 * without coupling to Pino directly; tests hand in a silent instance.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
