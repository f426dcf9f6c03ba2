import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions as PinoOptions } from 'pino';
import { isTestEnv } from './util/env.js';

export type { Logger };

export type LoggerOptions = {
  level?: string;
  pretty?: boolean;
  destination?: DestinationStream;
};

function defaultLevel() {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return isTestEnv() ? 'silent' : 'info';
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const options: PinoOptions = {
    base: undefined,
    level: opts.level ?? defaultLevel(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.epochTime,
  };
  if (opts.destination) return pino(options, opts.destination);
  if (!opts.pretty) return pino(options);
  const transport = pino.transport({
    target: 'pino-pretty',
    options: {
      translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
      colorize: false,
      ignore: 'pid,hostname',
    },
  });
  return pino(options, transport);
}

export const log = createLogger();
export default log;
