/**
 * Pino logger for the analysis run.
 *
 * JSON lines by default; pino-pretty when `pretty` is set, which the config
 * enables outside production.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

import type { Env } from '../config/env.js';

export type LogLevel = Env['LOG_LEVEL'];

export interface LoggerConfig {
  level: LogLevel;
  pretty: boolean;
  /** Defaults to `funding-analysis` */
  name?: string;
}

export const createLogger = (config: LoggerConfig): Logger => {
  const options: LoggerOptions = {
    name: config.name ?? 'funding-analysis',
    level: config.level,
  };

  // A silent logger never writes, so it gets no transport worker
  if (config.pretty && config.level !== 'silent') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
      },
    };
  }

  return pinoLib(options);
};

export { type Logger } from 'pino';
