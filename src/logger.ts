import pino, { type Logger } from 'pino';
import type { RelayConfig } from './config.js';

export type { Logger };

export function createLogger(config: Pick<RelayConfig, 'logLevel' | 'logPretty'>): Logger {
  return pino({
    level: config.logLevel,
    transport: config.logPretty ? { target: 'pino-pretty' } : undefined
  });
}
