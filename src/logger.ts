import pino from 'pino';
import { config } from './config';

export type Logger = pino.Logger;

const baseLogger = pino({ level: config.log.level });

/** Child logger tagged with the emitting component. */
export function createLogger(component: string): Logger {
  return baseLogger.child({ component });
}

export function getLogger(): Logger {
  return baseLogger;
}
