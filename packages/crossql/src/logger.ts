import pino, { type Logger } from 'pino';

/**
 * Logger used when the host application does not inject one.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
