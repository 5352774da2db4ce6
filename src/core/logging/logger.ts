/**
 * Structured logger shared by pools and registries.
 *
 * Pino writes JSON lines; callers that want pretty output pipe through
 * pino-pretty themselves.
 */

import pino from 'pino';

export type Logger = pino.Logger;

/** Environment variable consulted when no level is given. */
export const LOG_LEVEL_ENV = 'CONNECTOR_POOL_LOG_LEVEL';

export function createLogger(
  level: string = process.env[LOG_LEVEL_ENV] ?? 'warn',
  destination?: pino.DestinationStream
): Logger {
  const options: pino.LoggerOptions = { name: 'connector-pool', level };
  return destination ? pino(options, destination) : pino(options);
}
