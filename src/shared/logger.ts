/**
 * Logger factory. Every module gets a named pino logger writing to stderr,
 * so the report printed on stdout is never interleaved with log lines.
 */

import pino, { type Logger } from 'pino';

export type { Logger };

const level = process.env['LOG_LEVEL'] ?? 'info';

export function createLogger(name: string): Logger {
  return pino({ name: `secretsweep:${name}`, level }, pino.destination(2));
}
