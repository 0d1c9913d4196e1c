/**
 * Structured Logger
 *
 * Creates a pino-based logger shared by the provider and its components.
 * Output is JSON on stderr: the host owns stdout for its plugin handshake.
 */

import pino from 'pino'

export type Logger = pino.Logger

export function createLogger(level = 'info'): Logger {
  return pino({ level }, pino.destination(2))
}
