import pino, { type LevelWithSilent, type Logger } from 'pino'

export type { Logger }

/** Logger surface the reporting code writes diagnostics to */
export type DiagnosticLogger = Pick<Logger, 'error' | 'warn'>

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

/**
 * Diagnostics go to stderr so JSON reports on stdout stay parseable.
 */
export const createLogger = (level: LevelWithSilent = 'info'): Logger =>
  pino({ name: 'revenue-digest', level }, pino.destination(2))
