import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/sweep-config.js'

export type { Logger } from 'pino'

export type Verbosity = 'quiet' | 'normal' | 'verbose'

export function createLogger(config: LoggingConfig): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  // stderr keeps stdout free for the sweep summary
  if (usePretty) {
    return pino({
      level: config.level,
      transport: { target: 'pino-pretty', options: { destination: 2 } },
    })
  }
  return pino({ level: config.level }, pino.destination(2))
}

/** Verbose drops to debug, quiet raises to warn; normal keeps the configured level. */
export function levelForVerbosity(
  verbosity: Verbosity,
  configured: LoggingConfig['level'],
): LoggingConfig['level'] {
  switch (verbosity) {
    case 'verbose':
      return 'debug'
    case 'quiet':
      return 'warn'
    default:
      return configured
  }
}

export function verbosityFromFlags(verbose: boolean, quiet: boolean): Verbosity {
  if (verbose && !quiet) return 'verbose'
  if (quiet && !verbose) return 'quiet'
  return 'normal'
}
