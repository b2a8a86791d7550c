import pino, { Logger, LevelWithSilent } from 'pino'

export type { Logger }

const LEVELS: ReadonlyArray<LevelWithSilent> = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value)
}

/**
 * Builds the default logger. `EVENT_STORE_LOG_LEVEL` overrides the level when
 * none is passed; anything unrecognised falls back to `warn`.
 */
export function createLogger(
  name = 'event-store',
  level: string | undefined = process.env.EVENT_STORE_LOG_LEVEL,
): Logger {
  return pino({ name, level: level && isLevel(level) ? level : 'warn' })
}
