/**
 * Logging service.
 *
 * Wraps electron-log's Node entry so every module logs through one configured
 * instance. Console level comes from FRAME2TTL_LOG_LEVEL; the file transport
 * is only enabled when FRAME2TTL_LOG_FILE names a file.
 */

import log from 'electron-log/node'

export type ScopedLogger = ReturnType<typeof log.scope>
type LevelOption = typeof log.transports.console.level

const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const

let configured = false

/**
 *
 * @param value
 */
function parseLevel(value: string | undefined): LevelOption {
  if (value === 'off' || value === 'false') {
    return false
  }
  const level = LOG_LEVELS.find((candidate) => candidate === value)
  return level ?? 'info'
}

/**
 * Apply transport levels from the environment. Safe to call more than once.
 * @param env
 */
export function setupLogService(env: NodeJS.ProcessEnv = process.env): void {
  log.transports.console.level = parseLevel(env.FRAME2TTL_LOG_LEVEL)

  const logFile = env.FRAME2TTL_LOG_FILE
  if (logFile) {
    log.transports.file.level = parseLevel(env.FRAME2TTL_LOG_FILE_LEVEL ?? env.FRAME2TTL_LOG_LEVEL)
    log.transports.file.resolvePathFn = () => logFile
  } else {
    log.transports.file.level = false
  }

  configured = true
}

/**
 * Logger whose lines are tagged with `scope`.
 * @param scope
 */
export function createLogger(scope: string): ScopedLogger {
  if (!configured) {
    setupLogService()
  }
  return log.scope(scope)
}

/**
 * Current console level, mostly for diagnostics.
 */
export function getConsoleLevel(): LevelOption {
  return log.transports.console.level
}
