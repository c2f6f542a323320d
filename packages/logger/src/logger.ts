import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Process-ending failure (browser could not be launched)
 * - error (50): Operation failed and was reported to the caller
 * - warn (40): Degraded but recovered (selector fallback exhausted, patch skipped)
 * - info (30): Session lifecycle and rotations (default)
 * - debug (20): Per-step detail (delays, chosen profiles, selectors)
 * - trace (10): Very detailed trace messages
 *
 * Every line goes to stderr: stdout is reserved for the CLI's JSON result.
 */

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const resolveLevel = (value: string | undefined): pino.LevelWithSilent => {
  const normalized = value?.trim().toLowerCase()
  const match = LEVELS.find(level => level === normalized)
  return match ?? 'info'
}

const createBaseLogger = (env: NodeJS.ProcessEnv = process.env): pino.Logger => {
  const level = resolveLevel(env.LOG_LEVEL)

  if (env.LOG_PRETTY === 'false') {
    return pino({ level }, pino.destination({ dest: 2, sync: true }))
  }

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        destination: 2,
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname,context',
        messageFormat: '{if context}[{context}] {end}{msg}',
        customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
      }
    }
  })
}

const baseLogger = createBaseLogger()

type LogMethod = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'

type LogFn = (message: unknown, ...details: unknown[]) => void

type Logger = Record<LogMethod, LogFn> & {
  child: (bindings: pino.Bindings) => Logger
}

const describe = (value: unknown): string => {
  if (value instanceof Error) {
    return value.message
  }

  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value)
  }

  return String(value)
}

/**
 * Joins a message and its details into one line; errors contribute their message,
 * objects are serialized.
 */
const formatLine = (message: unknown, details: unknown[]): string =>
  [message, ...details].map(describe).join(' ')

const wrap = (logger: pino.Logger): Logger => {
  const method =
    (level: LogMethod): LogFn =>
    (message, ...details) => {
      if (!logger.isLevelEnabled(level)) {
        return
      }
      logger[level](formatLine(message, details))
    }

  return {
    fatal: method('fatal'),
    error: method('error'),
    warn: method('warn'),
    info: method('info'),
    debug: method('debug'),
    trace: method('trace'),
    child: bindings => wrap(logger.child(bindings))
  }
}

/**
 * Process-wide logger.
 *
 * ```typescript
 * import { log } from '@tubeveil/logger'
 *
 * log.info('Session started', { sessionId })
 * log.warn('Proxy refresh failed:', error)
 * ```
 *
 * `LOG_LEVEL=debug` raises verbosity, `LOG_PRETTY=false` emits raw JSON lines.
 */
export const log = wrap(baseLogger)

/**
 * Logger whose lines are prefixed with `[context]`.
 *
 * @example
 * ```typescript
 * const rotationLog = createLogger('RotationWorker')
 * rotationLog.debug('Woke up', { sleptMs })
 * ```
 */
export function createLogger(context: string): Logger {
  return wrap(baseLogger.child({ context }))
}

export { formatLine, resolveLevel }
export type { Logger, LogFn }
