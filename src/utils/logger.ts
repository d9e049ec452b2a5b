export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

export interface LoggerOptions {
  /** Emit debug lines. Also enabled by setting POSTURE_DEBUG=1. */
  readonly debug?: boolean
}

function debugFromEnv(): boolean {
  return process.env.POSTURE_DEBUG === '1'
}

/**
 * Console logger that prefixes every line with `[scope]`.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${scope}]`
  const debugEnabled = options.debug ?? debugFromEnv()

  return {
    debug(message, ...details) {
      if (debugEnabled) {
        console.debug(`${prefix} ${message}`, ...details)
      }
    },
    info(message, ...details) {
      console.info(`${prefix} ${message}`, ...details)
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details)
    },
    error(message, ...details) {
      console.error(`${prefix} ${message}`, ...details)
    },
  }
}
