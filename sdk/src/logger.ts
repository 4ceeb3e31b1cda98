/**
 * Console logging with a `[Quire:<scope>]` prefix.
 * Debug output is dropped unless enabled.
 */

export interface Logger {
  debug(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}

export interface LoggerOptions {
  debug?: boolean
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[Quire:${scope}]`

  return {
    debug(...args: unknown[]) {
      if (options.debug) {
        console.debug(prefix, ...args)
      }
    },
    warn(...args: unknown[]) {
      console.warn(prefix, ...args)
    },
    error(...args: unknown[]) {
      console.error(prefix, ...args)
    }
  }
}
