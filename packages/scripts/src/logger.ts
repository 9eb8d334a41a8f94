/**
 * Console logger for the scripts
 */

import type { LoggerMethods } from '@papyrus-d5/core'

export interface ConsoleLoggerOptions {
  /** Print debug messages */
  debug?: boolean
}

export const createConsoleLogger = (scope: string, options: ConsoleLoggerOptions = {}): LoggerMethods => {
  const prefix = `[${scope}]`
  return {
    debug: (...args: unknown[]) => {
      if (options.debug) console.debug(prefix, ...args)
    },
    info: (...args: unknown[]) => console.log(prefix, ...args),
    warn: (...args: unknown[]) => console.warn(prefix, ...args),
    error: (...args: unknown[]) => console.error(prefix, ...args)
  }
}
