type LogFn = (...args: unknown[]) => void

interface LoggerMethods {
  debug: LogFn
  info: LogFn
  warn: LogFn
  error: LogFn
}

const noop: LogFn = () => {}

/**
 * Logger that drops everything, used when the caller passes none
 */
const silentLogger: LoggerMethods = Object.freeze({
  debug: noop,
  info: noop,
  warn: noop,
  error: noop
})

export { silentLogger }
export type { LoggerMethods, LogFn }
