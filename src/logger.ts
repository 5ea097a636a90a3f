import fs from 'node:fs'
import util from 'node:util'
import pino from 'pino'

const readLocaltimeZone = (): string | undefined => {
  try {
    return fs.readlinkSync('/etc/localtime').match(/zoneinfo\/(.*)/)?.[1]
  } catch {
    return undefined
  }
}

const getTimezone = (): string => {
  if (process.env.TZ) {
    return process.env.TZ
  }
  try {
    return fs.readFileSync('/etc/timezone', 'utf8').trim()
  } catch {
    // macOS has no /etc/timezone, only the /etc/localtime symlink
    const zone = readLocaltimeZone()
    if (zone) {
      return zone
    }
    console.warn('Could not detect timezone, falling back to UTC')
    return 'UTC'
  }
}

const timeZone = getTimezone()

// LOG_FORMAT=json skips the pretty printer worker, e.g. for log shippers
const pretty = process.env.LOG_FORMAT !== 'json'

const baseLogger = pino({
  level: process.env.LOG_LEVEL || 'info',
  timestamp: () =>
    `,"time":"${new Date().toLocaleString(undefined, {
      timeZone,
    })}"`,
  ...(pretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
            translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
          },
        },
      }
    : {}),
})

export const stringifyArgs = (args: unknown[], colors = pretty): string => {
  return args
    .map((arg) => {
      if (typeof arg === 'object' && arg !== null) {
        return util.inspect(arg, { colors, depth: null, breakLength: Number.POSITIVE_INFINITY })
      }
      return String(arg)
    })
    .join(' ')
}

const createLogger = (name: string) => {
  const logger = baseLogger.child({
    name: name.toUpperCase(),
  })

  return {
    info: (...args: unknown[]) => logger.info(stringifyArgs(args)),
    error: (...args: unknown[]) => logger.error(stringifyArgs(args)),
    warn: (...args: unknown[]) => logger.warn(stringifyArgs(args)),
    debug: (...args: unknown[]) => logger.debug(stringifyArgs(args)),
  }
}

export default createLogger
