import winston from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'

const { combine, timestamp, printf, colorize, errors } = winston.format

export type Logger = winston.Logger

export type LoggerOptions = {
  level: string
  dir: string
  nodeEnv: string
  silent?: boolean
}

const logFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta, errorReplacer)}` : ''
  return `${timestamp} [${level}]: ${stack || message}${metaStr}`
})

// Error instances serialize to {} with plain JSON.stringify
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message }
  return value
}

/**
 * Builds the process logger. Created once by the entry point and handed to
 * each component, never imported as a module-level singleton.
 */
export function createLogger(options: LoggerOptions): Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: combine(colorize(), timestamp({ format: 'HH:mm:ss' }), logFormat),
    }),
  ]

  if (options.nodeEnv === 'production') {
    transports.push(
      new DailyRotateFile({
        dirname: options.dir,
        filename: 'pos-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxFiles: '14d',
        format: combine(timestamp(), errors({ stack: true }), logFormat),
      })
    )
  }

  return winston.createLogger({
    level: options.level,
    silent: options.silent ?? false,
    format: combine(errors({ stack: true }), timestamp()),
    transports,
  })
}
