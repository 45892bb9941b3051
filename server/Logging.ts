import { createLogger, format, transports } from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import { StreamOptions } from 'morgan'

export const logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: format.combine(format.timestamp(), format.simple()),
  transports: [new transports.Console()]
})

export function createAccessLogStream(logDir: string): StreamOptions {
  const fileLogger = createLogger({
    format: format.printf(info => String(info.message)),
    transports: [
      new DailyRotateFile({
        dirname: logDir,
        filename: 'access-%DATE%.log',
        level: 'info',
        maxFiles: '180d'
      })
    ]
  })

  return {
    write: (message: string) => { fileLogger.info(message.trim()) }
  }
}

export const requestLoggingFormat = ':remote-addr - :remote-user [:date[clf]] ":method :url HTTP/:http-version" :status :res[content-length] (:response-time[1]ms) ":referrer" ":user-agent"'
