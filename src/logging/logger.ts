import winston from 'winston'

export function createLogger(
  scope: string,
  level = process.env.LOG_LEVEL || 'info',
): winston.Logger {
  return winston.createLogger({
    level,
    silent: process.env.NODE_ENV === 'test',
    defaultMeta: { scope },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json(),
    ),
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple(),
        ),
      }),
    ],
  })
}
