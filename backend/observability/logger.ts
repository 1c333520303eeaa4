import winston from "winston"

/*
|--------------------------------------------------------------------------
| Logger Configuration
|--------------------------------------------------------------------------
| Console logging for the report jobs. Pure modules never log; the
| pipeline and job entry points take child loggers from here.
|--------------------------------------------------------------------------
*/

const { combine, timestamp, printf, colorize, errors } =
  winston.format

const logFormat = printf(
  ({ level, message, timestamp, stack, module }) =>
    `${timestamp} [${level}]${module ? ` (${module})` : ""} ${stack || message
    }`
)

export function defaultLevel(
  env: NodeJS.ProcessEnv = process.env
): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL
  return env.NODE_ENV === "production" ? "info" : "debug"
}

export const logger = winston.createLogger({
  level: defaultLevel(),
  format: combine(
    errors({ stack: true }),
    timestamp(),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(
        colorize(),
        timestamp(),
        logFormat
      ),
    }),
  ],
})

export type Logger = winston.Logger

/** Logger tagged with the calling module's name. */
export function moduleLogger(module: string): Logger {
  return logger.child({ module })
}
