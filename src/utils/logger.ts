import winston from 'winston';

type LoggerEnv = Record<string, string | undefined>;

/**
 * `LOG_LEVEL=none` silences output, as does a Jest run without an explicit level
 */
export function createLogger(env: LoggerEnv = process.env): winston.Logger {
  const level = env.LOG_LEVEL?.trim().toLowerCase() || 'info';
  const silent = level === 'none' || (env.NODE_ENV === 'test' && !env.LOG_LEVEL);

  return winston.createLogger({
    level: level === 'none' ? 'error' : level,
    silent,
    defaultMeta: { service: 'wiki-frontier-crawler' },
    format: winston.format.combine(
      winston.format.errors({ stack: true }),
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          winston.format.printf(info => `${info.timestamp} ${info.level}: ${info.message}`)
        ),
      }),
    ],
  });
}

const logger = createLogger();

export default logger;
