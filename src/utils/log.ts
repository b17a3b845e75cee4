import pino, { type Logger } from 'pino';

const isDevelopment = process.env.NODE_ENV === 'development';

export const logger: Logger = pino({
  name: 'collection-etl',
  level: process.env.LOG_LEVEL || 'info',
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname'
        }
      }
    : undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err
  }
});

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

function write(level: LogLevel, message: string, meta?: unknown) {
  if (meta === undefined) {
    logger[level](message);
  } else if (meta instanceof Error) {
    logger[level]({ err: meta }, message);
  } else if (typeof meta === 'object' && meta !== null && !Array.isArray(meta)) {
    logger[level](meta, message);
  } else {
    logger[level]({ detail: meta }, message);
  }
}

export const log = {
  debug: (message: string, meta?: unknown) => write('debug', message, meta),
  info: (message: string, meta?: unknown) => write('info', message, meta),
  warn: (message: string, meta?: unknown) => write('warn', message, meta),
  error: (message: string, meta?: unknown) => write('error', message, meta)
};
