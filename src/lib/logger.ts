import pino, { type LoggerOptions } from 'pino';

// stdout carries the CLI's own output, so logs go to stderr.
const options: LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
};

const logger = process.env.NODE_ENV !== 'production' && !process.env.VITEST
  ? pino({
      ...options,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
    })
  : pino(options, pino.destination({ dest: 2, sync: true }));

export function createLogger(module: string) {
  return logger.child({ module });
}

export default logger;
