import { pino, type Logger, type LoggerOptions } from 'pino';

const isDev = process.env['NODE_ENV'] === 'development';

const options: LoggerOptions = {
  level: process.env['BRANCHSYNC_LOG_LEVEL'] ?? (isDev ? 'debug' : 'info'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Pretty output only for local development; CI logs stay as JSON lines
if (isDev) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export const logger = pino(options);

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
