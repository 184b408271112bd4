import { destination, pino, type Logger, type LoggerOptions } from 'pino';

const env = process.env['NODE_ENV'];
const isTest = env === 'test' || process.env['VITEST'] !== undefined;
const isDev = env !== 'production' && !isTest;

// Tests stay quiet unless a level is requested explicitly
const defaultLevel = isTest ? 'silent' : isDev ? 'debug' : 'info';

const options: LoggerOptions = {
  level: process.env['RUNPLANE_LOG_LEVEL'] ?? defaultLevel,
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Only add transport in dev mode
if (isDev) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

// Logs go to stderr so CLI output on stdout stays parseable
export const logger = isDev ? pino(options) : pino(options, destination(2));

export type { Logger };

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
