import { pino, destination, type Logger, type LoggerOptions } from 'pino';

const nodeEnv = process.env['NODE_ENV'];
const isDev = nodeEnv !== 'production';
const isTest = nodeEnv === 'test';

// Build options conditionally to satisfy exactOptionalPropertyTypes
const options: LoggerOptions = {
  level: process.env['POSTLINE_LOG_LEVEL'] ?? (isTest ? 'silent' : isDev ? 'debug' : 'info'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Only add transport in dev mode. Logs go to stderr so stdout stays free for CLI output.
if (isDev && !isTest) {
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

export const logger: Logger = options.transport
  ? pino(options)
  : pino(options, destination(2));

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
