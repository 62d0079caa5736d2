import pino, { type Logger as PinoLogger, type LoggerOptions as PinoLoggerOptions } from 'pino';

export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
  level?: string;
  format?: LogFormat;
  name?: string;
  /** Command-line tools log to stderr so stdout carries only their output. */
  destination?: 'stdout' | 'stderr';
}

export function createLogger(options: LoggerOptions = {}): PinoLogger {
  const { level = 'info', format = 'json', name, destination = 'stdout' } = options;
  const fd = destination === 'stderr' ? 2 : 1;

  const baseOptions: PinoLoggerOptions = {
    level,
    name,
    base: {
      pid: process.pid,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['apiKey', 'apiSecret', '*.apiKey', '*.apiSecret', 'headers["X-MBX-APIKEY"]'],
      censor: '******',
    },
  };

  if (format === 'pretty') {
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: fd,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(fd));
}

function parseFormat(value: string | undefined): LogFormat {
  return value === 'pretty' ? 'pretty' : 'json';
}

export const logger = createLogger({
  level: process.env['LOG_LEVEL'] ?? 'info',
  format: parseFormat(process.env['LOG_FORMAT']),
  name: 'order-desk',
});

export function createServiceLogger(serviceName: string): PinoLogger {
  return logger.child({ service: serviceName });
}

export type { PinoLogger as Logger };
