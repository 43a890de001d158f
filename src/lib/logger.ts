import pino from 'pino';
import type { LoggingConfig } from '../types/index.js';

let logger: pino.Logger | null = null;

const SERVICE_NAME = 'batch-backup';

export function createLogger(config: LoggingConfig): pino.Logger {
  const options: pino.LoggerOptions = {
    name: SERVICE_NAME,
    level: config.level,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    serializers: {
      error: pino.stdSerializers.err,
    },
  };

  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname,name',
        },
      },
    });
  }

  return pino(options);
}

export function initLogger(config: LoggingConfig): void {
  logger = createLogger(config);
}

export function getLogger(): pino.Logger {
  if (!logger) {
    // Jest sets NODE_ENV=test; keep test output clean
    logger = pino({
      name: SERVICE_NAME,
      level: process.env.NODE_ENV === 'test' ? 'silent' : 'info',
      serializers: { error: pino.stdSerializers.err },
    });
  }
  return logger;
}

// Child logger carrying run or batch context
export function createChildLogger(context: Record<string, unknown>): pino.Logger {
  return getLogger().child(context);
}
