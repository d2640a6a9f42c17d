import { pino, type Logger, type LoggerOptions } from 'pino';

export interface LoggerConfig {
  level?: string;
  /** Pretty-print through pino-pretty instead of emitting JSON lines */
  pretty?: boolean;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    name: 'visual-layer-client',
    level: config.level ?? process.env.LOG_LEVEL ?? 'warn',
  };

  if (config.pretty ?? process.env.NODE_ENV === 'development') {
    options.transport = { target: 'pino-pretty' };
  }

  return pino(options);
}

export const logger = createLogger();
