import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type AppLogger = Logger;

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  environment: string;
  level?: LogLevel;
  /** Writes log lines here instead of stdout; disables pretty printing. */
  destination?: DestinationStream;
}

function prettyTransport(): LoggerOptions['transport'] {
  return {
    target: 'pino-pretty',
    options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' },
  };
}

/**
 * Development pretty-prints through pino-pretty; production and test emit JSON
 * lines tagged with the service name.
 */
export function createLogger(config: LoggerConfig): AppLogger {
  const options: LoggerOptions = {
    level: config.level ?? (config.environment === 'production' ? 'info' : 'debug'),
    base: { service: 'tickguard', env: config.environment },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.destination) return pino(options, config.destination);
  if (config.environment === 'development') return pino({ ...options, transport: prettyTransport() });
  return pino(options);
}
