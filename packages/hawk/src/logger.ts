import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

const REDACT_PATHS = [
  'headers.authorization',
  'headers["server-authorization"]',
  'req.headers.authorization',
  'authorization',
  'bewit',
  '*.key',
  '*.secret',
];

export interface LoggerConfig {
  level?: string;
  destination?: DestinationStream;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    name: 'hawkline',
    level: config.level ?? (process.env['LOG_LEVEL'] || 'info'),
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };
  return config.destination ? pino(options, config.destination) : pino(options);
}

export const logger = createLogger();
