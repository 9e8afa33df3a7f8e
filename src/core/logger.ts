import pino, { type Logger } from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

function resolveLevel(): string {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured) return configured;
  return isTest ? 'silent' : 'warn';
}

// stdout carries findings, so every log line goes to stderr
const transport = !isProduction && !isTest
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        singleLine: false,
        destination: 2,
      },
    }
  : undefined;

const options: pino.LoggerOptions = {
  level: resolveLevel(),
  transport,
  formatters: transport
    ? undefined
    : {
        level: (label) => ({ level: label }),
      },
  base: {
    service: 'endpoint-mapper',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['*.password', '*.apiKey', '*.token', '*.secret', '*.credential', '*.auth'],
    censor: '[REDACTED]',
  },
};

export const logger: Logger = transport
  ? pino(options)
  : pino(options, pino.destination({ dest: 2, sync: true }));

// Child logger factory for modules
export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}

