import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function getLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL'];
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

export const logger = pino({
  name: 'searchgate',
  level: getLogLevel(),
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
