import pino from 'pino';

export const loggerPrefix = '[Environments]';

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'production' ? 'warn' : 'info';
}

// Create a Pino logger instance
export const logger = pino({
  level: defaultLevel(),
});
