import pino from 'pino';
import type { Logger } from 'pino';

export const logger = pino({
  name: 'feedprobe',
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    process.env['NODE_ENV'] !== 'production'
      ? { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname' } }
      : undefined,
  redact: {
    paths: ['password', 'token', 'authorization', 'headers.authorization', '*.password'],
    censor: '***REDACTED***',
  },
});

/**
 * Child logger tagged with the component emitting it (`probe`, `scheduler`, ...).
 */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
