import winston from 'winston';
import type { Logger } from 'winston';
import { Env } from './env.js';

const textFormat = winston.format.printf(
  ({ timestamp, level, message, module, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} | ${level.toUpperCase().padEnd(5)} | ${module ?? 'app'} | ${message}${extra}`;
  }
);

const rootLogger = winston.createLogger({
  level: Env.LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    Env.LOG_FORMAT === 'json' ? winston.format.json() : textFormat
  ),
  transports: [new winston.transports.Console()],
});

export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}

/**
 * Replaces every occurrence of the given secrets in a string, so URLs and
 * payloads can be logged without leaking credentials.
 */
export function maskSensitiveInfo(text: string, secrets: string[]): string {
  return secrets
    .filter((secret) => secret.length > 0)
    .reduce((masked, secret) => masked.split(secret).join('<redacted>'), text);
}
