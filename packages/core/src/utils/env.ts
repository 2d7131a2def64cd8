import { z } from 'zod';
import { ConfigError } from './errors.js';
import { parseTime } from './time.js';

const duration = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value, ctx) => {
      try {
        return parseTime(value);
      } catch (error) {
        ctx.addIssue({
          code: 'custom',
          message: error instanceof Error ? error.message : String(error),
        });
        return z.NEVER;
      }
    });

const statusCodes = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value, ctx) => {
      const codes = value
        .split(',')
        .map((code) => code.trim())
        .filter((code) => code.length > 0)
        .map(Number);
      if (codes.some((code) => !Number.isInteger(code))) {
        ctx.addIssue({
          code: 'custom',
          message: `Invalid status code list: ${value}`,
        });
        return z.NEVER;
      }
      return codes;
    });

const EnvSchema = z.object({
  VERSION: z.string().default('1.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z
    .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
    .default('info'),
  LOG_FORMAT: z.enum(['text', 'json']).default('text'),

  REALDEBRID_API_KEY: z.string().default(''),
  REALDEBRID_URL: z.url().default('https://api.real-debrid.com/rest/1.0'),
  TORRENTIO_URL: z
    .url()
    .default(
      'https://torrentio.strem.fun/sort=qualitysize|qualityfilter=480p,scr,cam/manifest.json'
    ),
  CINEMETA_URL: z.url().default('https://v3-cinemeta.strem.io'),

  REQUEST_TIMEOUT: duration('60s'),
  REQUEST_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  REQUEST_RETRY_CODES: statusCodes('429,503'),
  REQUEST_RETRY_INTERVAL: duration('1s'),
  DEBRID_RETRY_CODES: statusCodes('429,503,404,400,500'),

  SEARCH_DEBOUNCE: duration('1s'),
  SNAPSHOT_TTL: duration('0'),
  LEDGER_MAX_ENTRIES: z.coerce.number().int().min(1).default(500),
  LEDGER_TTL: duration('6h'),
  CACHE_CHECK_BATCH_SIZE: z.coerce.number().int().min(1).default(200),
  CACHE_CHECK_CONCURRENCY: z.coerce.number().int().min(1).default(2),

  PROFILES_PATH: z.string().default('config/profiles.json'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Readonly<EnvConfig> {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(
      `Invalid environment configuration:\n${z.prettifyError(result.error)}`
    );
  }
  return Object.freeze(result.data);
}

export const Env = parseEnv(process.env);
