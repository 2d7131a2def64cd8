export * from './base.js';
export * from './availability.js';
export * from './realdebrid.js';

import { ConfigError } from '../utils/errors.js';
import { Env } from '../utils/env.js';
import type { DebridService } from './base.js';
import { RealDebridService } from './realdebrid.js';

export type DebridServiceId = 'realdebrid';

export function getDebridService(
  serviceName: DebridServiceId,
  token: string
): DebridService {
  if (!token) {
    throw new ConfigError(`No API key configured for ${serviceName}`);
  }

  switch (serviceName) {
    case 'realdebrid':
      return new RealDebridService({
        token,
        baseUrl: Env.REALDEBRID_URL,
        policy: {
          timeout: Env.REQUEST_TIMEOUT,
          maxAttempts: Env.REQUEST_MAX_ATTEMPTS,
          retryCodes: Env.DEBRID_RETRY_CODES,
          retryInterval: Env.REQUEST_RETRY_INTERVAL,
        },
        batchSize: Env.CACHE_CHECK_BATCH_SIZE,
        concurrency: Env.CACHE_CHECK_CONCURRENCY,
      });
    default:
      throw new ConfigError(`Unknown debrid service: ${String(serviceName)}`);
  }
}
