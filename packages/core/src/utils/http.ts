import { z, ZodError } from 'zod';
import { fetch } from 'undici';
import type { Response } from 'undici';
import { ServiceError, convertStatusCodeToError } from './errors.js';
import { createLogger, maskSensitiveInfo } from './logger.js';
import { getTimeTakenSincePoint, sleep } from './time.js';

const logger = createLogger('http');

/**
 * Timeout and retry behaviour shared by every outbound call of one client.
 */
export interface RequestPolicy {
  /** Per-attempt timeout in milliseconds. */
  timeout: number;
  /** Total number of attempts, including the first. */
  maxAttempts: number;
  /** Status codes that are retried rather than failing immediately. */
  retryCodes: number[];
  /** Fixed wait between attempts in milliseconds. */
  retryInterval: number;
}

export interface RequestOptions<T extends z.ZodType> {
  service: string;
  schema: T;
  policy: RequestPolicy;
  method?: 'GET' | 'POST' | 'DELETE';
  headers?: Record<string, string>;
  form?: Record<string, string>;
  /** Values masked out of logged URLs. */
  secrets?: string[];
}

function toNetworkError(service: string, error: unknown): ServiceError {
  const name = error instanceof Error ? error.name : '';
  if (name === 'AbortError' || name === 'TimeoutError') {
    return new ServiceError(`${service} request timed out`, {
      service,
      statusCode: 504,
      statusText: 'Gateway Timeout',
      code: 'TIMEOUT',
      cause: error,
    });
  }
  return new ServiceError(
    `${service} request failed: ${error instanceof Error ? error.message : String(error)}`,
    {
      service,
      statusCode: 500,
      statusText: 'Internal Server Error',
      code: 'UNKNOWN',
      cause: error,
    }
  );
}

async function toStatusError(
  service: string,
  response: Response
): Promise<ServiceError> {
  const body = await response.text();
  return new ServiceError(
    `${service} API error: ${response.status} ${response.statusText}`,
    {
      service,
      statusCode: response.status,
      statusText: response.statusText,
      code: convertStatusCodeToError(response.status),
      body,
    }
  );
}

async function parseBody<T extends z.ZodType>(
  service: string,
  response: Response,
  schema: T
): Promise<z.infer<T>> {
  const text = await response.text();
  let data: unknown;
  try {
    data = text.length > 0 ? JSON.parse(text) : undefined;
  } catch (error) {
    throw new ServiceError(`Invalid ${service} API response`, {
      service,
      statusCode: response.status,
      statusText: response.statusText,
      code: 'INVALID_RESPONSE',
      body: text,
      cause: error,
    });
  }

  try {
    return schema.parse(data);
  } catch (error) {
    if (error instanceof ZodError) {
      logger.error(
        `Failed to parse ${service} API response: ${z.prettifyError(error)}`
      );
    }
    throw new ServiceError(`Invalid ${service} API response`, {
      service,
      statusCode: response.status,
      statusText: response.statusText,
      code: 'INVALID_RESPONSE',
      body: data,
      cause: error,
    });
  }
}

/**
 * Performs a JSON request with a fixed timeout and a bounded number of
 * attempts. Network failures and statuses in `policy.retryCodes` are retried
 * after `policy.retryInterval`; any other non-2xx status fails immediately.
 * The parsed body is validated against `schema`.
 */
export async function requestJson<T extends z.ZodType>(
  url: string,
  options: RequestOptions<T>
): Promise<z.infer<T>> {
  const { service, policy, method = 'GET' } = options;
  const loggedUrl = maskSensitiveInfo(url, options.secrets ?? []);
  const start = Date.now();
  let lastError: ServiceError | undefined;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: options.headers,
        body: options.form ? new URLSearchParams(options.form) : undefined,
        signal: AbortSignal.timeout(policy.timeout),
      });
    } catch (error) {
      lastError = toNetworkError(service, error);
      logger.warn(
        `${method} ${loggedUrl} failed on attempt ${attempt}/${policy.maxAttempts}: ${lastError.message}`
      );
      if (attempt < policy.maxAttempts) {
        await sleep(policy.retryInterval);
      }
      continue;
    }

    if (policy.retryCodes.includes(response.status)) {
      lastError = await toStatusError(service, response);
      logger.warn(
        `${method} ${loggedUrl} returned ${response.status} on attempt ${attempt}/${policy.maxAttempts}`
      );
      if (attempt < policy.maxAttempts) {
        await sleep(policy.retryInterval);
      }
      continue;
    }

    if (!response.ok) {
      throw await toStatusError(service, response);
    }

    const data = await parseBody(service, response, options.schema);
    logger.debug(`${method} ${loggedUrl} completed`, {
      status: response.status,
      attempts: attempt,
      time: getTimeTakenSincePoint(start),
    });
    return data;
  }

  throw new ServiceError(
    `${service} request failed after ${policy.maxAttempts} attempts`,
    {
      service,
      statusCode: lastError?.statusCode ?? 500,
      statusText: lastError?.statusText ?? 'Internal Server Error',
      code: lastError?.code ?? 'UNKNOWN',
      body: lastError?.body,
      cause: lastError,
    }
  );
}
