export type ServiceErrorCode =
  | 'BAD_REQUEST'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'TOO_MANY_REQUESTS'
  | 'INTERNAL_SERVER_ERROR'
  | 'SERVICE_UNAVAILABLE'
  | 'TIMEOUT'
  | 'INVALID_RESPONSE'
  | 'UNKNOWN';

export interface ServiceErrorDetails {
  service: string;
  statusCode: number;
  statusText: string;
  code: ServiceErrorCode;
  body?: unknown;
  cause?: unknown;
}

/**
 * An outbound call to a source, catalog or debrid service that failed,
 * either outright or after its retries were used up.
 */
export class ServiceError extends Error {
  readonly service: string;
  readonly statusCode: number;
  readonly statusText: string;
  readonly code: ServiceErrorCode;
  readonly body: unknown;

  constructor(message: string, details: ServiceErrorDetails) {
    super(message, { cause: details.cause });
    this.name = 'ServiceError';
    this.service = details.service;
    this.statusCode = details.statusCode;
    this.statusText = details.statusText;
    this.code = details.code;
    this.body = details.body;
  }
}

/**
 * A resolution that was aborted. No snapshot is published for it.
 */
export class ResolutionError extends Error {
  constructor(
    message: string,
    readonly slot: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ResolutionError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export const convertStatusCodeToError = (code: number): ServiceErrorCode => {
  switch (code) {
    case 400:
      return 'BAD_REQUEST';
    case 401:
      return 'UNAUTHORIZED';
    case 403:
      return 'FORBIDDEN';
    case 404:
      return 'NOT_FOUND';
    case 429:
      return 'TOO_MANY_REQUESTS';
    case 500:
      return 'INTERNAL_SERVER_ERROR';
    case 503:
      return 'SERVICE_UNAVAILABLE';
    case 504:
      return 'TIMEOUT';
    default:
      return 'UNKNOWN';
  }
};
