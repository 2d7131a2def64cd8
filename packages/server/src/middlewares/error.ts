import type { NextFunction, Request, Response } from 'express';
import { z, ZodError } from 'zod';
import {
  ResolutionError,
  ServiceError,
  createLogger,
} from '@resolvarr/core';
import { APIError, createResponse } from '../utils/responses.js';

const logger = createLogger('server');

function toAPIError(error: unknown): APIError {
  if (error instanceof APIError) {
    return error;
  }
  if (error instanceof ZodError) {
    return new APIError('BAD_REQUEST', 400, z.prettifyError(error));
  }
  if (error instanceof ResolutionError) {
    if (error.cause instanceof ServiceError && error.cause.code === 'NOT_FOUND') {
      return new APIError('NOT_FOUND', 404, error.message);
    }
    return new APIError('RESOLUTION_FAILED', 502, error.message);
  }
  if (error instanceof ServiceError) {
    return new APIError('DOWNLOAD_FAILED', 502, error.message);
  }
  return new APIError('INTERNAL_SERVER_ERROR', 500, 'Internal server error');
}

export function errorMiddleware(
  error: unknown,
  req: Request,
  res: Response,
  // express only treats four-argument functions as error handlers
  _next: NextFunction
) {
  const apiError = toAPIError(error);
  if (apiError.statusCode >= 500) {
    logger.error(`${req.method} ${req.originalUrl} failed`, { error });
  } else {
    logger.debug(`${req.method} ${req.originalUrl}: ${apiError.message}`);
  }
  res.status(apiError.statusCode).json(
    createResponse({
      success: false,
      error: { code: apiError.code, message: apiError.message },
    })
  );
}
