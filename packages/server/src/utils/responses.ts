export type ApiErrorCode =
  | 'BAD_REQUEST'
  | 'NOT_FOUND'
  | 'RESOLUTION_FAILED'
  | 'DOWNLOAD_FAILED'
  | 'INTERNAL_SERVER_ERROR';

export type ApiResponse<T> =
  | { success: true; data: T }
  | { success: false; error: { code: ApiErrorCode; message: string } };

export function createResponse<T>(response: ApiResponse<T>): ApiResponse<T> {
  return response;
}

export class APIError extends Error {
  constructor(
    readonly code: ApiErrorCode,
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'APIError';
  }
}
