import type { ApiError, ApiResponse, MarketErrorCode } from '../types/api.js';

export function createApiResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data };
}

export function createApiError(
  code: MarketErrorCode,
  message: string,
  details?: unknown,
): ApiResponse<never> {
  const error: ApiError = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return { success: false, error };
}

export function isApiError<T>(
  response: ApiResponse<T>,
): response is { success: false; error: ApiError } {
  return !response.success;
}
