// src/lib/errors.ts

/**
 * @fileoverview Error types shared by the plant service and the route handlers.
 */

export type PlantErrorCode = 'NOT_FOUND' | 'VALIDATION' | 'STORAGE' | 'UNKNOWN';

/**
 * Raised (or returned inside a `PlantResult`) by the service layer so route
 * handlers can pick the response shape without inspecting driver errors.
 */
export class PlantServiceError extends Error {
  constructor(
    message: string,
    public readonly code: PlantErrorCode = 'UNKNOWN',
    public readonly originalError?: unknown,
    /** Individual validation messages; defaults to `[message]`. */
    public readonly details: string[] = [message]
  ) {
    super(message);
    this.name = 'PlantServiceError';
  }
}

export type PlantResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: PlantServiceError };

export const ok = <T>(value: T): PlantResult<T> => ({ ok: true, value });

export const fail = <T = never>(error: PlantServiceError): PlantResult<T> => ({ ok: false, error });

/**
 * Free-text description of any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unexpected error occurred';
}
