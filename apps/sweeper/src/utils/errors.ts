import { RetentionConfigError } from '@bucket-sweep/core';
import { ZodError } from 'zod';

/**
 * Failure carrying the status code a handler should answer with.
 * Use `throw AppError.badRequest(msg)` for caller mistakes (bad event, bad config)
 * and plain errors for everything the store or filesystem throws.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
  ) {
    super(message);
    this.name = 'AppError';
  }

  static badRequest(message: string): AppError {
    return new AppError(message, 400);
  }

  static forbidden(message = 'Forbidden'): AppError {
    return new AppError(message, 403);
  }

  static notFound(message = 'Not found'): AppError {
    return new AppError(message, 404);
  }

  static serviceUnavailable(message: string): AppError {
    return new AppError(message, 503);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function statusCodeFor(error: unknown): number {
  if (error instanceof AppError) return error.statusCode;
  if (error instanceof RetentionConfigError || error instanceof ZodError) return 400;
  return 500;
}
