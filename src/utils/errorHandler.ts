import { logger } from './logger';

export type ErrorCode =
  | 'INVALID_ARGUMENT'
  | 'BACKEND_NOT_FOUND'
  | 'BACKEND_ERROR'
  | 'NETWORK_ERROR'
  | 'NO_BACKEND_AVAILABLE'
  | 'CONFIG_ERROR';

export class FetcherError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public recoverable: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FetcherError';
  }
}

/**
 * Bad caller input: unknown or disabled backend names, an empty backend set.
 */
export class InvalidArgumentError extends FetcherError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

export class ConfigError extends FetcherError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * Transport-level failure: timeout, refused connection, non-2xx download.
 */
export class ClientError extends FetcherError {
  constructor(message: string, public status?: number, options?: { cause?: unknown }) {
    super(message, 'NETWORK_ERROR', true, options);
    this.name = 'ClientError';
  }
}

export class BackendError extends FetcherError {
  constructor(public backend: string, public detail: string, options?: { cause?: unknown }) {
    super(`${backend}: ${detail}`, 'BACKEND_ERROR', true, options);
    this.name = 'BackendError';
  }
}

export class BackendNotFoundError extends FetcherError {
  constructor(public backend: string, public available: string[]) {
    super(`Unknown backend '${backend}'. Available: ${available.join(', ')}`, 'BACKEND_NOT_FOUND');
    this.name = 'BackendNotFoundError';
  }
}

/**
 * Raised once every backend in the trial order has failed. `cause` holds the
 * last underlying failure.
 */
export class NoBackendAvailableError extends FetcherError {
  constructor(message: string, public tried: string[] = [], options?: { cause?: unknown }) {
    super(message, 'NO_BACKEND_AVAILABLE', false, options);
    this.name = 'NoBackendAvailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Handles errors with appropriate logging
 */
export function handleError(error: unknown, context: string): void {
  if (error instanceof FetcherError) {
    logger.error(`[${context}] ${error.code}: ${error.message}`);
    if (error.cause !== undefined) {
      logger.debug(`[${context}] Caused by: ${errorMessage(error.cause)}`);
    }
  } else {
    logger.error(`[${context}] Unexpected error: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      logger.debug(`[${context}] Stack trace: ${error.stack}`);
    }
  }
}
