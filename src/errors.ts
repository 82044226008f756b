/**
 * Service Errors
 *
 * Every failure that can reach the HTTP layer carries the pipeline stage it
 * happened in and the status code it maps to.
 */

export type FailureStage = 'request' | 'config' | 'token' | 'watchlist' | 'dataset';

/**
 * Base class for failures surfaced to API callers
 */
export class ServiceError extends Error {
  constructor(
    message: string,
    public readonly stage: FailureStage,
    public readonly statusCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ServiceError';
  }
}

/**
 * Config file is missing, unreadable, malformed or unwritable
 */
export class ConfigError extends ServiceError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'config', 500, options);
    this.name = 'ConfigError';
  }
}

/**
 * No usable access token, or MAL rejected the one we sent
 */
export class AuthError extends ServiceError {
  constructor(message: string, stage: 'token' | 'watchlist', options?: { cause?: unknown }) {
    super(message, stage, 401, options);
    this.name = 'AuthError';
  }
}

/**
 * Network, status or parse failure talking to MAL or the dataset host
 */
export class UpstreamError extends ServiceError {
  constructor(
    message: string,
    stage: 'watchlist' | 'dataset',
    public readonly upstreamStatus?: number,
    options?: { cause?: unknown }
  ) {
    super(message, stage, 502, options);
    this.name = 'UpstreamError';
  }
}

/**
 * Missing or invalid query parameters
 */
export class BadRequestError extends ServiceError {
  constructor(message: string) {
    super(message, 'request', 400);
    this.name = 'BadRequestError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
