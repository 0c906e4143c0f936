/**
 * Base error class for clipcourier
 */
export class ClipCourierError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClipCourierError';
  }
}

/**
 * Configuration error (missing credential, invalid config file)
 */
export class ConfigError extends ClipCourierError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Input rejected before any engine call (unsupported URL, query too short)
 */
export class ValidationError extends ClipCourierError {
  constructor(
    message: string,
    public readonly input: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type AccessDeniedReason = 'unavailable' | 'blocked';

/**
 * Content cannot be accessed: private, removed, geo-restricted or blocked by the server
 */
export class AccessDeniedError extends ClipCourierError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly reason: AccessDeniedReason,
  ) {
    super(message);
    this.name = 'AccessDeniedError';
  }
}

/**
 * Timeout, rate limit or generic network failure while talking to the engine
 */
export class TransientFetchError extends ClipCourierError {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
    this.name = 'TransientFetchError';
  }
}

/**
 * Fetch finished but produced no file above the size threshold
 */
export class EmptyPayloadError extends ClipCourierError {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(message);
    this.name = 'EmptyPayloadError';
  }
}

/**
 * Upload to the chat failed on every channel
 */
export class DeliveryError extends ClipCourierError {
  constructor(
    message: string,
    public readonly uploadError?: unknown,
  ) {
    super(message);
    this.name = 'DeliveryError';
  }
}

/**
 * Search returned nothing usable
 */
export class SearchError extends ClipCourierError {
  constructor(
    message: string,
    public readonly query: string,
  ) {
    super(message);
    this.name = 'SearchError';
  }
}

/**
 * Every attempt of a retried operation failed
 */
export class RetryExhaustedError extends ClipCourierError {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: Error,
  ) {
    super(message);
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Worker pool refused a job because its queue is at capacity
 */
export class QueueFullError extends ClipCourierError {
  constructor(message: string) {
    super(message);
    this.name = 'QueueFullError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
