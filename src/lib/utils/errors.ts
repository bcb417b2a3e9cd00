/**
 * Custom error classes for better error handling
 */
export class APIError extends Error {
  constructor(message: string, public statusCode: number, public provider: string) {
    super(message)
    this.name = 'APIError'
  }
}

/** Missing or malformed startup configuration. Fatal. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** Upstream rejected the credential (HTTP 401/403). Never retried, never masked by stale data. */
export class AuthError extends APIError {
  constructor(message: string, statusCode: number, provider: string) {
    super(message, statusCode, provider)
    this.name = 'AuthError'
  }
}

export class RateLimitError extends APIError {
  constructor(message: string, provider: string, public retryAfterSeconds?: number) {
    super(message, 429, provider)
    this.name = 'RateLimitError'
  }
}

/**
 * Network failure, timeout or HTTP 5xx. `statusCode` is absent when no response arrived.
 */
export class TransportError extends Error {
  constructor(message: string, public provider: string, public statusCode?: number) {
    super(message)
    this.name = 'TransportError'
  }
}

/** Upstream body was not valid JSON or did not match the expected shape. */
export class DecodeError extends Error {
  constructor(message: string, public provider: string) {
    super(message)
    this.name = 'DecodeError'
  }
}

export class ValidationError extends Error {
  constructor(message: string, public field?: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Extract user-friendly error message from error object
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'An unknown error occurred'
}

/**
 * Check if error is due to rate limiting
 */
export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError
}

/**
 * Errors after which a previously cached payload may be served instead.
 */
export function isRecoverableError(error: unknown): error is RateLimitError | TransportError {
  return isRateLimitError(error) || isTransportError(error)
}
