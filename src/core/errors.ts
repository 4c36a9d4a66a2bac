// src/core/errors.ts

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/** Raw filter input violates a Filter Model constraint */
export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`)
    this.name = 'ValidationError'
  }
}

/** Free text could not be turned into filters. Never leaves the resolver. */
export class InterpretationFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'InterpretationFailure'
  }
}

/** The search provider could not be reached (timeout, connection error) */
export class ProviderUnavailable extends Error {
  readonly retryable = true

  constructor(
    public readonly code: string,
    message: string,
  ) {
    super(message)
    this.name = 'ProviderUnavailable'
  }
}

export type RejectionReason =
  | 'AUTH'
  | 'RATE_LIMIT'
  | 'INVALID_QUERY'
  | 'MALFORMED_RESPONSE'
  | 'UNKNOWN'

/** The search provider answered, but not with a usable result page */
export class ProviderRejected extends Error {
  readonly retryable = false

  constructor(
    public readonly statusCode: number,
    public readonly reason: RejectionReason,
    message: string,
  ) {
    super(message)
    this.name = 'ProviderRejected'
  }
}

export type ProviderFailure = ProviderUnavailable | ProviderRejected

export function isProviderFailure(value: unknown): value is ProviderFailure {
  return value instanceof ProviderUnavailable || value instanceof ProviderRejected
}
