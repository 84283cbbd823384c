// Error hierarchy for the lookup pipeline
// Every per-request failure maps to one of these; none of them is fatal to the process

export interface ErrorBody {
  error: string
  message: string
  detail?: string
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string
  public readonly statusCode: number
  public readonly isOperational: boolean
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = this.constructor.name
    this.code = code
    this.statusCode = statusCode
    this.isOperational = isOperational
    this.context = context
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): ErrorBody {
    const detail = this.context?.detail
    return {
      error: this.code,
      message: this.message,
      ...(typeof detail === 'string' ? { detail } : {}),
    }
  }
}

export class InvalidIdentifierFormatError extends AppError {
  constructor(raw: string, reason: string) {
    super('Invalid patent format', 'INVALID_IDENTIFIER_FORMAT', 400, true, {
      raw,
      detail: `Patent '${raw}' has invalid format: ${reason}. Expected: EP1234567 or US7654321`,
    })
  }
}

export class PatentNotFoundError extends AppError {
  constructor(identifier: string, source: string) {
    super('Patent not found', 'NOT_FOUND_UPSTREAM', 404, true, {
      identifier,
      source,
      detail: `Patent ${identifier} not found in ${source}`,
    })
  }
}

export class RateLimitExceededError extends AppError {
  public readonly resetAt: string

  constructor(tier: string, limit: number, resetAt: string) {
    super('Too many requests', 'RATE_LIMIT_EXCEEDED', 429, true, {
      tier,
      limit,
      resetAt,
      detail: `Rate limit (${limit} requests) exceeded for tier '${tier}'. Resets at ${resetAt}`,
    })
    this.resetAt = resetAt
  }
}

export class UpstreamUnavailableError extends AppError {
  constructor(identifier: string, source: string, reason: string) {
    super(`${source} is temporarily unavailable`, 'UPSTREAM_TRANSIENT_FAILURE', 503, true, {
      identifier,
      source,
      detail: reason,
    })
  }
}

export class ServiceDegradedError extends AppError {
  constructor(identifier: string, source: string, reason: string) {
    super(`${source} credentials were rejected`, 'SERVICE_DEGRADED', 503, true, {
      identifier,
      source,
      detail: reason,
    })
  }
}

export class CacheUnavailableError extends AppError {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Cache ${operation} failed`, 'CACHE_UNAVAILABLE', 503, true, {
      operation,
      detail: reason,
    })
  }
}

export class ConfigurationError extends AppError {
  constructor(issues: string[]) {
    super('Invalid configuration', 'CONFIGURATION_ERROR', 500, false, {
      issues,
      detail: issues.join('; '),
    })
  }
}

/**
 * Wrap anything thrown into an AppError so callers always see the same shape
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error
  const message = error instanceof Error ? error.message : String(error)
  return new AppError('Failed to retrieve patent status', 'INTERNAL_ERROR', 500, false, {
    detail: message,
  })
}
