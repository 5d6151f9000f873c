import type { ContentfulStatusCode } from 'hono/utils/http-status'

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'DEPENDENCY_ERROR'

/**
 * Base class for every error the relay raises on purpose.
 *
 * `code` and `status` are what the HTTP layer renders; anything that is not an
 * `AppError` becomes `INTERNAL_ERROR`.
 */
export class AppError extends Error {
  readonly code: ErrorCode
  readonly status: ContentfulStatusCode
  readonly details?: unknown

  constructor(
    code: ErrorCode,
    status: ContentfulStatusCode,
    message: string,
    options?: { cause?: unknown; details?: unknown },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = new.target.name
    this.code = code
    this.status = status
    this.details = options?.details
  }
}

/** Malformed or missing input. */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', 400, message, { details })
  }
}

/** No usable credentials on a route that needs them. */
export class AuthenticationError extends AppError {
  constructor(message = 'Authentication required.') {
    super('UNAUTHORIZED', 401, message)
  }
}

/** The caller has no standing on the record. */
export class AuthorizationError extends AppError {
  constructor(message: string) {
    super('FORBIDDEN', 403, message)
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', 404, message)
  }
}

export type DependencySource = 'store' | 'gateway'

/** The durable store or the push gateway failed. */
export class DependencyError extends AppError {
  readonly source: DependencySource
  readonly operation: string

  constructor(source: DependencySource, operation: string, cause: unknown) {
    super(
      'DEPENDENCY_ERROR',
      source === 'gateway' ? 502 : 500,
      `${source} call ${operation} failed: ${describeError(cause)}`,
      { cause },
    )
    this.source = source
    this.operation = operation
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

/**
 * Run a collaborator call. `AppError`s pass through untouched so a store's
 * `NotFoundError` keeps its meaning; anything else is a `DependencyError`.
 */
export async function callDependency<T>(
  source: DependencySource,
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn()
  } catch (error) {
    if (error instanceof AppError) throw error
    throw new DependencyError(source, operation, error)
  }
}
