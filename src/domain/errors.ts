export type ErrorCode =
  | 'DUPLICATE_URL'
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'TRANSIENT_NETWORK'
  | 'CORRUPT_STORE'
  | 'VALIDATION'

export class TrackerError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
  ) {
    super(message)
    this.name = new.target.name
  }
}

export class DuplicateUrlError extends TrackerError {
  constructor(readonly url: string) {
    super(`Post ${url} is already logged`, 'DUPLICATE_URL')
  }
}

export type NotFoundKind = 'record' | 'upstream' | 'profile' | 'report' | 'period'

export class NotFoundError extends TrackerError {
  constructor(
    message: string,
    readonly kind: NotFoundKind,
  ) {
    super(message, 'NOT_FOUND')
  }
}

export class RateLimitedError extends TrackerError {
  constructor(message = 'Reddit rate limit reached') {
    super(message, 'RATE_LIMITED')
  }
}

export class TransientNetworkError extends TrackerError {
  constructor(message: string) {
    super(message, 'TRANSIENT_NETWORK')
  }
}

export class CorruptStoreError extends TrackerError {
  constructor(
    readonly filePath: string,
    readonly reason: string,
  ) {
    super(`Store file ${filePath} is corrupt: ${reason}`, 'CORRUPT_STORE')
  }
}

export class ValidationError extends TrackerError {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message, 'VALIDATION')
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
