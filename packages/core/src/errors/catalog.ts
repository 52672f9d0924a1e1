/**
 * Typed error catalog shared by every datastore implementation.
 *
 * Only conditions that callers branch on live here. Backend failures that
 * are not one of these propagate untouched.
 */

export interface DatastoreErrorOptions {
  details?: Record<string, unknown>
  cause?: unknown
}

export class DatastoreError extends Error {
  public readonly details?: Record<string, unknown>

  constructor(
    public readonly errorCode: string,
    message: string,
    options?: DatastoreErrorOptions,
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = this.constructor.name
    this.details = options?.details
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    }
  }
}

export class NotFoundError extends DatastoreError {
  constructor(options?: DatastoreErrorOptions) {
    super('NOT_FOUND', 'datastore: key not found', options)
  }
}

export class UnsupportedError extends DatastoreError {
  constructor(operation: string, options?: DatastoreErrorOptions) {
    super('UNSUPPORTED', `datastore: ${operation} is not supported`, {
      ...options,
      details: { operation, ...options?.details },
    })
  }
}

/** Backend-independent not-found check. */
export function isNotFoundError(err: unknown): err is NotFoundError {
  return err instanceof DatastoreError && err.errorCode === 'NOT_FOUND'
}
