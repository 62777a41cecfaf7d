/**
 * Error taxonomy for a relay run.
 *
 * Fatal errors (config, filter, store, fetch) abort the run before anything
 * is recorded. Delivery errors are per item and never abort the run.
 */

export type RelayErrorCode =
  | 'CONFIG_ERROR'
  | 'FILTER_ERROR'
  | 'STORE_ERROR'
  | 'FETCH_ERROR'
  | 'DELIVERY_ERROR'

export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name

    // Fix prototype chain – important after TS → JS down-emit
    Object.setPrototypeOf(this, new.target.prototype)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/** Missing or invalid environment configuration */
export class ConfigError extends RelayError {
  readonly code = 'CONFIG_ERROR'
}

/** Malformed advanced or date filter expression */
export class FilterError extends RelayError {
  readonly code = 'FILTER_ERROR'

  constructor(
    message: string,
    public readonly expression: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/** The persisted state file is unreadable, corrupt, or could not be written */
export class StoreError extends RelayError {
  readonly code = 'STORE_ERROR'

  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

export type FetchErrorKind = 'timeout' | 'http_status' | 'network' | 'parse'

/** The feed could not be retrieved or parsed */
export class FetchError extends RelayError {
  readonly code = 'FETCH_ERROR'

  constructor(
    message: string,
    public readonly kind: FetchErrorKind,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/** A single item could not be posted to the webhook */
export class DeliveryError extends RelayError {
  readonly code = 'DELIVERY_ERROR'

  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/**
 * Determines whether a value is one of the relay's own errors.
 */
export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError
}

/**
 * Normalizes an unknown thrown value into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
