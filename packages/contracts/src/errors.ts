/**
 * @fileoverview Error taxonomy for MarketLens.
 *
 * Every error carries a machine-readable code, an optional structured payload
 * and the ISO timestamp at which it was raised, so callers can branch on the
 * code and loggers can serialize the whole thing.
 *
 * @module @marketlens/contracts/errors
 */

/**
 * Base error class for all MarketLens errors.
 *
 * @invariant code is a non-empty string
 * @invariant timestamp is a valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new MarketLensError('DUPLICATE_STRATEGY', 'Strategy "MACD" registered twice', {
 *   name: 'MACD'
 * });
 * ```
 */
export class MarketLensError extends Error {
  readonly code: string;
  readonly data?: Record<string, unknown>;
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when indicator computation cannot proceed on the given series.
 *
 * @example
 * ```typescript
 * throw new ComputationError('Timestamps must be strictly ascending', {
 *   stage: 'validate',
 *   index: 17
 * });
 * ```
 */
export class ComputationError extends MarketLensError {
  constructor(
    message: string,
    data: {
      /** Step that failed, e.g. 'validate', 'macd', 'rsi' */
      stage: string;
      index?: number;
      [key: string]: unknown;
    }
  ) {
    super('COMPUTATION_FAILED', message, data);
  }
}

/**
 * Thrown when a market-data request fails for a reason other than throttling
 * or an unknown symbol (network error, 5xx, malformed payload).
 */
export class ProviderRequestError extends MarketLensError {
  constructor(
    message: string,
    data: {
      provider: string;
      symbol?: string;
      status?: number;
      [key: string]: unknown;
    }
  ) {
    super('PROVIDER_REQUEST_FAILED', message, data);
  }
}

/**
 * Thrown when a data provider's rate limit is exceeded.
 *
 * Indicates temporary throttling; the caller decides whether to back off and
 * retry.
 */
export class ProviderRateLimitError extends MarketLensError {
  constructor(
    message: string,
    data: {
      provider: string;
      /** Seconds to wait before retrying, when the provider says */
      retryAfter?: number;
      [key: string]: unknown;
    }
  ) {
    super('PROVIDER_RATE_LIMIT', message, data);
  }
}

/**
 * Thrown when a provider does not know the requested symbol.
 *
 * @example
 * ```typescript
 * throw new SymbolResolutionError('Symbol "AAPLL" not found', {
 *   symbol: 'AAPLL',
 *   provider: 'yahoo'
 * });
 * ```
 */
export class SymbolResolutionError extends MarketLensError {
  constructor(
    message: string,
    data: {
      symbol: string;
      provider: string;
      [key: string]: unknown;
    }
  ) {
    super('SYMBOL_RESOLUTION_FAILED', message, data);
  }
}

export function isMarketLensError(error: unknown): error is MarketLensError {
  return error instanceof MarketLensError;
}

export function isComputationError(error: unknown): error is ComputationError {
  return error instanceof ComputationError;
}

export function isProviderRequestError(error: unknown): error is ProviderRequestError {
  return error instanceof ProviderRequestError;
}

/**
 * @example
 * ```typescript
 * catch (err) {
 *   if (isProviderRateLimitError(err)) {
 *     await sleep((Number(err.data?.retryAfter) || 60) * 1000);
 *     return retry();
 *   }
 * }
 * ```
 */
export function isProviderRateLimitError(error: unknown): error is ProviderRateLimitError {
  return error instanceof ProviderRateLimitError;
}

export function isSymbolResolutionError(error: unknown): error is SymbolResolutionError {
  return error instanceof SymbolResolutionError;
}
