/**
 * Raised for non-2xx answers and for requests that never got an answer.
 */
export class TransportError extends Error {
  override readonly name = 'TransportError';

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    readonly statusText?: string,
    readonly body?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class UnsupportedOperationError extends Error {
  override readonly name = 'UnsupportedOperationError';

  constructor(
    readonly technology: string,
    readonly operation: string
  ) {
    super(`Method <${operation}> not implemented in ${technology}`);
  }
}

/**
 * More than one property owns the mandatory flag for a (predicate, card-of) pair:
 * the graph itself is inconsistent.
 */
export class MultipleMatchError extends Error {
  override readonly name = 'MultipleMatchError';

  constructor(
    readonly propertyUri: string,
    readonly cardOfUri: string | undefined,
    readonly matches: number
  ) {
    super(`Too many properties (${matches}) retrieved for prop_uri = ${propertyUri}, and card_of_uri = ${cardOfUri ?? '(any)'}`);
  }
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';
}
