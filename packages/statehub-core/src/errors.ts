/**
 * Error types raised by the store, the bus and the configuration loader
 */

export class StateHubError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'StateHubError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Raised by every operation on a store, bus, channel, lock or provider after it was disposed
 */
export class DisposedError extends StateHubError {
  readonly owner: string;

  constructor(owner: string, operation: string) {
    super(`Cannot ${operation}: ${owner} has been disposed`, 'DISPOSED', { owner, operation });
    this.name = 'DisposedError';
    this.owner = owner;
  }
}

export type EncodingErrorCode = 'CYCLIC_VALUE' | 'MALFORMED_ENCODING';

/**
 * `CYCLIC_VALUE` when encoding a value reachable from itself, `MALFORMED_ENCODING` when decoding
 * a tag node that does not have the shape `encodeCanonical` writes
 */
export class EncodingError extends StateHubError {
  constructor(message: string, code: EncodingErrorCode, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'EncodingError';
  }
}

export class ConfigError extends StateHubError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_CONFIG', context);
    this.name = 'ConfigError';
  }
}
