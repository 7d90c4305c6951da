/**
 * Structured context attached to discovery and validation failures
 */
export interface ErrorContext {
  url?: string;
  status?: number;
  payload?: string;
}

export interface DiscoveryErrorOptions extends ErrorContext {
  cause?: unknown;
}

/**
 * Raised when a configuration value is rejected before any network access
 */
export class ValidationError extends Error {
  readonly url?: string;

  constructor(message: string, options: DiscoveryErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ValidationError';
    this.url = options.url;
  }
}

/**
 * Raised for every Home Assistant discovery failure, REST or WebSocket
 */
export class DiscoveryError extends Error {
  readonly url?: string;
  readonly status?: number;
  readonly payload?: string;

  constructor(message: string, options: DiscoveryErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'DiscoveryError';
    this.url = options.url;
    this.status = options.status;
    this.payload = options.payload;
  }
}
