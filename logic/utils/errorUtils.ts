/**
 * Error Handling Utilities
 *
 * Error types thrown by the adapters and helpers for turning caught values
 * into log-friendly messages.
 */

/**
 * Extract error message from error object or value
 * @param error - Error object, string, or any value
 * @returns Error message as string
 */
export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Raised by price data sources when a download fails or the body cannot be used.
 * `retryable` is false only for bodies that will not improve by fetching again.
 */
export class PriceDataError extends Error {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean = true) {
    super(message);
    this.name = 'PriceDataError';
    this.retryable = retryable;
  }
}

/**
 * Raised when environment configuration is missing or invalid.
 */
export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`${key}: ${message}`);
    this.name = 'ConfigError';
    this.key = key;
  }
}
