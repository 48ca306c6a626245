/**
 * Error categorization for the formatting library
 *
 * Provides structured error types with consistent error codes so callers can
 * tell rejected input apart from misconfiguration.
 *
 * @file
 * **Error Types:**
 * - BaseError: Abstract base class for all library errors
 * - InvalidInputError: A value outside the domain a formatter accepts
 * - ConfigurationError: Invalid environment configuration
 *
 * Formatting itself is total over valid input; every error is raised when a
 * wrapper is constructed or configuration is read, never while rendering.
 */

/**
 * Base error class for all library errors
 *
 * Extends the standard Error class with error codes and structured
 * metadata.
 *
 * @public
 */
export abstract class BaseError extends Error {
  /**
   * Unique error code for this error type
   */
  public readonly code: string;

  /**
   * Additional error metadata
   */
  public readonly metadata: Record<string, unknown>;

  /**
   * Create a new base error
   *
   * @param message - Human-readable error message
   * @param code - Unique error code
   * @param metadata - Additional error context
   */
  constructor(message: string, code: string, metadata: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.metadata = metadata;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Invalid input error for values a formatter cannot represent
 *
 * Raised for negative byte counts or spans, non-finite numbers, precision
 * outside the supported range, malformed permission modes and invalid
 * instants.
 *
 * @public
 */
export class InvalidInputError extends BaseError {
  /**
   * Create a new invalid input error
   *
   * @param message - Description of why the value was rejected
   * @param field - The input that failed validation
   * @param value - The rejected value
   * @param expected - Description of the accepted domain
   * @param metadata - Additional validation context
   */
  constructor(
    message: string,
    field?: string,
    value?: unknown,
    expected?: string,
    metadata: Record<string, unknown> = {},
  ) {
    super(message, "INVALID_INPUT", {
      field,
      value,
      expected,
      ...metadata,
    });
  }
}

/**
 * Configuration error for invalid environment settings
 *
 * @public
 */
export class ConfigurationError extends BaseError {
  /**
   * Create a new configuration error
   *
   * @param message - Configuration error message
   * @param configKey - The configuration key that is invalid
   * @param actualValue - The value found
   * @param metadata - Additional configuration context
   */
  constructor(
    message: string,
    configKey?: string,
    actualValue?: unknown,
    metadata: Record<string, unknown> = {},
  ) {
    super(message, "CONFIGURATION_ERROR", {
      configKey,
      actualValue,
      ...metadata,
    });
  }
}

/**
 * Check if an error is one of our custom error types
 *
 * @param error - The error to check
 * @returns True if the error is a BaseError instance
 *
 * @public
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Format error for display with optional metadata
 *
 * @param error - The error to format
 * @param includeMetadata - Whether to include error metadata in output
 * @returns Formatted error message
 *
 * @public
 */
export function formatError(error: unknown, includeMetadata = false): string {
  if (isBaseError(error)) {
    let formatted = `${error.code}: ${error.message}`;

    const definedMetadata = Object.fromEntries(
      Object.entries(error.metadata).filter(([, value]) => value !== undefined),
    );
    if (includeMetadata && Object.keys(definedMetadata).length > 0) {
      formatted += `\nDetails: ${JSON.stringify(definedMetadata, toJsonSafe, 2)}`;
    }

    return formatted;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * JSON replacer for values JSON.stringify cannot encode
 *
 * @internal
 */
function toJsonSafe(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    return String(value);
  }
  return value;
}
