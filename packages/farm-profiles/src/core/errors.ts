/**
 * Farm Profile Error Types
 *
 * Custom error classes for geometry parsing, dataset configuration and
 * remote query failures. Each carries the structured context needed to
 * report the failure on a profile record or in the CLI.
 */

/**
 * Raised when raw geometry input cannot be parsed into a canonical geometry.
 *
 * Always a caller error: never swallowed by the extraction layer.
 */
export class InvalidGeometryError extends Error {
  constructor(
    message: string,
    public readonly input: unknown
  ) {
    super(message);
    this.name = 'InvalidGeometryError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidGeometryError);
    }
  }
}

/**
 * Raised when a dataset name is not present in the registry
 */
export class UnknownDatasetError extends Error {
  constructor(
    public readonly datasetName: string,
    public readonly available: readonly string[]
  ) {
    super(`Unknown dataset '${datasetName}' (configured: ${available.join(', ') || 'none'})`);
    this.name = 'UnknownDatasetError';
  }
}

/**
 * Raised when a dataset configuration file or entry is malformed
 */
export class DatasetConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'DatasetConfigError';
  }
}

export type RemoteQueryFailureReason = 'unreachable' | 'timeout' | 'rejected' | 'malformed';

/**
 * Raised by a query service when the remote call fails or returns a payload
 * that cannot be interpreted.
 */
export class RemoteQueryError extends Error {
  constructor(
    message: string,
    public readonly reason: RemoteQueryFailureReason,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RemoteQueryError';
  }
}

/**
 * Raised when a single bulk item exceeds its time budget
 */
export class ItemTimeoutError extends Error {
  constructor(
    public readonly index: number,
    public readonly timeoutMs: number
  ) {
    super(`Item ${index} did not complete within ${timeoutMs}ms`);
    this.name = 'ItemTimeoutError';
  }
}

/**
 * Human-readable message for any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.length > 0 ? `${error.name}: ${error.message}` : error.name;
  }
  return String(error);
}
