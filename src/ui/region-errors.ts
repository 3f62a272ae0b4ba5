/**
 * Errors raised by RegionController.
 *
 * Every error carries a stable `code` so callers can branch without
 * relying on class identity across bundles.
 */

export type RegionErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'INVALID_STATE'
  | 'INDEX_OUT_OF_RANGE'
  | 'INVALID_CONTENT'
  | 'OUTPUT_SINK_FAILURE';

export class RegionError extends Error {
  constructor(
    message: string,
    public readonly code: RegionErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RegionError';
  }
}

export class InvalidConfigurationError extends RegionError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION');
    this.name = 'InvalidConfigurationError';
  }
}

export class InvalidStateError extends RegionError {
  constructor(message: string) {
    super(message, 'INVALID_STATE');
    this.name = 'InvalidStateError';
  }
}

export class IndexOutOfRangeError extends RegionError {
  constructor(
    public readonly index: number,
    public readonly height: number
  ) {
    super(`Bar line index ${index} is outside [0, ${height})`, 'INDEX_OUT_OF_RANGE');
    this.name = 'IndexOutOfRangeError';
  }
}

export class InvalidContentError extends RegionError {
  constructor(message: string) {
    super(message, 'INVALID_CONTENT');
    this.name = 'InvalidContentError';
  }
}

/**
 * Wraps a failure thrown by the underlying output stream
 */
export class OutputSinkError extends RegionError {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Output sink failed during ${operation}: ${reason}`, 'OUTPUT_SINK_FAILURE', { cause });
    this.name = 'OutputSinkError';
  }
}

/**
 * Check whether a value is a region error, optionally of a given code
 */
export function isRegionError(value: unknown, code?: RegionErrorCode): value is RegionError {
  if (!(value instanceof RegionError)) return false;
  return code === undefined || value.code === code;
}
