/**
 * Error types raised while hiding or recovering a message
 */
export enum StegoErrorType {
  INSUFFICIENT_CAPACITY = 'INSUFFICIENT_CAPACITY', // Frame has fewer samples than bits to store
  LENGTH_OVERFLOW = 'LENGTH_OVERFLOW',             // Length does not fit in the header
  MESSAGE_TOO_LONG = 'MESSAGE_TOO_LONG',           // More characters than payload frames
  UNSUPPORTED_CHARACTER = 'UNSUPPORTED_CHARACTER', // Character outside the single-byte range
  EMPTY_INPUT = 'EMPTY_INPUT',                     // No frames to extract from
  CORRUPT_HEADER = 'CORRUPT_HEADER',               // Header length inconsistent with frame count
  INVALID_CONFIG = 'INVALID_CONFIG',               // Invalid configuration
  INVALID_FRAME = 'INVALID_FRAME',                 // Frame shape or buffer size mismatch
  INVALID_FORMAT = 'INVALID_FORMAT',               // Malformed container data
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',       // Well-formed container we cannot embed in
  IO_ERROR = 'IO_ERROR',                           // File system failures
}

/**
 * Error thrown by every stegvid operation
 */
export class StegoError extends Error {
  readonly type: StegoErrorType;
  readonly cause?: unknown;

  constructor(type: StegoErrorType, message: string, cause?: unknown) {
    super(message);
    this.name = 'StegoError';
    this.type = type;
    this.cause = cause;
  }
}

/**
 * Narrow an unknown thrown value to a StegoError, optionally of one type
 */
export function isStegoError(
  err: unknown,
  type?: StegoErrorType
): err is StegoError {
  return err instanceof StegoError && (type === undefined || err.type === type);
}
