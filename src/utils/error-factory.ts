import { StegoError, StegoErrorType } from '../interfaces';

/**
 * Factory for creating standardized StegoError objects
 */
export class ErrorFactory {
  /**
   * Create an error for a frame too small to hold a character
   */
  static INSUFFICIENT_CAPACITY(message: string, cause?: unknown): StegoError {
    return new StegoError(StegoErrorType.INSUFFICIENT_CAPACITY, message, cause);
  }

  /**
   * Create an error for a length the header cannot represent
   */
  static LENGTH_OVERFLOW(message: string, cause?: unknown): StegoError {
    return new StegoError(StegoErrorType.LENGTH_OVERFLOW, message, cause);
  }

  /**
   * Create an error for a message longer than the video's payload frames
   */
  static MESSAGE_TOO_LONG(message: string, cause?: unknown): StegoError {
    return new StegoError(StegoErrorType.MESSAGE_TOO_LONG, message, cause);
  }

  /**
   * Create an error for a character outside the single-byte range
   */
  static UNSUPPORTED_CHARACTER(message: string, cause?: unknown): StegoError {
    return new StegoError(StegoErrorType.UNSUPPORTED_CHARACTER, message, cause);
  }

  /**
   * Create an error for an extraction with no frames
   */
  static EMPTY_INPUT(message: string, cause?: unknown): StegoError {
    return new StegoError(StegoErrorType.EMPTY_INPUT, message, cause);
  }

  /**
   * Create an error for a length header that disagrees with the video
   */
  static CORRUPT_HEADER(message: string, cause?: unknown): StegoError {
    return new StegoError(StegoErrorType.CORRUPT_HEADER, message, cause);
  }

  /**
   * Create an invalid configuration error
   */
  static INVALID_CONFIG(message: string, cause?: unknown): StegoError {
    return new StegoError(StegoErrorType.INVALID_CONFIG, message, cause);
  }

  /**
   * Create an error for a malformed frame or frame index
   */
  static INVALID_FRAME(message: string, cause?: unknown): StegoError {
    return new StegoError(StegoErrorType.INVALID_FRAME, message, cause);
  }

  /**
   * Create an error for malformed container data
   */
  static INVALID_FORMAT(message: string, cause?: unknown): StegoError {
    return new StegoError(StegoErrorType.INVALID_FORMAT, message, cause);
  }

  /**
   * Create an error for a container variant we cannot embed in
   */
  static UNSUPPORTED_FORMAT(message: string, cause?: unknown): StegoError {
    return new StegoError(StegoErrorType.UNSUPPORTED_FORMAT, message, cause);
  }

  /**
   * Create a file system error, keeping the original failure as the cause
   */
  static IO(message: string, cause?: unknown): StegoError {
    return new StegoError(StegoErrorType.IO_ERROR, message, cause);
  }
}
