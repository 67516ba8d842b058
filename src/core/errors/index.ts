import { RSPCode } from '../../protocol/constants';

export type ErrorDetails = Record<string, unknown>;

/**
 * Base error class for all application errors
 *
 * `rspCode` is the status a handler reports when this error is turned into a
 * response frame by `withErrorHandling`.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: ErrorDetails,
    public rspCode: RSPCode = RSPCode.ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Handler registration errors, raised at startup only.
 * - RegistrationError.duplicateHandler() - PkgID already has a handler
 * - RegistrationError.invalidHandler() - Handler is not a function
 */
export class RegistrationError extends AppError {
  private constructor(message: string, code: string, details?: ErrorDetails) {
    super(message, code, details);
  }

  static duplicateHandler(message: string, details?: ErrorDetails): RegistrationError {
    return new RegistrationError(message, 'REGISTRATION_ERROR:DUPLICATE_HANDLER', details);
  }

  static invalidHandler(message: string, details?: ErrorDetails): RegistrationError {
    return new RegistrationError(message, 'REGISTRATION_ERROR:INVALID_HANDLER', details);
  }
}

/**
 * Validation errors.
 * - ValidationError.invalidConfig() - Invalid configuration
 * - ValidationError.invalidInput() - Handler input rejected by business rules
 */
export class ValidationError extends AppError {
  private constructor(message: string, code: string, details?: ErrorDetails) {
    super(message, code, details, RSPCode.INVALID_DATA);
  }

  static invalidConfig(message: string, details?: ErrorDetails): ValidationError {
    return new ValidationError(message, 'VALIDATION_ERROR:INVALID_CONFIG', details);
  }

  static invalidInput(message: string, details?: ErrorDetails): ValidationError {
    return new ValidationError(message, 'VALIDATION_ERROR:INVALID_INPUT', details);
  }
}

/**
 * A frame arrived in a shape the connection's format does not accept
 * (bytes on a JSON connection, a mapping on a Protobuf connection)
 */
export class FormatMismatchError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'FORMAT_MISMATCH_ERROR', details);
  }
}

/**
 * Binary frame could not be decoded
 */
export class DecodeError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'DECODE_ERROR', details);
  }
}

/**
 * Decoded frame could not be turned into a request envelope
 */
export class DataConversionError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'DATA_CONVERSION_ERROR', details);
  }
}

/**
 * Text frame rejected before parsing (size, content)
 */
export class MessageValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'MESSAGE_VALIDATION_ERROR', details);
  }
}

/**
 * Text frame is not valid JSON
 */
export class MessageParsingError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'MESSAGE_PARSING_ERROR', details);
  }
}

/**
 * Timeout errors
 */
export class TimeoutError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'TIMEOUT_ERROR', details);
  }
}

/**
 * Storage layer failures. Never echoed to clients verbatim.
 */
export class StorageError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'STORAGE_ERROR', details);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'CONFLICT_ERROR', details);
  }
}

/**
 * Errors that mean the peer sent something unusable; the transport closes the
 * connection when it sees one of these.
 */
export const isFrameError = (
  error: unknown
): error is
  | FormatMismatchError
  | DecodeError
  | DataConversionError
  | MessageParsingError
  | MessageValidationError =>
  error instanceof FormatMismatchError ||
  error instanceof DecodeError ||
  error instanceof DataConversionError ||
  error instanceof MessageParsingError ||
  error instanceof MessageValidationError;
