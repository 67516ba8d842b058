/**
 * ws-package-router - typed request packages over WebSocket
 *
 * Multiplexes request/response packages over a single WebSocket connection
 * per client. Frames are decoded by a per-connection wire format (JSON or
 * Protobuf), checked against the package's required roles and JSON Schema,
 * and dispatched to the registered handler.
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE - Logging, Errors, Constants
// ============================================================================

export { SilentLogger, ConsoleLogger, withContext, toError, LOG_LEVELS } from './core/types/Logger';
export type { Logger, LogLevel, LogContext, ConsoleLoggerOptions } from './core/types/Logger';

export {
  AppError,
  RegistrationError,
  ValidationError,
  FormatMismatchError,
  DecodeError,
  DataConversionError,
  MessageValidationError,
  MessageParsingError,
  TimeoutError,
  StorageError,
  ConflictError,
  isFrameError,
} from './core/errors';
export type { ErrorDetails } from './core/errors';

export { TIME, LIMITS, SERVER, FORMAT, CLOSE_CODE } from './core/constants';
export type { FormatName } from './core/constants';

// ============================================================================
// PROTOCOL - Envelopes and Codes
// ============================================================================

export * from './protocol';

// ============================================================================
// FORMATS - Wire Format Strategies
// ============================================================================

export * from './formats';

// ============================================================================
// ROUTER - Registry, Permissions, Validation
// ============================================================================

export * from './router';

// ============================================================================
// SERVER - Transport
// ============================================================================

export * from './server';

// ============================================================================
// AUTHORS - Example Domain
// ============================================================================

export * from './authors';

// ============================================================================
// CONFIG
// ============================================================================

export { loadConfig, loadTokens } from './config/Config';
export type { AppConfig } from './config/Config';
export { bootstrap } from './bootstrap';
export type { Application, BootstrapOverrides } from './bootstrap';
