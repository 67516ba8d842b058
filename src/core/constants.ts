/**
 * Centralized constants
 *
 * This file contains all magic numbers and string constants used throughout the library.
 */

/**
 * Time intervals in milliseconds
 */
export const TIME = {
  /**
   * Default timeout for graceful shutdown (10 seconds)
   */
  DEFAULT_SHUTDOWN_TIMEOUT_MS: 10_000,

  /**
   * Handler timeout; 0 disables it
   */
  DEFAULT_HANDLER_TIMEOUT_MS: 0,
} as const;

/**
 * Size limits and capacity constraints
 */
export const LIMITS = {
  /**
   * Largest accepted inbound frame (1 MiB)
   */
  MAX_FRAME_BYTES: 1_048_576,
} as const;

/**
 * Default listener settings
 */
export const SERVER = {
  DEFAULT_PORT: 8000,
  DEFAULT_HOST: '0.0.0.0',
  DEFAULT_PATH: '/web',
  HEALTH_PATH: '/health',
} as const;

/**
 * Wire format identifiers
 */
export const FORMAT = {
  JSON: 'json',
  PROTOBUF: 'protobuf',
} as const;

export type FormatName = (typeof FORMAT)[keyof typeof FORMAT];

/**
 * WebSocket close codes (RFC 6455 section 7.4.1)
 */
export const CLOSE_CODE = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  UNSUPPORTED_DATA: 1003,
  INVALID_PAYLOAD: 1007,
  INTERNAL_ERROR: 1011,
} as const;
