/**
 * Shared Errors Module
 *
 * Structured error types for the session runtime.
 *
 * @module errors
 */

export {
  // Error codes
  GameErrorCode,
  ERROR_CATEGORY,
  type ErrorCategory,
  // Base class
  GameError,
  type GameErrorJSON,
  // Specific errors
  SessionBusyError,
  RulePluginError,
  UnknownGameTypeError,
  PayloadCaptureError,
  SnapshotNotFoundError,
  SnapshotCorruptionError,
  ConfigurationError,
  // Utilities
  isGameError,
  isFatalError,
  errorMessage,
  wrapError,
} from './GameDomainErrors';
