/**
 * Game Domain Errors - Structured error types for the session runtime
 *
 * Rejected actions (wrong turn, game not started, ...) are NOT errors; they are
 * returned as `ActionResult` values. The classes here cover the failures that
 * escape normal rule flow:
 *
 * - **Session Errors**: missing session, lock contention
 * - **Rule Errors**: exceptions raised by game-type-specific logic
 * - **Capture Errors**: attachment bytes that could not be materialized
 * - **Snapshot Errors**: unreadable or structurally corrupt snapshots
 * - **Configuration Errors**: missing resources at startup (fatal)
 *
 * Usage:
 * ```typescript
 * import { GameError, RulePluginError } from './GameDomainErrors';
 *
 * throw new RulePluginError('snakes_ladders', 'resolveMove', cause);
 *
 * if (error instanceof GameError) {
 *   logger.warn(error.message, error.context);
 * }
 * ```
 *
 * @module GameDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

export enum GameErrorCode {
  // Session Errors
  SESSION_BUSY = 'SESSION_BUSY',
  SESSION_INVALID_STATE = 'SESSION_INVALID_STATE',

  // Rule Errors
  RULE_PLUGIN_FAILURE = 'RULE_PLUGIN_FAILURE',
  RULE_UNKNOWN_GAME_TYPE = 'RULE_UNKNOWN_GAME_TYPE',

  // Capture Errors
  PAYLOAD_CAPTURE_FAILED = 'PAYLOAD_CAPTURE_FAILED',

  // Snapshot Errors
  SNAPSHOT_NOT_FOUND = 'SNAPSHOT_NOT_FOUND',
  SNAPSHOT_CORRUPT = 'SNAPSHOT_CORRUPT',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

/**
 * Error taxonomy buckets. `rejected_action` never appears on a thrown error;
 * it is listed so log consumers share one vocabulary.
 */
export type ErrorCategory =
  | 'rejected_action'
  | 'rule_plugin'
  | 'payload_capture'
  | 'snapshot'
  | 'fatal_startup'
  | 'internal';

export const ERROR_CATEGORY: Record<GameErrorCode, ErrorCategory> = {
  [GameErrorCode.SESSION_BUSY]: 'internal',
  [GameErrorCode.SESSION_INVALID_STATE]: 'internal',
  [GameErrorCode.RULE_PLUGIN_FAILURE]: 'rule_plugin',
  [GameErrorCode.RULE_UNKNOWN_GAME_TYPE]: 'rule_plugin',
  [GameErrorCode.PAYLOAD_CAPTURE_FAILED]: 'payload_capture',
  [GameErrorCode.SNAPSHOT_NOT_FOUND]: 'snapshot',
  [GameErrorCode.SNAPSHOT_CORRUPT]: 'snapshot',
  [GameErrorCode.INTERNAL_ERROR]: 'internal',
  [GameErrorCode.CONFIGURATION_ERROR]: 'fatal_startup',
};

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all game domain errors.
 */
export class GameError extends Error {
  readonly code: GameErrorCode;

  readonly context: Record<string, unknown>;

  /** Whether this error should abort process start. */
  readonly isFatal: boolean;

  readonly timestamp: Date;

  constructor(
    code: GameErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    isFatal: boolean = false
  ) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    this.isFatal = isFatal;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GameError.prototype);
  }

  get category(): ErrorCategory {
    return ERROR_CATEGORY[this.code] ?? 'internal';
  }

  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      isFatal: this.isFatal,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface GameErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  isFatal: boolean;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Raised by `withLock` when the session's lock is already held. The
 * serializer never waits on a held lock.
 */
export class SessionBusyError extends GameError {
  constructor(sessionId: string, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.SESSION_BUSY,
      `Session ${sessionId} is busy`,
      { sessionId, ...context },
      false
    );
    this.name = 'SessionBusyError';
    Object.setPrototypeOf(this, SessionBusyError.prototype);
  }
}

/**
 * Exception raised inside game-type-specific rule logic.
 */
export class RulePluginError extends GameError {
  readonly cause: unknown;

  constructor(gameType: string, operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      GameErrorCode.RULE_PLUGIN_FAILURE,
      `Rule plugin ${gameType} failed during ${operation}: ${reason}`,
      { gameType, operation, reason },
      false
    );
    this.name = 'RulePluginError';
    this.cause = cause;
    Object.setPrototypeOf(this, RulePluginError.prototype);
  }
}

export class UnknownGameTypeError extends GameError {
  constructor(gameType: string) {
    super(
      GameErrorCode.RULE_UNKNOWN_GAME_TYPE,
      `Unknown game type: ${gameType}`,
      { gameType },
      false
    );
    this.name = 'UnknownGameTypeError';
    Object.setPrototypeOf(this, UnknownGameTypeError.prototype);
  }
}

export class PayloadCaptureError extends GameError {
  constructor(filename: string, reason: string, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.PAYLOAD_CAPTURE_FAILED,
      `Could not capture attachment ${filename}: ${reason}`,
      { filename, reason, ...context },
      false
    );
    this.name = 'PayloadCaptureError';
    Object.setPrototypeOf(this, PayloadCaptureError.prototype);
  }
}

export class SnapshotNotFoundError extends GameError {
  constructor(sessionId: string, snapshotId: string) {
    super(
      GameErrorCode.SNAPSHOT_NOT_FOUND,
      `Snapshot ${snapshotId} not found for session ${sessionId}`,
      { sessionId, snapshotId },
      false
    );
    this.name = 'SnapshotNotFoundError';
    Object.setPrototypeOf(this, SnapshotNotFoundError.prototype);
  }
}

export class SnapshotCorruptionError extends GameError {
  constructor(snapshotId: string, reason: string) {
    super(
      GameErrorCode.SNAPSHOT_CORRUPT,
      `Snapshot ${snapshotId} is unreadable: ${reason}`,
      { snapshotId, reason },
      false
    );
    this.name = 'SnapshotCorruptionError';
    Object.setPrototypeOf(this, SnapshotCorruptionError.prototype);
  }
}

/**
 * Missing or invalid external resources at startup. Always fatal.
 */
export class ConfigurationError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.CONFIGURATION_ERROR, message, context, true);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

export function isFatalError(error: unknown): boolean {
  return isGameError(error) && error.isFatal;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error in a GameError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): GameError {
  if (isGameError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new GameError(
      GameErrorCode.INTERNAL_ERROR,
      error.message,
      { originalError: error.name, stack: error.stack, ...context },
      false
    );
  }

  return new GameError(GameErrorCode.INTERNAL_ERROR, String(error), context, false);
}
