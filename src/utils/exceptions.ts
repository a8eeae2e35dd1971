/**
 * Error codes attached to engine exceptions.
 * Callers use these to tell failure kinds apart without parsing messages.
 */
export const ErrorCode = {
  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  PERSISTENCE_ERROR: 'PERSISTENCE_ERROR',

  // Game-specific errors
  GAME_NOT_FOUND: 'GAME_NOT_FOUND',
  GAME_ENDED: 'GAME_ENDED',
  NOT_YOUR_TURN: 'NOT_YOUR_TURN',
  INVALID_SNAPSHOT: 'INVALID_SNAPSHOT',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when validation fails
 */
export class ValidationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.VALIDATION_ERROR) {
    super(message, 400, errorCode);
  }
}

/**
 * Thrown when resource is not found
 */
export class NotFoundException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.NOT_FOUND) {
    super(message, 404, errorCode);
  }
}

/**
 * Thrown when the requested transition conflicts with the current state
 */
export class ConflictException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.CONFLICT) {
    super(message, 409, errorCode);
  }
}

/**
 * Thrown when the state store fails.
 * Wraps the original error so driver details stay out of user-facing messages.
 */
export class PersistenceException extends AppException {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(message, 500, ErrorCode.PERSISTENCE_ERROR);
    this.originalError = originalError;
  }

  static fromError(error: unknown, operation: string): PersistenceException {
    const originalError = error instanceof Error ? error : new Error(String(error));
    return new PersistenceException(`Persistence operation failed: ${operation}`, originalError);
  }
}

/**
 * Normalizes anything caught into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// Domain-specific exception factory functions for common scenarios
export const GameErrors = {
  notFound: (gameId: string) =>
    new NotFoundException(`Game ${gameId} not found`, ErrorCode.GAME_NOT_FOUND),
  ended: () =>
    new ConflictException('Cannot make move: game has ended', ErrorCode.GAME_ENDED),
  notYourTurn: (player: string) =>
    new ValidationException(`Not ${player}'s turn`, ErrorCode.NOT_YOUR_TURN),
  invalidSnapshot: (detail: string) =>
    new ValidationException(`Invalid game snapshot: ${detail}`, ErrorCode.INVALID_SNAPSHOT),
};
