import { v4 as uuidv4 } from 'uuid';

/**
 * Immutable record of a completed state transition.
 */
export interface GameEvent {
  /** Unique event id */
  readonly id: string;
  /** Event type identifier (e.g., 'move:made') */
  readonly type: string;
  /** Game the transition belongs to */
  readonly gameId: string;
  /** Event payload data */
  readonly payload: Readonly<Record<string, unknown>>;
  /** When the event was created; for display ordering only */
  readonly timestamp: Date;
}

/**
 * Build a frozen event. Payload is shallow-copied and frozen as well.
 */
export function createGameEvent(
  type: string,
  gameId: string,
  payload: Record<string, unknown> = {}
): GameEvent {
  return Object.freeze({
    id: uuidv4(),
    type,
    gameId,
    payload: Object.freeze({ ...payload }),
    timestamp: new Date(),
  });
}

/**
 * Event type constants for type-safe event publishing.
 */
export const EventTypes = {
  // Move events
  MOVE_MADE: 'move:made',
  MOVE_UNDONE: 'move:undone',
  MOVE_REDONE: 'move:redone',

  // Game lifecycle events
  GAME_STARTED: 'game:started',
  GAME_LOADED: 'game:loaded',
  GAME_ENDED: 'game:ended',
  GAME_RESIGNED: 'game:resigned',

  // Position events
  CHECK_DETECTED: 'check:detected',
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];
