/**
 * Game session model: what the use cases hand back to callers.
 */

import { GameStatus, MoveRecord, Player } from '../../domain/game';
import { MoveEffects } from '../../domain/rules/rule-oracle';
import { DispatchReport } from '../../shared/events/event-dispatcher';

export interface MoveMetadata extends MoveRecord {
  /** 1-based ply number within the game */
  moveNumber: number;
}

/**
 * Uniform result of every user-visible game operation.
 */
export interface GameActionResult {
  success: boolean;
  message: string;
  canUndo: boolean;
  canRedo: boolean;
  gameStatus: GameStatus;
  move?: MoveMetadata;
  effects?: MoveEffects;
  /** Validation or rule reasons when the action was rejected */
  errors?: string[];
  /** Non-fatal problems, e.g. the state could not be saved */
  warnings: string[];
  /** One report per event dispatched for this action */
  dispatch?: DispatchReport[];
}

export interface LegalMoveMetadata {
  from: string;
  to: string;
  promotion: string | null;
  /** Rules notation when the oracle gives one, `from-to` otherwise */
  notation: string;
  player: Player;
  isCapture: boolean;
  isCastling: boolean;
  isEnPassant: boolean;
}

export interface LegalMovesResult {
  success: boolean;
  message: string;
  moves: LegalMoveMetadata[];
  gameStatus: GameStatus;
  errors?: string[];
}

export interface GameStateView {
  status: GameStatus;
  moves: MoveRecord[];
  history: string[];
  canUndo: boolean;
  canRedo: boolean;
}

export const GameMessages = {
  GAME_ENDED: 'Cannot make move: game has ended',
  NO_MOVE_TO_UNDO: 'No move to undo',
  NO_MOVE_TO_REDO: 'No move to redo',
  PERSISTENCE_FAILED: 'Game state could not be saved',
  LEGAL_MOVES_UNSUPPORTED: 'Legal move listing is not supported by the rules',
} as const;
