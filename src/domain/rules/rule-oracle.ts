import { GameOutcome, MoveRequest } from '../game/game.model';

/**
 * Side effects of a legal move as determined by the rules.
 */
export interface MoveEffects {
  capturedPiece?: string | null;
  isCheck?: boolean;
  promotion?: string | null;
  /** Preferred notation for the move (e.g., SAN) */
  notation?: string;
  /** Set when the move ends the game */
  outcome?: GameOutcome | null;
}

export interface RuleVerdict {
  legal: boolean;
  /** Why the move was rejected */
  reason?: string;
  effects: MoveEffects;
}

/**
 * A move the rules allow from the current position.
 */
export interface LegalMove {
  from: string;
  to: string;
  promotion?: string | null;
  notation?: string;
  isCapture?: boolean;
  isCastling?: boolean;
  isEnPassant?: boolean;
}

/**
 * Decides legality and consequences of moves. The engine never inspects a
 * position itself; anything that can answer these questions will do.
 */
export interface RuleOracle {
  validate(position: string, move: MoveRequest): RuleVerdict | Promise<RuleVerdict>;
  apply(position: string, move: MoveRequest): string | Promise<string>;
  /** Moves available to the side to move, optionally only those leaving `square` */
  legalMoves?(position: string, square?: string): LegalMove[] | Promise<LegalMove[]>;
}
