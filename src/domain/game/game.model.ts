/**
 * Game aggregate model
 */

export const Players = {
  WHITE: 'white',
  BLACK: 'black',
} as const;

export type Player = (typeof Players)[keyof typeof Players];

export const PROMOTION_PIECES = ['q', 'r', 'b', 'n'] as const;
export type PromotionPiece = (typeof PROMOTION_PIECES)[number];

/** Standard chess start position in FEN. Positions are opaque to the engine. */
export const STANDARD_START_POSITION = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

export interface MoveRequest {
  from: string;
  to: string;
  promotion?: PromotionPiece;
  /** Player claiming the move; checked against the side to move when present */
  player?: Player;
}

export interface MoveRecord {
  from: string;
  to: string;
  promotion: string | null;
  player: Player;
  notation: string;
  capturedPiece: string | null;
  isCheck: boolean;
}

export interface GameOutcome {
  /** null for a draw */
  winner: Player | null;
  reason: string;
}

export interface GameState {
  gameId: string;
  position: string;
  currentPlayer: Player;
  moves: MoveRecord[];
  isEnded: boolean;
  winner: Player | null;
  endReason: string | null;
  createdAt: string;
}

export interface GameStatus {
  gameId: string;
  position: string;
  currentPlayer: Player;
  moveCount: number;
  isEnded: boolean;
  winner: Player | null;
  endReason: string | null;
  lastMove: MoveRecord | null;
}

export function opponentOf(player: Player): Player {
  return player === Players.WHITE ? Players.BLACK : Players.WHITE;
}

export function describeMove(move: { from: string; to: string; promotion?: string | null }): string {
  return `${move.from}-${move.to}${move.promotion ? `=${move.promotion}` : ''}`;
}
