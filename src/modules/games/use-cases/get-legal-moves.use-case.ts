import { logger } from '../../../config/logger.config';
import { describeMove, squareSchema } from '../../../domain/game';
import { LegalMove } from '../../../domain/rules/rule-oracle';
import { toError } from '../../../utils/exceptions';
import { GameMessages, LegalMoveMetadata, LegalMovesResult } from '../games.model';
import { GameSessionContext } from '../game-session.utils';

/**
 * List the moves the rules allow for the side to move, optionally only those
 * leaving `square`. Read-only: nothing is executed, dispatched or saved.
 *
 * A finished game has no legal moves. An oracle that cannot list moves, or
 * fails while listing them, produces a failure result.
 */
export async function getLegalMoves(
  ctx: GameSessionContext,
  square?: string
): Promise<LegalMovesResult> {
  if (square !== undefined) {
    const parsed = squareSchema.safeParse(square);
    if (!parsed.success) {
      return legalMovesFailure(
        ctx,
        `Invalid square: ${square}`,
        parsed.error.issues.map((issue) => issue.message)
      );
    }
  }

  if (ctx.game.isEnded) {
    return {
      success: true,
      message: 'No legal moves: game has ended',
      moves: [],
      gameStatus: ctx.game.getStatus(),
    };
  }

  if (!ctx.oracle.legalMoves) {
    return legalMovesFailure(ctx, GameMessages.LEGAL_MOVES_UNSUPPORTED);
  }

  try {
    const found = await ctx.oracle.legalMoves(ctx.game.position, square);
    const moves = found.map((move) => toMetadata(ctx, move));

    logger.info('Retrieved legal moves', { gameId: ctx.game.gameId, square, count: moves.length });

    const scope = square === undefined ? '' : ` from ${square}`;
    return {
      success: true,
      message: `Found ${moves.length} legal move${moves.length === 1 ? '' : 's'}${scope}`,
      moves,
      gameStatus: ctx.game.getStatus(),
    };
  } catch (error) {
    const err = toError(error);
    logger.error('Error getting legal moves', { gameId: ctx.game.gameId, square, error: err.message });
    return legalMovesFailure(ctx, `Failed to get legal moves: ${err.message}`);
  }
}

function toMetadata(ctx: GameSessionContext, move: LegalMove): LegalMoveMetadata {
  return {
    from: move.from,
    to: move.to,
    promotion: move.promotion ?? null,
    notation: move.notation ?? describeMove(move),
    player: ctx.game.currentPlayer,
    isCapture: move.isCapture ?? false,
    isCastling: move.isCastling ?? false,
    isEnPassant: move.isEnPassant ?? false,
  };
}

function legalMovesFailure(
  ctx: GameSessionContext,
  message: string,
  errors?: string[]
): LegalMovesResult {
  return {
    success: false,
    message,
    moves: [],
    gameStatus: ctx.game.getStatus(),
    ...(errors && errors.length > 0 ? { errors } : {}),
  };
}
