import { logger } from '../../../config/logger.config';
import { EventTypes } from '../../../shared/events/game-event';
import { MakeMoveCommand } from '../commands';
import { GameActionResult, GameMessages } from '../games.model';
import {
  GameSessionContext,
  failureResult,
  lastOf,
  persistGame,
  publishEvent,
  successResult,
  unexpectedFailure,
} from '../game-session.utils';

/**
 * Undo the most recent command (a move or a resignation).
 * Nothing to undo is a normal failure result with a fixed message.
 */
export async function undoMove(ctx: GameSessionContext): Promise<GameActionResult> {
  try {
    const result = await ctx.executor.undo();

    if (result === null) {
      return failureResult(ctx, GameMessages.NO_MOVE_TO_UNDO);
    }
    if (!result.success) {
      logger.warn('Undo failed', { gameId: ctx.game.gameId, reason: result.message });
      return failureResult(ctx, result.message);
    }

    const undone = lastOf(ctx.executor.getUndoStack());
    const move = undone instanceof MakeMoveCommand ? undone.getExecutedMove() ?? undefined : undefined;

    const report = await publishEvent(ctx, EventTypes.MOVE_UNDONE, {
      commandId: undone?.id ?? null,
      description: undone?.describe() ?? null,
      undoneMove: move ?? null,
      gameStatus: ctx.game.getStatus(),
    });

    const warnings = await persistGame(ctx);

    return successResult(ctx, result.message, { move, warnings, dispatch: [report] });
  } catch (error) {
    return unexpectedFailure(ctx, 'undo move', error);
  }
}
