import { logger } from '../../../config/logger.config';
import { DispatchReport } from '../../../shared/events/event-dispatcher';
import { EventTypes } from '../../../shared/events/game-event';
import { MakeMoveCommand, ResignCommand } from '../commands';
import { GameActionResult, GameMessages } from '../games.model';
import {
  GameSessionContext,
  failureResult,
  lastOf,
  persistGame,
  publishEvent,
  publishMoveConsequences,
  publishResignation,
  successResult,
  unexpectedFailure,
} from '../game-session.utils';

/**
 * Redo the most recently undone command.
 * A failed redo stays available for another attempt.
 *
 * A redone move sends `move:redone` and then the same check/game-over
 * events the move sent when it was first played.
 */
export async function redoMove(ctx: GameSessionContext): Promise<GameActionResult> {
  try {
    const result = await ctx.executor.redo();

    if (result === null) {
      return failureResult(ctx, GameMessages.NO_MOVE_TO_REDO);
    }
    if (!result.success) {
      logger.warn('Redo failed', { gameId: ctx.game.gameId, reason: result.message });
      return failureResult(ctx, result.message, result.errors);
    }

    const redone = lastOf(ctx.executor.getCommandHistory());
    const gameStatus = ctx.game.getStatus();

    // A redone resignation ends the game again, as it did the first time
    if (redone instanceof ResignCommand) {
      const reports = await publishResignation(ctx, redone.id, redone.player, gameStatus);
      const warnings = await persistGame(ctx);
      return successResult(ctx, result.message, { warnings, dispatch: reports });
    }

    const move = redone instanceof MakeMoveCommand ? redone.getExecutedMove() ?? undefined : undefined;
    const reports: DispatchReport[] = [
      await publishEvent(ctx, EventTypes.MOVE_REDONE, {
        commandId: redone?.id ?? null,
        description: redone?.describe() ?? null,
        redoneMove: move ?? null,
        gameStatus,
      }),
    ];
    if (move) {
      reports.push(...(await publishMoveConsequences(ctx, move, gameStatus)));
    }

    const warnings = await persistGame(ctx);

    return successResult(ctx, result.message, { move, warnings, dispatch: reports });
  } catch (error) {
    return unexpectedFailure(ctx, 'redo move', error);
  }
}
