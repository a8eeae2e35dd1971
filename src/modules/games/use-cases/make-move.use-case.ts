import { logger } from '../../../config/logger.config';
import { MoveRequest } from '../../../domain/game';
import { DispatchReport } from '../../../shared/events/event-dispatcher';
import { EventTypes } from '../../../shared/events/game-event';
import { MakeMoveCommand } from '../commands';
import { GameActionResult, GameMessages } from '../games.model';
import {
  GameSessionContext,
  failureResult,
  persistGame,
  publishEvent,
  publishMoveConsequences,
  successResult,
  unexpectedFailure,
} from '../game-session.utils';

/**
 * Make a move.
 *
 * ORDERING CONTRACT:
 * - the command runs (and clears the redo stack) before any event is dispatched
 * - events are dispatched before the state is saved, so a saved state always
 *   matches the last dispatched event
 * - a failed save is reported as a warning; the move stands
 *
 * A rejected move dispatches nothing and saves nothing.
 */
export async function makeMove(
  ctx: GameSessionContext,
  request: MoveRequest
): Promise<GameActionResult> {
  try {
    if (ctx.game.isEnded) {
      return failureResult(ctx, GameMessages.GAME_ENDED);
    }

    const command = new MakeMoveCommand(ctx.game, request, ctx.oracle);
    const result = await ctx.executor.execute(command);

    if (!result.success || !result.data) {
      logger.warn('Move rejected', {
        gameId: ctx.game.gameId,
        from: request.from,
        to: request.to,
        reason: result.message,
      });
      return failureResult(ctx, result.message, result.errors);
    }

    const { move, effects, gameStatus } = result.data;
    const reports: DispatchReport[] = [];

    reports.push(
      await publishEvent(ctx, EventTypes.MOVE_MADE, {
        commandId: command.id,
        move,
        player: move.player,
        capturedPiece: move.capturedPiece,
        isCheck: move.isCheck,
        promotion: move.promotion,
        gameStatus,
      })
    );

    reports.push(...(await publishMoveConsequences(ctx, move, gameStatus)));

    const warnings = await persistGame(ctx);

    logger.info('Move made', {
      gameId: ctx.game.gameId,
      notation: move.notation,
      moveNumber: move.moveNumber,
    });

    return successResult(ctx, result.message, { move, effects, warnings, dispatch: reports });
  } catch (error) {
    return unexpectedFailure(ctx, 'make move', error);
  }
}
