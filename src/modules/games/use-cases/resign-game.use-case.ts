import { logger } from '../../../config/logger.config';
import { Player } from '../../../domain/game';
import { ResignCommand } from '../commands';
import { GameActionResult, GameMessages } from '../games.model';
import {
  GameSessionContext,
  failureResult,
  persistGame,
  publishResignation,
  successResult,
  unexpectedFailure,
} from '../game-session.utils';

/**
 * Resign on behalf of `player` (the side to move when omitted).
 */
export async function resignGame(
  ctx: GameSessionContext,
  player?: Player
): Promise<GameActionResult> {
  try {
    if (ctx.game.isEnded) {
      return failureResult(ctx, GameMessages.GAME_ENDED);
    }

    const command = new ResignCommand(ctx.game, player ?? ctx.game.currentPlayer);
    const result = await ctx.executor.execute(command);

    if (!result.success || !result.data) {
      return failureResult(ctx, result.message, result.errors);
    }

    const reports = await publishResignation(ctx, command.id, command.player, result.data.gameStatus);

    const warnings = await persistGame(ctx);

    logger.info('Game resigned', { gameId: ctx.game.gameId, player: command.player });

    return successResult(ctx, result.message, { warnings, dispatch: reports });
  } catch (error) {
    return unexpectedFailure(ctx, 'resign game', error);
  }
}
