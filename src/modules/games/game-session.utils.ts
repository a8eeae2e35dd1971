import { logger } from '../../config/logger.config';
import { Game, GameStatus, Player } from '../../domain/game';
import { RuleOracle } from '../../domain/rules/rule-oracle';
import { Command, CommandExecutor } from '../../shared/commands';
import { DispatchReport, EventDispatcher } from '../../shared/events/event-dispatcher';
import { EventTypes, createGameEvent } from '../../shared/events/game-event';
import { toError } from '../../utils/exceptions';
import { GameStateStore } from './games.repository';
import { GameActionResult, GameMessages, MoveMetadata } from './games.model';

/**
 * Everything a game use case needs. One context per session; the executor is
 * the only path through which `game` is mutated.
 */
export interface GameSessionContext {
  game: Game;
  executor: CommandExecutor;
  dispatcher: EventDispatcher;
  oracle: RuleOracle;
  store: GameStateStore;
}

/**
 * Save the aggregate. Failures are logged and returned as warnings; they
 * never undo a transition that already happened in memory.
 */
export async function persistGame(ctx: GameSessionContext): Promise<string[]> {
  try {
    await ctx.store.save(ctx.game.gameId, ctx.game.snapshot());
    return [];
  } catch (error) {
    logger.error('Failed to persist game state', {
      gameId: ctx.game.gameId,
      error: toError(error).message,
    });
    return [GameMessages.PERSISTENCE_FAILED];
  }
}

export async function publishEvent(
  ctx: GameSessionContext,
  type: string,
  payload: Record<string, unknown>
): Promise<DispatchReport> {
  return ctx.dispatcher.dispatch(createGameEvent(type, ctx.game.gameId, payload));
}

/**
 * Events that follow a move onto the board, whether played or redone:
 * `check:detected` while the game goes on, `game:ended` once it is over.
 */
export async function publishMoveConsequences(
  ctx: GameSessionContext,
  move: MoveMetadata,
  gameStatus: GameStatus
): Promise<DispatchReport[]> {
  const reports: DispatchReport[] = [];

  if (move.isCheck && !gameStatus.isEnded) {
    reports.push(
      await publishEvent(ctx, EventTypes.CHECK_DETECTED, {
        playerInCheck: gameStatus.currentPlayer,
        move,
      })
    );
  }

  if (gameStatus.isEnded) {
    reports.push(
      await publishEvent(ctx, EventTypes.GAME_ENDED, {
        winner: gameStatus.winner,
        reason: gameStatus.endReason,
        gameStatus,
      })
    );
  }

  return reports;
}

export async function publishResignation(
  ctx: GameSessionContext,
  commandId: string,
  player: Player,
  gameStatus: GameStatus
): Promise<DispatchReport[]> {
  return [
    await publishEvent(ctx, EventTypes.GAME_RESIGNED, { commandId, player }),
    await publishEvent(ctx, EventTypes.GAME_ENDED, {
      winner: gameStatus.winner,
      reason: gameStatus.endReason,
      gameStatus,
    }),
  ];
}

export function failureResult(
  ctx: GameSessionContext,
  message: string,
  errors?: string[]
): GameActionResult {
  return {
    success: false,
    message,
    canUndo: ctx.executor.canUndo(),
    canRedo: ctx.executor.canRedo(),
    gameStatus: ctx.game.getStatus(),
    ...(errors && errors.length > 0 ? { errors } : {}),
    warnings: [],
  };
}

export function successResult(
  ctx: GameSessionContext,
  message: string,
  extra: Pick<GameActionResult, 'move' | 'effects' | 'warnings' | 'dispatch'>
): GameActionResult {
  return {
    success: true,
    message,
    canUndo: ctx.executor.canUndo(),
    canRedo: ctx.executor.canRedo(),
    gameStatus: ctx.game.getStatus(),
    ...extra,
  };
}

/**
 * Last use-case safety net: nothing thrown below may reach the caller.
 */
export function unexpectedFailure(
  ctx: GameSessionContext,
  operation: string,
  error: unknown
): GameActionResult {
  const err = toError(error);
  logger.error(`Unexpected error in ${operation}`, {
    gameId: ctx.game.gameId,
    error: err.message,
    stack: err.stack,
  });
  return failureResult(ctx, `Unexpected error: ${err.message}`);
}

export function lastOf(commands: Command[]): Command | undefined {
  return commands.length > 0 ? commands[commands.length - 1] : undefined;
}
