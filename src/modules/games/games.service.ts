import { logger } from '../../config/logger.config';
import { Game, MoveRequest, Player } from '../../domain/game';
import { EventTypes } from '../../shared/events/game-event';
import { SerialQueue } from '../../shared/utils/serial-queue';
import { GameErrors, toError } from '../../utils/exceptions';
import {
  GameSessionContext,
  failureResult,
  persistGame,
  publishEvent,
  successResult,
  unexpectedFailure,
} from './game-session.utils';
import { GameActionResult, GameStateView, LegalMovesResult } from './games.model';
import { getLegalMoves, makeMove, redoMove, resignGame, undoMove } from './use-cases';

export interface StartGameOptions {
  gameId?: string;
  position?: string;
  firstPlayer?: Player;
}

/**
 * Entry point for one game session. Every method resolves to a result
 * object; none of them throw.
 *
 * Operations run one at a time in call order, including their events and
 * save. An event handler must not await another operation on the same
 * service: it would wait on itself.
 */
export class GamesService {
  private readonly queue = new SerialQueue();

  constructor(
    private readonly ctx: GameSessionContext,
    private readonly defaultPosition: string
  ) {}

  get gameId(): string {
    return this.ctx.game.gameId;
  }

  makeMove(request: MoveRequest): Promise<GameActionResult> {
    return this.queue.run(() => makeMove(this.ctx, request));
  }

  undoMove(): Promise<GameActionResult> {
    return this.queue.run(() => undoMove(this.ctx));
  }

  redoMove(): Promise<GameActionResult> {
    return this.queue.run(() => redoMove(this.ctx));
  }

  resign(player?: Player): Promise<GameActionResult> {
    return this.queue.run(() => resignGame(this.ctx, player));
  }

  /**
   * Legal moves for the side to move, or only those leaving `square`.
   */
  getLegalMoves(square?: string): Promise<LegalMovesResult> {
    return this.queue.run(() => getLegalMoves(this.ctx, square));
  }

  getGameState(): GameStateView {
    return {
      status: this.ctx.game.getStatus(),
      moves: this.ctx.game.getMoves(),
      history: this.ctx.executor.getCommandHistory().map((command) => command.describe()),
      canUndo: this.ctx.executor.canUndo(),
      canRedo: this.ctx.executor.canRedo(),
    };
  }

  /**
   * Reset the session aggregate to a fresh game and drop undo/redo history.
   */
  startNewGame(options: StartGameOptions = {}): Promise<GameActionResult> {
    return this.queue.run(() => this.resetGame(options));
  }

  /**
   * Replace the session aggregate with a stored game. History is cleared:
   * undo never reaches back past a load.
   */
  loadGame(gameId: string): Promise<GameActionResult> {
    return this.queue.run(() => this.restoreGame(gameId));
  }

  private async resetGame(options: StartGameOptions): Promise<GameActionResult> {
    try {
      const fresh = Game.create({
        gameId: options.gameId,
        position: options.position ?? this.defaultPosition,
        firstPlayer: options.firstPlayer,
      });
      await this.replaceGame(fresh.snapshot());

      const report = await publishEvent(this.ctx, EventTypes.GAME_STARTED, {
        position: this.ctx.game.position,
        currentPlayer: this.ctx.game.currentPlayer,
      });
      const warnings = await persistGame(this.ctx);

      logger.info('Game started', { gameId: this.ctx.game.gameId });
      return successResult(this.ctx, 'New game started', { warnings, dispatch: [report] });
    } catch (error) {
      return unexpectedFailure(this.ctx, 'start new game', error);
    }
  }

  private async restoreGame(gameId: string): Promise<GameActionResult> {
    let serialized: string | null;
    try {
      serialized = await this.ctx.store.load(gameId);
    } catch (error) {
      logger.error('Failed to load game state', { gameId, error: toError(error).message });
      return failureResult(this.ctx, `Failed to load game ${gameId}`);
    }

    if (serialized === null) {
      return failureResult(this.ctx, GameErrors.notFound(gameId).message);
    }

    try {
      await this.replaceGame(serialized);
    } catch (error) {
      return failureResult(this.ctx, toError(error).message);
    }

    try {
      const report = await publishEvent(this.ctx, EventTypes.GAME_LOADED, {
        gameStatus: this.ctx.game.getStatus(),
      });

      logger.info('Game loaded', { gameId });
      return successResult(this.ctx, `Game ${gameId} loaded`, { warnings: [], dispatch: [report] });
    } catch (error) {
      return unexpectedFailure(this.ctx, 'load game', error);
    }
  }

  /**
   * Swap the aggregate and drop its history inside the executor's queue, so
   * a command still running against the old game cannot land in the new one.
   */
  private replaceGame(serialized: string): Promise<void> {
    return this.ctx.executor.run(() => {
      this.ctx.game.restore(serialized);
      this.ctx.executor.clearHistory();
    });
  }
}
