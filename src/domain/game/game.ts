import { v4 as uuidv4 } from 'uuid';
import { GameErrors } from '../../utils/exceptions';
import { MoveEffects } from '../rules/rule-oracle';
import {
  GameOutcome,
  GameState,
  GameStatus,
  MoveRecord,
  MoveRequest,
  Player,
  Players,
  describeMove,
  opponentOf,
} from './game.model';
import { gameStateSchema } from './game.schemas';

export interface CreateGameParams {
  gameId?: string;
  position: string;
  firstPlayer?: Player;
}

/**
 * The single mutable aggregate of a game session.
 *
 * Only commands run by the session's CommandExecutor mutate it. State is
 * replaced (never edited in place) on every transition, so `snapshot()`
 * and `restore()` round-trip exactly.
 */
export class Game {
  private state: GameState;

  constructor(state: GameState) {
    this.state = state;
  }

  static create(params: CreateGameParams): Game {
    return new Game({
      gameId: params.gameId ?? uuidv4(),
      position: params.position,
      currentPlayer: params.firstPlayer ?? Players.WHITE,
      moves: [],
      isEnded: false,
      winner: null,
      endReason: null,
      createdAt: new Date().toISOString(),
    });
  }

  static fromSnapshot(serialized: string): Game {
    return new Game(Game.parseSnapshot(serialized));
  }

  get gameId(): string {
    return this.state.gameId;
  }

  get position(): string {
    return this.state.position;
  }

  get currentPlayer(): Player {
    return this.state.currentPlayer;
  }

  get isEnded(): boolean {
    return this.state.isEnded;
  }

  get winner(): Player | null {
    return this.state.winner;
  }

  get endReason(): string | null {
    return this.state.endReason;
  }

  getMoves(): MoveRecord[] {
    return [...this.state.moves];
  }

  /**
   * Apply an already-validated move: advance the position, record the move,
   * pass the turn, and end the game if the rules say so.
   */
  recordMove(request: MoveRequest, nextPosition: string, effects: MoveEffects = {}): MoveRecord {
    if (this.state.isEnded) throw GameErrors.ended();

    const record: MoveRecord = {
      from: request.from,
      to: request.to,
      promotion: effects.promotion ?? request.promotion ?? null,
      player: this.state.currentPlayer,
      notation: effects.notation ?? describeMove(request),
      capturedPiece: effects.capturedPiece ?? null,
      isCheck: effects.isCheck ?? false,
    };

    this.state = {
      ...this.state,
      position: nextPosition,
      currentPlayer: opponentOf(this.state.currentPlayer),
      moves: [...this.state.moves, record],
    };

    if (effects.outcome) {
      this.end(effects.outcome);
    }

    return record;
  }

  resign(player: Player): GameOutcome {
    if (this.state.isEnded) throw GameErrors.ended();

    const outcome: GameOutcome = { winner: opponentOf(player), reason: `${player} resigned` };
    this.end(outcome);
    return outcome;
  }

  getStatus(): GameStatus {
    const { moves } = this.state;
    return {
      gameId: this.state.gameId,
      position: this.state.position,
      currentPlayer: this.state.currentPlayer,
      moveCount: moves.length,
      isEnded: this.state.isEnded,
      winner: this.state.winner,
      endReason: this.state.endReason,
      lastMove: moves.length > 0 ? moves[moves.length - 1] : null,
    };
  }

  snapshot(): string {
    return JSON.stringify(this.state);
  }

  /**
   * Replace the whole state with a previously captured snapshot.
   * @throws ValidationException if the snapshot is not a valid game state
   */
  restore(serialized: string): void {
    this.state = Game.parseSnapshot(serialized);
  }

  private end(outcome: GameOutcome): void {
    this.state = {
      ...this.state,
      isEnded: true,
      winner: outcome.winner,
      endReason: outcome.reason,
    };
  }

  private static parseSnapshot(serialized: string): GameState {
    let raw: unknown;
    try {
      raw = JSON.parse(serialized);
    } catch {
      throw GameErrors.invalidSnapshot('not valid JSON');
    }

    const parsed = gameStateSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw GameErrors.invalidSnapshot(detail);
    }
    return parsed.data;
  }
}
