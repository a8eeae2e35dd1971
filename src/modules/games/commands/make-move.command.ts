import { Game, GameStatus, MoveRequest, describeMove } from '../../../domain/game';
import { MoveEffects, RuleOracle } from '../../../domain/rules/rule-oracle';
import {
  CommandResult,
  SnapshotCommand,
  commandFailure,
  commandSuccess,
} from '../../../shared/commands';
import { GameMessages, MoveMetadata } from '../games.model';

export interface MakeMoveData {
  move: MoveMetadata;
  effects: MoveEffects;
  gameStatus: GameStatus;
}

/**
 * Plays one move on the game aggregate.
 *
 * The rule oracle is consulted before anything is touched; an illegal move
 * fails with the aggregate unchanged. Redo runs `execute()` again, which
 * re-validates against the restored position.
 */
export class MakeMoveCommand extends SnapshotCommand<Game, MakeMoveData> {
  private executedMove: MoveMetadata | null = null;
  private effects: MoveEffects = {};

  constructor(
    game: Game,
    readonly request: MoveRequest,
    private readonly oracle: RuleOracle
  ) {
    super(game);
  }

  async execute(): Promise<CommandResult<MakeMoveData>> {
    const game = this.aggregate;
    if (game.isEnded) {
      return commandFailure(GameMessages.GAME_ENDED);
    }

    const verdict = await this.oracle.validate(game.position, this.request);
    if (!verdict.legal) {
      const reason = verdict.reason ?? 'rejected by the rules';
      return commandFailure(`Illegal move ${describeMove(this.request)}: ${reason}`, {
        errors: [reason],
      });
    }

    this.captureSnapshot();
    const nextPosition = await this.oracle.apply(game.position, this.request);
    const record = game.recordMove(this.request, nextPosition, verdict.effects);

    this.effects = verdict.effects;
    this.executedMove = { ...record, moveNumber: game.getStatus().moveCount };

    return commandSuccess(`Move executed: ${record.notation}`, {
      move: this.executedMove,
      effects: this.effects,
      gameStatus: game.getStatus(),
    });
  }

  describe(): string {
    return this.executedMove
      ? `Move: ${this.executedMove.notation}`
      : `Move: ${describeMove(this.request)}`;
  }

  getExecutedMove(): MoveMetadata | null {
    return this.executedMove;
  }

  protected undoResult(): CommandResult<MakeMoveData> {
    if (!this.executedMove) {
      return commandSuccess(`Move undone: ${describeMove(this.request)}`);
    }
    return commandSuccess(`Move undone: ${this.executedMove.notation}`, {
      move: this.executedMove,
      effects: this.effects,
      gameStatus: this.aggregate.getStatus(),
    });
  }
}
