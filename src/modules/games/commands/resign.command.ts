import { Game, GameOutcome, GameStatus, Player } from '../../../domain/game';
import {
  CommandResult,
  SnapshotCommand,
  commandFailure,
  commandSuccess,
} from '../../../shared/commands';
import { GameMessages } from '../games.model';

export interface ResignData {
  outcome: GameOutcome;
  gameStatus: GameStatus;
}

/**
 * Ends the game in the opponent's favour. Undo puts the game back in play.
 */
export class ResignCommand extends SnapshotCommand<Game, ResignData> {
  constructor(
    game: Game,
    readonly player: Player
  ) {
    super(game);
  }

  async execute(): Promise<CommandResult<ResignData>> {
    if (this.aggregate.isEnded) {
      return commandFailure(GameMessages.GAME_ENDED);
    }

    this.captureSnapshot();
    const outcome = this.aggregate.resign(this.player);

    return commandSuccess(`${this.player} resigned. ${outcome.winner} wins!`, {
      outcome,
      gameStatus: this.aggregate.getStatus(),
    });
  }

  describe(): string {
    return `${this.player} resigns`;
  }

  protected undoResult(): CommandResult<ResignData> {
    return commandSuccess('Resignation undone, game continues');
  }
}
