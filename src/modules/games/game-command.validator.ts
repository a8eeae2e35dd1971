import { Game, moveRequestSchema } from '../../domain/game';
import { Command, CommandValidation, CommandValidator, toValidation } from '../../shared/commands';
import { GameErrors } from '../../utils/exceptions';
import { MakeMoveCommand, ResignCommand } from './commands';
import { GameMessages } from './games.model';

/**
 * Business-rule checks that run before a game command touches the aggregate:
 * request shape, game not over, right side to move. Move legality itself is
 * the rule oracle's job and is checked inside the command.
 */
export class GameCommandValidator implements CommandValidator {
  constructor(private readonly game: Game) {}

  validate(command: Command): CommandValidation {
    if (command instanceof MakeMoveCommand) {
      return toValidation(this.validateMove(command));
    }
    if (command instanceof ResignCommand && this.game.isEnded) {
      return toValidation([GameMessages.GAME_ENDED]);
    }
    return toValidation([]);
  }

  private validateMove(command: MakeMoveCommand): string[] {
    const parsed = moveRequestSchema.safeParse(command.request);
    if (!parsed.success) {
      return parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    }

    if (this.game.isEnded) {
      return [GameMessages.GAME_ENDED];
    }

    const { player } = parsed.data;
    if (player && player !== this.game.currentPlayer) {
      return [GameErrors.notYourTurn(player).message];
    }

    return [];
  }
}
