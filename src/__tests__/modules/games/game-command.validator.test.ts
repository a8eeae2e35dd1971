import { Game, Players } from '../../../domain/game';
import { MakeMoveCommand, ResignCommand } from '../../../modules/games/commands';
import { GameCommandValidator } from '../../../modules/games/game-command.validator';
import { Counter, CounterCommand } from '../../fixtures/counter-command';
import { ScriptedRuleOracle } from '../../fixtures/scripted-oracle';

describe('GameCommandValidator', () => {
  let game: Game;
  let oracle: ScriptedRuleOracle;
  let validator: GameCommandValidator;

  beforeEach(() => {
    game = Game.create({ gameId: 'game-1', position: 'start' });
    oracle = new ScriptedRuleOracle();
    validator = new GameCommandValidator(game);
  });

  it('accepts a well-formed move by the side to move', () => {
    const command = new MakeMoveCommand(game, { from: 'e2', to: 'e4', player: Players.WHITE }, oracle);

    expect(validator.validate(command)).toEqual({ valid: true, errors: [] });
  });

  it('rejects squares outside the board', () => {
    const command = new MakeMoveCommand(game, { from: 'z9', to: 'e4' }, oracle);

    expect(validator.validate(command)).toEqual({
      valid: false,
      errors: ['from: Square must be a file a-h followed by a rank 1-8'],
    });
  });

  it('rejects a move that does not leave its square', () => {
    const command = new MakeMoveCommand(game, { from: 'e2', to: 'e2' }, oracle);

    expect(validator.validate(command).errors).toEqual([
      'to: Source and destination squares must differ',
    ]);
  });

  it('rejects a move by the player not on turn', () => {
    const command = new MakeMoveCommand(game, { from: 'e7', to: 'e5', player: Players.BLACK }, oracle);

    expect(validator.validate(command).errors).toEqual(["Not black's turn"]);
  });

  it('rejects moves and resignations once the game has ended', () => {
    game.resign(Players.WHITE);

    expect(validator.validate(new MakeMoveCommand(game, { from: 'e2', to: 'e4' }, oracle)).errors).toEqual([
      'Cannot make move: game has ended',
    ]);
    expect(validator.validate(new ResignCommand(game, Players.BLACK)).errors).toEqual([
      'Cannot make move: game has ended',
    ]);
  });

  it('accepts a resignation in a running game', () => {
    expect(validator.validate(new ResignCommand(game, Players.WHITE)).valid).toBe(true);
  });

  it('accepts commands it does not know', () => {
    const counter: Counter = { value: 0 };

    expect(validator.validate(new CounterCommand(counter, 1)).valid).toBe(true);
  });
});
