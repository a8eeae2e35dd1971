import { Game, Players } from '../../../domain/game';
import { MakeMoveCommand, ResignCommand } from '../../../modules/games/commands';
import { CommandExecutor, CommandStatuses } from '../../../shared/commands';
import { ScriptedRuleOracle } from '../../fixtures/scripted-oracle';

jest.mock('../../../config/logger.config', () => ({
  logger: { warn: jest.fn(), info: jest.fn(), debug: jest.fn(), error: jest.fn() },
}));

describe('MakeMoveCommand', () => {
  let game: Game;
  let oracle: ScriptedRuleOracle;
  let executor: CommandExecutor;

  beforeEach(() => {
    game = Game.create({ gameId: 'game-1', position: 'start' });
    oracle = new ScriptedRuleOracle();
    executor = new CommandExecutor();
  });

  it('plays a legal move', async () => {
    const command = new MakeMoveCommand(game, { from: 'e2', to: 'e4' }, oracle);

    const result = await executor.execute(command);

    expect(result.success).toBe(true);
    expect(result.message).toBe('Move executed: e2-e4');
    expect(result.data?.move).toEqual({
      from: 'e2',
      to: 'e4',
      promotion: null,
      player: Players.WHITE,
      notation: 'e2-e4',
      capturedPiece: null,
      isCheck: false,
      moveNumber: 1,
    });
    expect(result.data?.gameStatus.position).toBe('start e2-e4');
    expect(command.describe()).toBe('Move: e2-e4');
    expect(command.hasSnapshot()).toBe(true);
  });

  it('uses the notation and effects reported by the rules', async () => {
    oracle.set('g1-f3', { effects: { notation: 'Nf3', isCheck: true } });
    const command = new MakeMoveCommand(game, { from: 'g1', to: 'f3' }, oracle);

    const result = await executor.execute(command);

    expect(result.message).toBe('Move executed: Nf3');
    expect(result.data?.effects).toEqual({ notation: 'Nf3', isCheck: true });
    expect(command.getExecutedMove()?.isCheck).toBe(true);
    expect(command.describe()).toBe('Move: Nf3');
  });

  it('fails an illegal move without touching the game', async () => {
    oracle.set('e2-e5', { legal: false, reason: 'pawns move at most two squares' });
    const before = game.snapshot();
    const command = new MakeMoveCommand(game, { from: 'e2', to: 'e5' }, oracle);

    const result = await executor.execute(command);

    expect(result).toEqual({
      success: false,
      message: 'Illegal move e2-e5: pawns move at most two squares',
      errors: ['pawns move at most two squares'],
    });
    expect(game.snapshot()).toBe(before);
    expect(command.hasSnapshot()).toBe(false);
    expect(command.status).toBe(CommandStatuses.FAILED);
  });

  it('gives a default reason when the rules give none', async () => {
    oracle.set('a2-a5', { legal: false });

    const result = await executor.execute(new MakeMoveCommand(game, { from: 'a2', to: 'a5' }, oracle));

    expect(result.message).toBe('Illegal move a2-a5: rejected by the rules');
  });

  it('leaves the game unchanged when the rules fail while applying', async () => {
    jest.spyOn(oracle, 'apply').mockImplementation(() => {
      throw new Error('engine offline');
    });
    const before = game.snapshot();

    const result = await executor.execute(new MakeMoveCommand(game, { from: 'e2', to: 'e4' }, oracle));

    expect(result.message).toBe('Command execution failed: engine offline');
    expect(game.snapshot()).toBe(before);
  });

  it('refuses to move in a finished game', async () => {
    game.resign(Players.WHITE);

    const result = await new MakeMoveCommand(game, { from: 'e7', to: 'e5' }, oracle).execute();

    expect(result).toEqual({ success: false, message: 'Cannot make move: game has ended' });
  });

  it('undo restores the position before the move', async () => {
    const before = game.snapshot();
    await executor.execute(new MakeMoveCommand(game, { from: 'e2', to: 'e4' }, oracle));

    const result = await executor.undo();

    expect(result?.message).toBe('Move undone: e2-e4');
    expect(game.snapshot()).toBe(before);
    expect(game.currentPlayer).toBe(Players.WHITE);
  });

  it('redo re-validates against the restored position', async () => {
    await executor.execute(new MakeMoveCommand(game, { from: 'e2', to: 'e4' }, oracle));
    await executor.undo();

    const result = await executor.redo();

    expect(result?.success).toBe(true);
    expect(game.position).toBe('start e2-e4');
    expect(oracle.validated).toEqual(['e2-e4', 'e2-e4']);
  });

  it('cannot undo a command that never ran', async () => {
    const result = await new MakeMoveCommand(game, { from: 'e2', to: 'e4' }, oracle).undo();

    expect(result).toEqual({ success: false, message: 'Nothing to undo: no snapshot captured' });
  });
});

describe('ResignCommand', () => {
  it('ends the game and puts it back in play on undo', async () => {
    const game = Game.create({ gameId: 'game-1', position: 'start' });
    const executor = new CommandExecutor();
    const command = new ResignCommand(game, Players.WHITE);

    const result = await executor.execute(command);

    expect(result.message).toBe('white resigned. black wins!');
    expect(result.data?.outcome).toEqual({ winner: Players.BLACK, reason: 'white resigned' });
    expect(command.describe()).toBe('white resigns');
    expect(game.isEnded).toBe(true);

    const undone = await executor.undo();

    expect(undone?.message).toBe('Resignation undone, game continues');
    expect(game.isEnded).toBe(false);
    expect(game.winner).toBeNull();
  });
});
