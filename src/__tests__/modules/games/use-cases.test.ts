import { MoveRequest, Players, describeMove } from '../../../domain/game';
import { RuleOracle } from '../../../domain/rules/rule-oracle';
import { GameSessionContext } from '../../../modules/games/game-session.utils';
import { InMemoryGameStateRepository } from '../../../modules/games/games.repository';
import { getLegalMoves, makeMove, redoMove, resignGame, undoMove } from '../../../modules/games/use-cases';
import { EventTypes } from '../../../shared/events/game-event';
import { createTestContext, TEST_GAME_ID } from '../../fixtures/game-session';
import { ScriptedRuleOracle } from '../../fixtures/scripted-oracle';

jest.mock('../../../config/logger.config', () => ({
  logger: { warn: jest.fn(), info: jest.fn(), debug: jest.fn(), error: jest.fn() },
}));

describe('game use cases', () => {
  let oracle: ScriptedRuleOracle;
  let store: InMemoryGameStateRepository;
  let ctx: GameSessionContext;

  const eventTypes = (): string[] => ctx.dispatcher.getEventHistory().map((event) => event.type);

  beforeEach(() => {
    oracle = new ScriptedRuleOracle();
    store = new InMemoryGameStateRepository();
    ctx = createTestContext({ oracle, store });
  });

  describe('makeMove', () => {
    it('executes the move, dispatches move:made and saves the game', async () => {
      const result = await makeMove(ctx, { from: 'e2', to: 'e4' });

      expect(result.success).toBe(true);
      expect(result.message).toBe('Move executed: e2-e4');
      expect(result.canUndo).toBe(true);
      expect(result.canRedo).toBe(false);
      expect(result.move?.moveNumber).toBe(1);
      expect(result.warnings).toEqual([]);
      expect(result.dispatch).toHaveLength(1);
      expect(eventTypes()).toEqual([EventTypes.MOVE_MADE]);
      await expect(store.load(TEST_GAME_ID)).resolves.toBe(ctx.game.snapshot());
    });

    it('dispatches check:detected for a checking move', async () => {
      oracle.set('d1-h5', { effects: { isCheck: true, notation: 'Qh5+' } });

      await makeMove(ctx, { from: 'd1', to: 'h5' });

      expect(eventTypes()).toEqual([EventTypes.MOVE_MADE, EventTypes.CHECK_DETECTED]);
      expect(ctx.dispatcher.getEventHistory({ type: EventTypes.CHECK_DETECTED })[0].payload.playerInCheck).toBe(
        Players.BLACK
      );
    });

    it('dispatches game:ended instead of check when the move ends the game', async () => {
      oracle.set('d8-h4', {
        effects: { isCheck: true, outcome: { winner: Players.WHITE, reason: 'checkmate' } },
      });

      const result = await makeMove(ctx, { from: 'd8', to: 'h4' });

      expect(eventTypes()).toEqual([EventTypes.MOVE_MADE, EventTypes.GAME_ENDED]);
      expect(result.gameStatus.isEnded).toBe(true);
      expect(result.gameStatus.winner).toBe(Players.WHITE);
    });

    it('rejects an illegal move without dispatching or saving', async () => {
      oracle.set('e2-e5', { legal: false, reason: 'blocked' });

      const result = await makeMove(ctx, { from: 'e2', to: 'e5' });

      expect(result.success).toBe(false);
      expect(result.message).toBe('Illegal move e2-e5: blocked');
      expect(result.errors).toEqual(['blocked']);
      expect(eventTypes()).toEqual([]);
      expect(store.has(TEST_GAME_ID)).toBe(false);
    });

    it('returns validation errors from the command validator', async () => {
      const result = await makeMove(ctx, { from: 'e7', to: 'e5', player: Players.BLACK });

      expect(result.success).toBe(false);
      expect(result.message).toBe("Command validation failed: Not black's turn");
      expect(result.errors).toEqual(["Not black's turn"]);
      expect(oracle.validated).toEqual([]);
    });

    it('rejects a move in a finished game', async () => {
      await resignGame(ctx, Players.WHITE);

      const result = await makeMove(ctx, { from: 'e7', to: 'e5' });

      expect(result.success).toBe(false);
      expect(result.message).toBe('Cannot make move: game has ended');
    });

    it('keeps the move and warns when the game cannot be saved', async () => {
      jest.spyOn(store, 'save').mockRejectedValue(new Error('disk full'));

      const result = await makeMove(ctx, { from: 'e2', to: 'e4' });

      expect(result.success).toBe(true);
      expect(result.warnings).toEqual(['Game state could not be saved']);
      expect(ctx.game.getStatus().moveCount).toBe(1);
    });

    it('keeps the move when an event handler fails', async () => {
      ctx.dispatcher.subscribe(EventTypes.MOVE_MADE, () => {
        throw new Error('listener crashed');
      });

      const result = await makeMove(ctx, { from: 'e2', to: 'e4' });

      expect(result.success).toBe(true);
      expect(result.dispatch?.[0].handlersFailed).toBe(1);
    });

    it('dispatches events before saving', async () => {
      const order: string[] = [];
      ctx.dispatcher.subscribe(EventTypes.MOVE_MADE, () => void order.push('event'));
      jest.spyOn(store, 'save').mockImplementation(async () => {
        order.push('save');
      });

      await makeMove(ctx, { from: 'e2', to: 'e4' });

      expect(order).toEqual(['event', 'save']);
    });

    it('clears the redo stack', async () => {
      await makeMove(ctx, { from: 'e2', to: 'e4' });
      await undoMove(ctx);

      const result = await makeMove(ctx, { from: 'd2', to: 'd4' });

      expect(result.canRedo).toBe(false);
    });

    it('converts an unexpected error into a failure result', async () => {
      jest.spyOn(ctx.executor, 'execute').mockRejectedValue(new Error('kaput'));

      const result = await makeMove(ctx, { from: 'e2', to: 'e4' });

      expect(result.success).toBe(false);
      expect(result.message).toBe('Unexpected error: kaput');
    });
  });

  describe('undoMove', () => {
    it('reports that there is nothing to undo', async () => {
      const result = await undoMove(ctx);

      expect(result.success).toBe(false);
      expect(result.message).toBe('No move to undo');
      expect(eventTypes()).toEqual([]);
    });

    it('restores the position before the last move', async () => {
      const before = ctx.game.snapshot();
      await makeMove(ctx, { from: 'e2', to: 'e4' });

      const result = await undoMove(ctx);

      expect(result.success).toBe(true);
      expect(result.message).toBe('Move undone: e2-e4');
      expect(result.move?.notation).toBe('e2-e4');
      expect(result.canUndo).toBe(false);
      expect(result.canRedo).toBe(true);
      expect(ctx.game.snapshot()).toBe(before);
      expect(eventTypes()).toEqual([EventTypes.MOVE_MADE, EventTypes.MOVE_UNDONE]);
      await expect(store.load(TEST_GAME_ID)).resolves.toBe(before);
    });

    it('undoes a resignation', async () => {
      await resignGame(ctx);

      const result = await undoMove(ctx);

      expect(result.message).toBe('Resignation undone, game continues');
      expect(result.move).toBeUndefined();
      expect(result.gameStatus.isEnded).toBe(false);
    });
  });

  describe('redoMove', () => {
    it('reports that there is nothing to redo', async () => {
      const result = await redoMove(ctx);

      expect(result.success).toBe(false);
      expect(result.message).toBe('No move to redo');
    });

    it('replays the undone move', async () => {
      await makeMove(ctx, { from: 'e2', to: 'e4' });
      const afterMove = ctx.game.getStatus();
      await undoMove(ctx);

      const result = await redoMove(ctx);

      expect(result.success).toBe(true);
      expect(result.message).toBe('Move executed: e2-e4');
      expect(result.move?.moveNumber).toBe(1);
      expect(ctx.game.getStatus()).toEqual(afterMove);
      expect(eventTypes()).toEqual([EventTypes.MOVE_MADE, EventTypes.MOVE_UNDONE, EventTypes.MOVE_REDONE]);
    });

    it('repeats check:detected when a checking move is redone', async () => {
      oracle.set('d1-h5', { effects: { isCheck: true, notation: 'Qh5+' } });
      await makeMove(ctx, { from: 'd1', to: 'h5' });
      await undoMove(ctx);

      const result = await redoMove(ctx);

      expect(result.dispatch).toHaveLength(2);
      expect(eventTypes()).toEqual([
        EventTypes.MOVE_MADE,
        EventTypes.CHECK_DETECTED,
        EventTypes.MOVE_UNDONE,
        EventTypes.MOVE_REDONE,
        EventTypes.CHECK_DETECTED,
      ]);
    });

    it('dispatches game:ended again when a game-ending move is redone', async () => {
      oracle.set('d8-h4', {
        effects: { isCheck: true, outcome: { winner: Players.WHITE, reason: 'checkmate' } },
      });
      await makeMove(ctx, { from: 'd8', to: 'h4' });
      await undoMove(ctx);

      const result = await redoMove(ctx);

      expect(result.gameStatus.isEnded).toBe(true);
      expect(eventTypes()).toEqual([
        EventTypes.MOVE_MADE,
        EventTypes.GAME_ENDED,
        EventTypes.MOVE_UNDONE,
        EventTypes.MOVE_REDONE,
        EventTypes.GAME_ENDED,
      ]);
      const [ended] = ctx.dispatcher.getEventHistory({ type: EventTypes.GAME_ENDED, limit: 1 });
      expect(ended.payload.winner).toBe(Players.WHITE);
      expect(ended.payload.reason).toBe('checkmate');
    });

    it('dispatches the resignation events when a resignation is redone', async () => {
      await resignGame(ctx);
      await undoMove(ctx);

      const result = await redoMove(ctx);

      expect(result.success).toBe(true);
      expect(result.message).toBe('white resigned. black wins!');
      expect(result.move).toBeUndefined();
      expect(result.gameStatus.isEnded).toBe(true);
      expect(eventTypes()).toEqual([
        EventTypes.GAME_RESIGNED,
        EventTypes.GAME_ENDED,
        EventTypes.MOVE_UNDONE,
        EventTypes.GAME_RESIGNED,
        EventTypes.GAME_ENDED,
      ]);
      const [resigned] = ctx.dispatcher.getEventHistory({ type: EventTypes.GAME_RESIGNED, limit: 1 });
      expect(resigned.payload.player).toBe(Players.WHITE);
    });

    it('keeps a redo the rules now reject available for later', async () => {
      await makeMove(ctx, { from: 'e2', to: 'e4' });
      await undoMove(ctx);
      oracle.set('e2-e4', { legal: false, reason: 'position changed' });

      const result = await redoMove(ctx);

      expect(result.success).toBe(false);
      expect(result.message).toBe('Illegal move e2-e4: position changed');
      expect(result.canRedo).toBe(true);
    });
  });

  describe('resignGame', () => {
    it('ends the game for the side to move by default', async () => {
      const result = await resignGame(ctx);

      expect(result.success).toBe(true);
      expect(result.message).toBe('white resigned. black wins!');
      expect(result.gameStatus.winner).toBe(Players.BLACK);
      expect(eventTypes()).toEqual([EventTypes.GAME_RESIGNED, EventTypes.GAME_ENDED]);
    });

    it('resigns for the given player', async () => {
      const result = await resignGame(ctx, Players.BLACK);

      expect(result.message).toBe('black resigned. white wins!');
    });

    it('rejects resigning a finished game', async () => {
      await resignGame(ctx);

      const result = await resignGame(ctx);

      expect(result.success).toBe(false);
      expect(result.message).toBe('Cannot make move: game has ended');
    });
  });

  describe('getLegalMoves', () => {
    beforeEach(() => {
      oracle.setLegalMoves([
        { from: 'e2', to: 'e4' },
        { from: 'g1', to: 'f3', notation: 'Nf3' },
        { from: 'b7', to: 'a8', promotion: 'q', isCapture: true },
      ]);
    });

    it('lists every legal move with metadata', async () => {
      const result = await getLegalMoves(ctx);

      expect(result.success).toBe(true);
      expect(result.message).toBe('Found 3 legal moves');
      expect(result.moves).toEqual([
        {
          from: 'e2',
          to: 'e4',
          promotion: null,
          notation: 'e2-e4',
          player: Players.WHITE,
          isCapture: false,
          isCastling: false,
          isEnPassant: false,
        },
        {
          from: 'g1',
          to: 'f3',
          promotion: null,
          notation: 'Nf3',
          player: Players.WHITE,
          isCapture: false,
          isCastling: false,
          isEnPassant: false,
        },
        {
          from: 'b7',
          to: 'a8',
          promotion: 'q',
          notation: 'b7-a8=q',
          player: Players.WHITE,
          isCapture: true,
          isCastling: false,
          isEnPassant: false,
        },
      ]);
    });

    it('lists only the moves leaving a square, for the side to move', async () => {
      await makeMove(ctx, { from: 'e2', to: 'e4' });

      const result = await getLegalMoves(ctx, 'g1');

      expect(result.message).toBe('Found 1 legal move from g1');
      expect(result.moves.map((move) => [move.notation, move.player])).toEqual([['Nf3', Players.BLACK]]);
    });

    it('neither dispatches nor saves', async () => {
      await getLegalMoves(ctx);

      expect(eventTypes()).toEqual([]);
      await expect(store.load(TEST_GAME_ID)).resolves.toBeNull();
    });

    it('rejects a malformed square', async () => {
      const result = await getLegalMoves(ctx, 'z9');

      expect(result.success).toBe(false);
      expect(result.message).toBe('Invalid square: z9');
      expect(result.errors).toEqual(['Square must be a file a-h followed by a rank 1-8']);
      expect(result.moves).toEqual([]);
    });

    it('returns no moves once the game has ended', async () => {
      await resignGame(ctx);

      const result = await getLegalMoves(ctx);

      expect(result.success).toBe(true);
      expect(result.message).toBe('No legal moves: game has ended');
      expect(result.moves).toEqual([]);
    });

    it('fails when the rules cannot list moves', async () => {
      const validateOnly: RuleOracle = {
        validate: () => ({ legal: true, effects: {} }),
        apply: (position: string, move: MoveRequest) => `${position} ${describeMove(move)}`,
      };
      ctx = createTestContext({ oracle: validateOnly });

      const result = await getLegalMoves(ctx);

      expect(result.success).toBe(false);
      expect(result.message).toBe('Legal move listing is not supported by the rules');
    });

    it('turns an oracle failure into a failed result', async () => {
      jest.spyOn(oracle, 'legalMoves').mockImplementation(() => {
        throw new Error('engine offline');
      });

      const result = await getLegalMoves(ctx);

      expect(result.success).toBe(false);
      expect(result.message).toBe('Failed to get legal moves: engine offline');
      expect(result.gameStatus.gameId).toBe(TEST_GAME_ID);
    });
  });
});
