import { logger } from '../../config/logger.config';
import { CommandExecutor, CommandStatuses, CompositeCommand } from '../../shared/commands';
import { Counter, CounterCommand } from '../fixtures/counter-command';

jest.mock('../../config/logger.config', () => ({
  logger: { warn: jest.fn(), info: jest.fn(), debug: jest.fn(), error: jest.fn() },
}));

describe('CompositeCommand', () => {
  let counter: Counter;

  beforeEach(() => {
    counter = { value: 0 };
    jest.clearAllMocks();
  });

  it('runs every member in order', async () => {
    const log: string[] = [];
    const composite = new CompositeCommand(
      [new CounterCommand(counter, 1, { log }), new CounterCommand(counter, 2, { log })],
      'opening'
    );

    const result = await composite.execute();

    expect(result).toEqual({
      success: true,
      message: 'Composite command completed successfully (2 steps)',
      data: { executedCommands: 2 },
    });
    expect(log).toEqual(['execute:1', 'execute:2']);
    expect(counter.value).toBe(3);
    expect(composite.describe()).toBe('opening');
    expect(composite.getCommands().map((command) => command.status)).toEqual([
      CommandStatuses.COMPLETED,
      CommandStatuses.COMPLETED,
    ]);
  });

  it('rolls back executed members in reverse order when a step fails', async () => {
    const log: string[] = [];
    const first = new CounterCommand(counter, 1, { log });
    const second = new CounterCommand(counter, 2, { log });
    const third = new CounterCommand(counter, 3, { log, failExecute: true });
    const fourth = new CounterCommand(counter, 4, { log });
    const composite = new CompositeCommand([first, second, third, fourth]);

    const result = await composite.execute();

    expect(result.success).toBe(false);
    expect(result.message).toBe('Composite command failed at step 3: not allowed');
    expect(result.data).toEqual({ executedCommands: 2, failedStep: 3, rollbackFailures: [] });
    expect(log).toEqual(['execute:1', 'execute:2', 'execute:3', 'undo:2', 'undo:1']);
    expect(counter.value).toBe(0);
    expect(first.status).toBe(CommandStatuses.UNDONE);
    expect(third.status).toBe(CommandStatuses.FAILED);
    expect(fourth.status).toBe(CommandStatuses.PENDING);
  });

  it('reports a member that throws as a failed step', async () => {
    const composite = new CompositeCommand([new CounterCommand(counter, 1, { throwExecute: true })]);

    const result = await composite.execute();

    expect(result.message).toBe('Composite command failed at step 1: boom');
    expect(result.error?.message).toBe('boom');
    expect(result.data?.executedCommands).toBe(0);
  });

  it('undoes as one unit through the executor', async () => {
    const executor = new CommandExecutor();
    const members = [new CounterCommand(counter, 1), new CounterCommand(counter, 2)];
    const composite = new CompositeCommand(members);

    await executor.execute(composite);
    expect(executor.canUndo()).toBe(true);

    const result = await executor.undo();

    expect(result?.message).toBe('Composite command undone successfully');
    expect(counter.value).toBe(0);
    expect(members.map((member) => member.status)).toEqual([
      CommandStatuses.UNDONE,
      CommandStatuses.UNDONE,
    ]);
    expect(composite.status).toBe(CommandStatuses.UNDONE);
  });

  it('cannot be undone when a member cannot', async () => {
    const executor = new CommandExecutor();
    const composite = new CompositeCommand([
      new CounterCommand(counter, 1),
      new CounterCommand(counter, 2, { undoable: false }),
    ]);

    await executor.execute(composite);

    expect(composite.canUndo()).toBe(false);
    await expect(executor.undo()).resolves.toEqual({
      success: false,
      message: 'Last command cannot be undone',
    });
  });

  it('lists members whose undo throws', async () => {
    const first = new CounterCommand(counter, 1);
    const second = new CounterCommand(counter, 2, { throwUndo: true });
    const composite = new CompositeCommand([first, second]);
    await composite.execute();

    const result = await composite.undo();

    expect(result.success).toBe(false);
    expect(result.message).toBe(`Some commands failed to undo: ${second.id}`);
    expect(result.data).toEqual({ executedCommands: 2, rollbackFailures: [second.id] });
    expect(counter.value).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith(
      'Composite member undo threw',
      expect.objectContaining({ commandId: second.id, error: 'undo boom' })
    );
  });
});
