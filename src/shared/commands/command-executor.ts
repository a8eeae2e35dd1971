/**
 * Command Executor - Reversible Mutation Gateway
 *
 * Every mutation of a session's aggregate goes through one executor. It runs
 * commands one at a time, keeps a bounded history for undo and a redo stack,
 * and converts anything a command throws into a failed CommandResult.
 *
 * Timeline is linear: executing a new command discards the redo stack.
 */

import { logger } from '../../config/logger.config';
import { toError } from '../../utils/exceptions';
import { BoundedBuffer } from '../utils/bounded-buffer';
import { SerialQueue } from '../utils/serial-queue';
import {
  Command,
  CommandResult,
  CommandStatus,
  CommandStatuses,
  commandFailure,
} from './command';
import { CommandValidator } from './command-validator';

export const DEFAULT_MAX_HISTORY = 100;

export interface CommandExecutorOptions {
  /** Checked before every new command; not consulted on redo */
  validator?: CommandValidator;
  /** Maximum commands kept for undo. Oldest are evicted silently. */
  maxHistory?: number;
}

const EXECUTABLE_STATUSES: ReadonlySet<CommandStatus> = new Set([
  CommandStatuses.PENDING,
  CommandStatuses.FAILED,
]);

export class CommandExecutor {
  private readonly validator?: CommandValidator;
  private readonly history: BoundedBuffer<Command>;
  private undoStack: Command[] = [];
  // One command (including its undo/redo) completes before the next starts
  private readonly queue = new SerialQueue();

  constructor(options: CommandExecutorOptions = {}) {
    this.validator = options.validator;
    this.history = new BoundedBuffer<Command>(options.maxHistory ?? DEFAULT_MAX_HISTORY);
  }

  get maxHistory(): number {
    return this.history.capacity;
  }

  /**
   * Validate and run a new command.
   */
  execute<T>(command: Command<T>): Promise<CommandResult<T>> {
    return this.queue.run(() => this.runExecute(command));
  }

  /**
   * Undo the newest command in history.
   * @returns null when history is empty
   */
  undo(): Promise<CommandResult | null> {
    return this.queue.run(() => this.runUndo());
  }

  /**
   * Re-execute the most recently undone command.
   * @returns null when there is nothing to redo
   */
  redo(): Promise<CommandResult | null> {
    return this.queue.run(() => this.runRedo());
  }

  /**
   * Run an operation in the same queue as execute/undo/redo, e.g. replacing
   * the aggregate and clearing history without racing an in-flight move.
   * The operation must not call execute/undo/redo/run itself.
   */
  run<T>(operation: () => T | Promise<T>): Promise<T> {
    return this.queue.run(operation);
  }

  canUndo(): boolean {
    const last = this.history.peekLast();
    return last !== undefined && last.canUndo();
  }

  canRedo(): boolean {
    return this.undoStack.length > 0;
  }

  /**
   * Executed commands, oldest first.
   */
  getCommandHistory(): Command[] {
    return this.history.toArray();
  }

  /**
   * Commands available for redo; the next one to redo is last.
   */
  getUndoStack(): Command[] {
    return [...this.undoStack];
  }

  clearHistory(): void {
    this.history.clear();
    this.undoStack = [];
    logger.debug('Command history cleared');
  }

  private async runExecute<T>(command: Command<T>): Promise<CommandResult<T>> {
    if (!EXECUTABLE_STATUSES.has(command.status)) {
      return commandFailure(
        `Command ${command.id} cannot be executed from status: ${command.status}`
      );
    }

    try {
      if (this.validator) {
        const validation = await this.validator.validate(command);
        if (!validation.valid) {
          command.status = CommandStatuses.CANCELLED;
          const rejected = commandFailure<T>(
            `Command validation failed: ${validation.errors.join('; ')}`,
            { errors: validation.errors }
          );
          command.result = rejected;
          logger.debug('Command rejected by validator', {
            commandId: command.id,
            description: command.describe(),
            errors: validation.errors,
          });
          return rejected;
        }
      }

      command.status = CommandStatuses.EXECUTING;
      const result = await command.execute();
      command.result = result;

      if (result.success) {
        const evicted = this.history.push(command);
        this.undoStack = [];
        command.status = CommandStatuses.COMPLETED;

        if (evicted) {
          logger.debug('Evicted oldest command from history', {
            commandId: evicted.id,
            maxHistory: this.history.capacity,
          });
        }
        logger.info('Command executed', {
          commandId: command.id,
          description: command.describe(),
        });
      } else {
        command.status = CommandStatuses.FAILED;
        logger.debug('Command reported failure', {
          commandId: command.id,
          message: result.message,
        });
      }

      return result;
    } catch (error) {
      const err = toError(error);
      command.status = CommandStatuses.FAILED;
      const failed = commandFailure<T>(`Command execution failed: ${err.message}`, { error: err });
      command.result = failed;
      logger.error('Command execution threw', {
        commandId: command.id,
        description: command.describe(),
        error: err.message,
      });
      return failed;
    }
  }

  private async runUndo(): Promise<CommandResult | null> {
    const last = this.history.peekLast();
    if (!last) return null;

    if (!last.canUndo()) {
      return commandFailure('Last command cannot be undone');
    }

    try {
      const result = await last.undo();

      if (result.success) {
        this.history.pop();
        this.undoStack.push(last);
        last.status = CommandStatuses.UNDONE;
        logger.info('Command undone', { commandId: last.id, description: last.describe() });
      }

      return result;
    } catch (error) {
      const err = toError(error);
      logger.error('Command undo threw', { commandId: last.id, error: err.message });
      return commandFailure(`Undo failed: ${err.message}`, { error: err });
    }
  }

  private async runRedo(): Promise<CommandResult | null> {
    const command = this.undoStack.pop();
    if (!command) return null;

    command.status = CommandStatuses.EXECUTING;

    try {
      const result = await command.execute();
      command.result = result;

      if (result.success) {
        command.status = CommandStatuses.COMPLETED;
        this.history.push(command);
        logger.info('Command redone', { commandId: command.id, description: command.describe() });
      } else {
        this.requeue(command);
      }

      return result;
    } catch (error) {
      const err = toError(error);
      this.requeue(command);
      logger.error('Command redo threw', { commandId: command.id, error: err.message });
      return commandFailure(`Redo failed: ${err.message}`, { error: err });
    }
  }

  /** A failed redo goes back on the stack so it can be retried. */
  private requeue(command: Command): void {
    command.status = CommandStatuses.UNDONE;
    this.undoStack.push(command);
  }
}
