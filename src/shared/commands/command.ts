/**
 * Command Primitives
 *
 * A command is a reversible unit of work. It is created per user action,
 * handed to the CommandExecutor, and owned by it from then on. The executor
 * (not the command) guards against double execution through `status`.
 */

import { v4 as uuidv4 } from 'uuid';

export const CommandStatuses = {
  PENDING: 'pending',
  EXECUTING: 'executing',
  COMPLETED: 'completed',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
  UNDONE: 'undone',
} as const;

export type CommandStatus = (typeof CommandStatuses)[keyof typeof CommandStatuses];

/**
 * Result of executing, undoing or redoing a command
 */
export interface CommandResult<T = unknown> {
  /** Whether the operation succeeded */
  success: boolean;
  /** Human-readable summary */
  message: string;
  /** Structured result data if any */
  data?: T;
  /** Error caught while running the command */
  error?: Error;
  /** Validation reasons when the command was rejected before running */
  errors?: string[];
}

export function commandSuccess<T = never>(message: string, data?: T): CommandResult<T> {
  return { success: true, message, data };
}

export function commandFailure<T = never>(
  message: string,
  extra: Pick<CommandResult<T>, 'data' | 'error' | 'errors'> = {}
): CommandResult<T> {
  return { success: false, message, ...extra };
}

export interface Command<T = unknown> {
  readonly id: string;
  readonly createdAt: Date;
  status: CommandStatus;
  result: CommandResult<T> | null;

  execute(): Promise<CommandResult<T>>;
  undo(): Promise<CommandResult<T>>;
  canUndo(): boolean;
  describe(): string;
}

/**
 * Identity and status plumbing shared by every command.
 */
export abstract class BaseCommand<T = unknown> implements Command<T> {
  readonly id: string = uuidv4();
  readonly createdAt: Date = new Date();
  status: CommandStatus = CommandStatuses.PENDING;
  result: CommandResult<T> | null = null;

  abstract execute(): Promise<CommandResult<T>>;
  abstract undo(): Promise<CommandResult<T>>;
  abstract canUndo(): boolean;
  abstract describe(): string;
}

/**
 * An aggregate that can be serialized and restored verbatim.
 */
export interface Snapshottable {
  snapshot(): string;
  restore(serialized: string): void;
}

/**
 * Base for commands that undo by restoring a pre-execution snapshot of the
 * aggregate they mutate.
 *
 * Subclasses must call `captureSnapshot()` before their first mutation and
 * only after every check that can reject the command has passed.
 */
export abstract class SnapshotCommand<
  TAggregate extends Snapshottable,
  T = unknown,
> extends BaseCommand<T> {
  private preExecutionState: string | null = null;

  protected constructor(protected readonly aggregate: TAggregate) {
    super();
  }

  protected captureSnapshot(): void {
    this.preExecutionState = this.aggregate.snapshot();
  }

  hasSnapshot(): boolean {
    return this.preExecutionState !== null;
  }

  canUndo(): boolean {
    return this.status === CommandStatuses.COMPLETED && this.preExecutionState !== null;
  }

  async undo(): Promise<CommandResult<T>> {
    if (this.preExecutionState === null) {
      return commandFailure('Nothing to undo: no snapshot captured');
    }

    this.aggregate.restore(this.preExecutionState);
    return this.undoResult();
  }

  /**
   * Result reported after the snapshot has been restored.
   */
  protected undoResult(): CommandResult<T> {
    return commandSuccess(`Undone: ${this.describe()}`);
  }
}
