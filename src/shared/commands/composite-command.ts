import {
  BaseCommand,
  Command,
  CommandResult,
  CommandStatuses,
  commandFailure,
  commandSuccess,
} from './command';
import { toError } from '../../utils/exceptions';
import { logger } from '../../config/logger.config';

export interface CompositeCommandData {
  executedCommands: number;
  failedStep?: number;
  rollbackFailures?: string[];
}

/**
 * Runs several commands as one atomic unit.
 *
 * If a member fails, every member that already succeeded is undone in
 * reverse order before the composite reports failure. Members are run
 * directly (not through an executor), so the composite keeps their status
 * current itself.
 */
export class CompositeCommand extends BaseCommand<CompositeCommandData> {
  private executed: Command[] = [];

  constructor(
    private readonly commands: Command[],
    private readonly description: string = 'Composite command'
  ) {
    super();
  }

  async execute(): Promise<CommandResult<CompositeCommandData>> {
    this.executed = [];

    for (const [index, command] of this.commands.entries()) {
      const result = await this.runMember(command);

      if (!result.success) {
        const rollbackFailures = await this.undoExecuted();
        return commandFailure(
          `Composite command failed at step ${index + 1}: ${result.message}`,
          {
            error: result.error,
            data: { executedCommands: index, failedStep: index + 1, rollbackFailures },
          }
        );
      }

      this.executed.push(command);
    }

    return commandSuccess(
      `Composite command completed successfully (${this.commands.length} steps)`,
      { executedCommands: this.commands.length }
    );
  }

  async undo(): Promise<CommandResult<CompositeCommandData>> {
    const count = this.executed.length;
    const failures = await this.undoExecuted();

    if (failures.length > 0) {
      return commandFailure(`Some commands failed to undo: ${failures.join(', ')}`, {
        data: { executedCommands: count, rollbackFailures: failures },
      });
    }

    return commandSuccess('Composite command undone successfully', { executedCommands: 0 });
  }

  canUndo(): boolean {
    return (
      this.status === CommandStatuses.COMPLETED &&
      this.executed.length > 0 &&
      this.executed.every((command) => command.canUndo())
    );
  }

  describe(): string {
    return this.description;
  }

  getCommands(): Command[] {
    return [...this.commands];
  }

  private async runMember(command: Command): Promise<CommandResult> {
    command.status = CommandStatuses.EXECUTING;

    let result: CommandResult;
    try {
      result = await command.execute();
    } catch (error) {
      const err = toError(error);
      result = commandFailure(err.message, { error: err });
    }

    command.result = result;
    command.status = result.success ? CommandStatuses.COMPLETED : CommandStatuses.FAILED;
    return result;
  }

  /**
   * Undo executed members newest first. Returns ids of members that could not be undone.
   */
  private async undoExecuted(): Promise<string[]> {
    const failures: string[] = [];

    for (const command of [...this.executed].reverse()) {
      if (!command.canUndo()) {
        failures.push(command.id);
        continue;
      }

      try {
        const result = await command.undo();
        if (result.success) {
          command.status = CommandStatuses.UNDONE;
        } else {
          failures.push(command.id);
        }
      } catch (error) {
        logger.warn('Composite member undo threw', {
          compositeId: this.id,
          commandId: command.id,
          error: toError(error).message,
        });
        failures.push(command.id);
      }
    }

    this.executed = [];
    return failures;
  }
}
