/**
 * Commands Module
 *
 * Re-exports the command primitives and the executor.
 */

export {
  Command,
  CommandResult,
  CommandStatus,
  CommandStatuses,
  BaseCommand,
  SnapshotCommand,
  Snapshottable,
  commandSuccess,
  commandFailure,
} from './command';
export { CompositeCommand, CompositeCommandData } from './composite-command';
export { CommandValidator, CommandValidation, toValidation } from './command-validator';
export { CommandExecutor, CommandExecutorOptions, DEFAULT_MAX_HISTORY } from './command-executor';
