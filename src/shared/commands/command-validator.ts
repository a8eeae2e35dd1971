import { Command } from './command';

export interface CommandValidation {
  valid: boolean;
  errors: string[];
}

/**
 * Checks a command before the executor runs it.
 * A rejected command is never executed and leaves no trace in history.
 */
export interface CommandValidator {
  validate(command: Command): CommandValidation | Promise<CommandValidation>;
}

export function toValidation(errors: string[]): CommandValidation {
  return { valid: errors.length === 0, errors };
}
