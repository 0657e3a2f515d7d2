import { ExecutionError } from '../errors.ts';
import type { CommandResult } from './types.ts';

export function assertCommandSucceeded(result: CommandResult): void {
  if (result.exitCode !== 0) {
    throw new ExecutionError(
      'non-zero-exit',
      result.command,
      `Command exited with status ${result.exitCode}`,
    );
  }
}
