import type { BlockDecision, ViolationCategory } from './policy-engine/types.ts';

export type ErrorCode =
  | 'SECURITY_VIOLATION'
  | 'LIFECYCLE'
  | 'PATH_ESCAPE'
  | 'PATH_NOT_FOUND'
  | 'EXECUTION'
  | 'OVERLAY_IO'
  | 'CONFIGURATION';

/**
 * Base class for every error raised by the toolkit. `code` is stable across
 * releases and safe to branch on; messages are not.
 */
export class ShellfenceError extends Error {
  readonly name: string = 'ShellfenceError';

  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * Raised instead of a CommandResult when the policy engine blocks a command.
 * No process is started for a command that produced this error.
 */
export class SecurityViolationError extends ShellfenceError {
  readonly name: string = 'SecurityViolationError';
  readonly category: ViolationCategory;
  readonly description: string;
  readonly pattern: string | null;
  readonly command: string;
  readonly decision: BlockDecision;

  constructor(command: string, decision: BlockDecision) {
    super('SECURITY_VIOLATION', `Security violation: ${decision.reason}`);
    this.command = command;
    this.decision = decision;
    this.category = decision.category;
    this.description = decision.matchedRule?.description ?? decision.reason;
    this.pattern = decision.matchedRule?.pattern.source ?? null;
  }
}

export class LifecycleError extends ShellfenceError {
  readonly name: string = 'LifecycleError';

  constructor(
    public readonly operation: string,
    public readonly state: string,
  ) {
    super('LIFECYCLE', `Cannot ${operation} while ${state}`);
  }
}

export class PathEscapeError extends ShellfenceError {
  readonly name: string = 'PathEscapeError';

  constructor(
    public readonly path: string,
    public readonly sourceRoot: string,
  ) {
    super('PATH_ESCAPE', `Path '${path}' resolves outside the source root ${sourceRoot}`);
  }
}

export class PathNotFoundError extends ShellfenceError {
  readonly name: string = 'PathNotFoundError';

  constructor(public readonly path: string) {
    super('PATH_NOT_FOUND', `No such file or directory: ${path}`);
  }
}

export type ExecutionErrorKind = 'spawn-failed' | 'timeout' | 'non-zero-exit';

export class ExecutionError extends ShellfenceError {
  readonly name: string = 'ExecutionError';

  constructor(
    public readonly kind: ExecutionErrorKind,
    public readonly command: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super('EXECUTION', message, options);
  }
}

export interface CommandTimeoutDetails {
  command: string;
  timeoutMs: number;
  stdout: string;
  stderr: string;
}

/**
 * The process was killed after exceeding its timeout. Whatever it wrote before
 * being killed stays in the overlay.
 */
export class CommandTimeoutError extends ExecutionError {
  readonly name: string = 'CommandTimeoutError';
  readonly timeoutMs: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(details: CommandTimeoutDetails) {
    super('timeout', details.command, `Command timed out after ${details.timeoutMs}ms`);
    this.timeoutMs = details.timeoutMs;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
  }
}

export class OverlayIOError extends ShellfenceError {
  readonly name: string = 'OverlayIOError';

  constructor(
    public readonly path: string | null,
    message: string,
    options?: { cause?: unknown },
  ) {
    super('OVERLAY_IO', message, options);
  }
}

export class ConfigurationError extends ShellfenceError {
  readonly name: string = 'ConfigurationError';

  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
