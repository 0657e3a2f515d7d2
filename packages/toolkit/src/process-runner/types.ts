import type { ChildProcess, SpawnOptions } from 'node:child_process';

export interface RunProcessOptions {
  command: string;
  cwd: string;
  env: NodeJS.ProcessEnv;
  timeoutMs: number;
  /** Characters kept from each of stdout and stderr. */
  maxOutputBytes: number;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  /** Exit status, or 128 + the signal number when the process was killed. */
  exitCode: number;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  truncated: boolean;
  durationMs: number;
}

export type RunProcess = (options: RunProcessOptions) => Promise<ProcessResult>;

export type SpawnProcess = (file: string, args: string[], options: SpawnOptions) => ChildProcess;

export interface ProcessRunnerConfig {
  /** Shell the command string is handed to with `-c`. */
  shell?: string;
  spawnProcess?: SpawnProcess;
}

export interface ProcessRunner {
  run: RunProcess;
}
