import type { ChildProcess } from 'node:child_process';
import { spawn } from 'node:child_process';
import { constants as osConstants } from 'node:os';
import { performance } from 'node:perf_hooks';
import process from 'node:process';
import { ExecutionError, isNodeError } from '../errors.ts';
import { createOutputCollector } from './truncate-output.ts';
import type {
  ProcessResult,
  ProcessRunner,
  ProcessRunnerConfig,
  RunProcessOptions,
  SpawnProcess,
} from './types.ts';

const DEFAULT_SHELL = 'bash';
// After the kill, how long to wait for stdio to close before giving up on
// descendants that left the process group.
const KILL_GRACE_MS = 1000;

export function createProcessRunner(config?: ProcessRunnerConfig): ProcessRunner {
  const shell = config?.shell ?? DEFAULT_SHELL;
  const spawnProcess: SpawnProcess = config?.spawnProcess ?? spawn;

  function run(options: RunProcessOptions): Promise<ProcessResult> {
    const startedAt = performance.now();

    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        // Its own process group, so a timeout can kill everything it started.
        child = spawnProcess(shell, ['-c', options.command], {
          cwd: options.cwd,
          env: options.env,
          detached: true,
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        reject(buildSpawnError(shell, options.command, error));
        return;
      }

      const stdout = createOutputCollector(options.maxOutputBytes);
      const stderr = createOutputCollector(options.maxOutputBytes);
      let timedOut = false;
      let settled = false;
      let graceTimer: NodeJS.Timeout | null = null;

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        killProcessGroup(child);
        graceTimer = setTimeout(() => {
          child.stdout?.destroy();
          child.stderr?.destroy();
        }, KILL_GRACE_MS);
      }, options.timeoutMs);

      function clearTimers(): void {
        clearTimeout(timeoutTimer);
        if (graceTimer !== null) {
          clearTimeout(graceTimer);
        }
      }

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error: Error) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimers();
        reject(buildSpawnError(shell, options.command, error));
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimers();

        const out = stdout.finish();
        const err = stderr.finish();
        resolve({
          stdout: out.text,
          stderr: err.text,
          exitCode: code ?? signalExitCode(signal),
          signal,
          timedOut,
          truncated: out.truncated || err.truncated,
          durationMs: Math.round(performance.now() - startedAt),
        });
      });
    });
  }

  return { run };
}

function killProcessGroup(child: ChildProcess): void {
  if (child.pid === undefined) {
    return;
  }
  try {
    process.kill(-child.pid, 'SIGKILL');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ESRCH') {
      return;
    }
    child.kill('SIGKILL');
  }
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (signal === null) {
    return 1;
  }
  const entry = Object.entries(osConstants.signals).find(([name]) => name === signal);
  return 128 + (entry?.[1] ?? 0);
}

function buildSpawnError(shell: string, command: string, error: unknown): ExecutionError {
  const message = error instanceof Error ? error.message : String(error);
  return new ExecutionError('spawn-failed', command, `Failed to start ${shell}: ${message}`, {
    cause: error,
  });
}
