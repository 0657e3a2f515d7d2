import { join } from 'node:path';
import process from 'node:process';
import invariant from 'tiny-invariant';
import { match } from 'ts-pattern';
import { buildResolvedConfig } from '../config/build-resolved-config.ts';
import type { ResolvedToolkitConfig, ToolkitConfig } from '../config/types.ts';
import { validateConfig } from '../config/validate-config.ts';
import { createLogger } from '../create-logger.ts';
import {
  CommandTimeoutError,
  ConfigurationError,
  LifecycleError,
  SecurityViolationError,
} from '../errors.ts';
import { createOverlayManager } from '../overlay-manager/create-overlay-manager.ts';
import type { DirectoryEntry, OverlayChange } from '../overlay-manager/types.ts';
import type { WorkspaceStage } from '../overlay-manager/create-workspace-stage.ts';
import { createWorkspaceStage } from '../overlay-manager/create-workspace-stage.ts';
import { createPolicyEngine } from '../policy-engine/create-policy-engine.ts';
import type { AllowDecision, LogDecision, PolicyDecision } from '../policy-engine/types.ts';
import { createProcessRunner } from '../process-runner/create-process-runner.ts';
import { buildToolPrompt, selectPromptFiles } from '../tool-discovery/build-tool-prompt.ts';
import { discoverTools } from '../tool-discovery/discover-tools.ts';
import type { DiscoveredTool } from '../tool-discovery/types.ts';
import type { BashOptions, CommandResult, Toolkit, ToolkitDeps, ToolkitState } from './types.ts';

const STAGE_DIR = 'workspace';
const SECONDS_TO_MS = 1000;

/**
 * Builds a toolkit in the `created` state. The configuration is validated and
 * the policy engine built here, so configuration errors surface before any
 * directory is created.
 */
export function createToolkit(
  config: ToolkitConfig | ResolvedToolkitConfig,
  deps: ToolkitDeps = {},
): Toolkit {
  const resolved = resolveConfig(config);
  const logger = (deps.logger ?? createLogger({ logLevel: resolved.logLevel })).child({
    component: 'toolkit',
  });
  const policy = createPolicyEngine({
    level: resolved.security,
    blockingSeverity: resolved.blockingSeverity,
    extraRules: resolved.extraRules,
    ...(resolved.allowlist !== null && { allowlist: resolved.allowlist }),
  });
  const overlay = createOverlayManager({
    sourceRoot: resolved.source,
    logger,
    ...(deps.tempDir !== undefined && { tempDir: deps.tempDir }),
  });
  const runProcess = deps.runProcess ?? createProcessRunner({ shell: resolved.shell }).run;
  const env: NodeJS.ProcessEnv = { ...(resolved.env ?? process.env) };

  let state: ToolkitState = 'created';
  let opening: Promise<void> | null = null;
  let closing: Promise<void> | null = null;
  let stage: WorkspaceStage | null = null;
  let tools: readonly DiscoveredTool[] = [];
  const inFlight = new Set<Promise<void>>();

  function requireOpen(operation: string): void {
    if (state !== 'open') {
      throw new LifecycleError(operation, state);
    }
  }

  async function track<T>(task: () => Promise<T>): Promise<T> {
    const running = task();
    // Only used to know when the task is done; failures reach the caller.
    const done = running.then(ignore, ignore);
    inFlight.add(done);
    try {
      return await running;
    } finally {
      inFlight.delete(done);
    }
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async function initialize(): Promise<void> {
    try {
      await overlay.open();
      for (const [path, content] of Object.entries(resolved.files)) {
        await overlay.writeFile(path, content);
      }

      const shadowRoot = overlay.getShadowRoot();
      invariant(shadowRoot !== null, 'an open overlay has a shadow directory');
      const created = createWorkspaceStage({
        overlay,
        stageRoot: join(shadowRoot, STAGE_DIR),
        logger,
      });
      stage = created;
      await created.prepare();

      tools = resolved.discoverTools ? await probeTools(created.root) : [];
    } catch (error) {
      state = 'closed';
      await discardAfterFailedOpen();
      throw error;
    }

    // close() was called while opening; it discards the overlay.
    if (closing !== null) {
      throw new LifecycleError('open', 'closed');
    }

    state = 'open';
    logger.info('Toolkit opened', {
      source: resolved.source,
      security: resolved.security,
      tools: tools.length,
    });
  }

  async function discardAfterFailedOpen(): Promise<void> {
    try {
      await overlay.close();
    } catch (error) {
      logger.error('Failed to discard overlay after a failed open', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async function probeTools(cwd: string): Promise<DiscoveredTool[]> {
    try {
      return await discoverTools({ runProcess, cwd, env, logger });
    } catch (error) {
      logger.info('Tool discovery failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  async function open(): Promise<void> {
    if (opening !== null || state !== 'created') {
      throw new LifecycleError('open', opening !== null && state === 'created' ? 'opening' : state);
    }
    opening = initialize();
    return opening;
  }

  async function shutdown(): Promise<void> {
    const previous = state;
    state = 'closed';

    if (opening !== null) {
      // A failed open is reported to its own caller.
      await opening.then(ignore, ignore);
    }
    await Promise.all(inFlight);
    await overlay.close();

    if (previous !== 'created') {
      logger.info('Toolkit closed');
    }
  }

  // ---------------------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------------------

  async function bash(command: string, options?: BashOptions): Promise<CommandResult> {
    requireOpen('run a command');
    const timeoutMs = resolveTimeoutMs(options, resolved.timeoutMs);
    const decision = policy.evaluate(command);

    const allowed = match(decision)
      .with({ outcome: 'block' }, (blocked) => {
        logger.info('Command blocked', {
          command,
          category: blocked.category,
          rule: blocked.matchedRule?.id ?? null,
        });
        throw new SecurityViolationError(command, blocked);
      })
      .with({ outcome: 'log' }, (logged): LogDecision => {
        logger.info('Command matched a rule and will run', {
          command,
          category: logged.matchedRule.category,
          rule: logged.matchedRule.id,
        });
        return logged;
      })
      .with({ outcome: 'allow' }, (allowedDecision): AllowDecision => allowedDecision)
      .exhaustive();

    return track(() => execute(command, allowed, timeoutMs));
  }

  async function execute(
    command: string,
    decision: AllowDecision | LogDecision,
    timeoutMs: number,
  ): Promise<CommandResult> {
    const current = stage;
    invariant(current !== null, 'an open toolkit has a workspace stage');

    logger.debug('Running command', { command, timeoutMs });
    await current.prepare();
    const result = await runProcess({
      command,
      cwd: current.root,
      env,
      timeoutMs,
      maxOutputBytes: resolved.maxOutputBytes,
    });
    await current.capture();
    logger.debug('Command finished', {
      command,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
      timedOut: result.timedOut,
    });

    if (result.timedOut) {
      throw new CommandTimeoutError({
        command,
        timeoutMs,
        stdout: result.stdout,
        stderr: result.stderr,
      });
    }

    return Object.freeze({
      command,
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
      truncated: result.truncated,
      decision,
    });
  }

  function evaluate(command: string): PolicyDecision {
    return policy.evaluate(command);
  }

  // ---------------------------------------------------------------------------
  // Files
  // ---------------------------------------------------------------------------

  async function readFile(path: string): Promise<string> {
    requireOpen('read a file');
    const content = await track(() => overlay.readFile(path));
    return content.toString('utf8');
  }

  async function writeFile(path: string, content: string): Promise<void> {
    requireOpen('write a file');
    await track(() => overlay.writeFile(path, content));
  }

  async function deletePath(path: string): Promise<void> {
    requireOpen('delete a path');
    await track(() => overlay.delete(path));
  }

  async function listDirectory(path?: string): Promise<DirectoryEntry[]> {
    requireOpen('list a directory');
    return track(() => overlay.listDirectory(path));
  }

  function diff(): OverlayChange[] {
    requireOpen('diff the overlay');
    return overlay.diff();
  }

  async function getToolPrompt(): Promise<string> {
    requireOpen('build the tool prompt');
    const entries = await track(() => overlay.walk());
    return buildToolPrompt({
      tools,
      files: selectPromptFiles(entries),
      extraInstructions: resolved.extraInstructions,
    });
  }

  return {
    getState: () => state,
    open,
    bash,
    evaluate,
    readFile,
    writeFile,
    delete: deletePath,
    listDirectory,
    diff,
    getDiscoveredTools: () => tools,
    getToolPrompt,
    close(): Promise<void> {
      closing ??= shutdown();
      return closing;
    },
  };
}

/**
 * Creates a toolkit and opens it.
 */
export async function openToolkit(
  config: ToolkitConfig | ResolvedToolkitConfig,
  deps?: ToolkitDeps,
): Promise<Toolkit> {
  const toolkit = createToolkit(config, deps);
  await toolkit.open();
  return toolkit;
}

function resolveConfig(config: ToolkitConfig | ResolvedToolkitConfig): ResolvedToolkitConfig {
  if ('timeoutMs' in config) {
    return config;
  }
  validateConfig(config);
  return buildResolvedConfig(config);
}

function resolveTimeoutMs(options: BashOptions | undefined, fallbackMs: number): number {
  if (options?.timeout === undefined) {
    return fallbackMs;
  }
  if (!Number.isFinite(options.timeout) || options.timeout <= 0) {
    throw new ConfigurationError(
      `Invalid bash option 'timeout': expected a positive number of seconds, got ${options.timeout}`,
    );
  }
  return Math.round(options.timeout * SECONDS_TO_MS);
}

function ignore(): void {}
