import type { Logger } from '../create-logger.ts';
import type { DirectoryEntry, OverlayChange } from '../overlay-manager/types.ts';
import type { AllowDecision, LogDecision, PolicyDecision } from '../policy-engine/types.ts';
import type { RunProcess } from '../process-runner/types.ts';
import type { DiscoveredTool } from '../tool-discovery/types.ts';

export type ToolkitState = 'created' | 'open' | 'closed';

/**
 * Outcome of a command that was allowed to run. A non-zero exit status is
 * reported here rather than raised.
 */
export interface CommandResult {
  readonly command: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
  readonly truncated: boolean;
  /** `log` when the command matched a rule that did not block it. */
  readonly decision: AllowDecision | LogDecision;
}

export interface BashOptions {
  /** Seconds; overrides the configured timeout for this command. */
  timeout?: number;
}

export interface ToolkitDeps {
  runProcess?: RunProcess;
  logger?: Logger;
  /** Parent directory for the shadow directory. */
  tempDir?: string;
}

export interface Toolkit {
  getState: () => ToolkitState;
  open: () => Promise<void>;
  bash: (command: string, options?: BashOptions) => Promise<CommandResult>;
  /** Policy decision for a command, without running it. */
  evaluate: (command: string) => PolicyDecision;
  readFile: (path: string) => Promise<string>;
  writeFile: (path: string, content: string) => Promise<void>;
  delete: (path: string) => Promise<void>;
  listDirectory: (path?: string) => Promise<DirectoryEntry[]>;
  diff: () => OverlayChange[];
  getDiscoveredTools: () => readonly DiscoveredTool[];
  getToolPrompt: () => Promise<string>;
  close: () => Promise<void>;
}
