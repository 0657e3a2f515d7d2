import type { Logger } from '../create-logger.ts';
import type { RunProcess } from '../process-runner/types.ts';

export interface DiscoveredTool {
  name: string;
  description: string;
  /** Absolute path the shell resolved the name to. */
  path: string;
}

export interface DiscoverToolsOptions {
  runProcess: RunProcess;
  cwd: string;
  env: NodeJS.ProcessEnv;
  logger: Logger;
}

export interface ToolPromptInput {
  tools: readonly DiscoveredTool[];
  /** Logical paths of files in the merged view. */
  files: readonly string[];
  extraInstructions: string | null;
}
