import type { z } from 'zod';

export type ToolName = 'bash' | 'read_file' | 'write_file' | 'list_directory';

/**
 * Framework-neutral description of one toolkit operation, ready to be
 * registered with an agent framework.
 */
export interface ToolDefinition {
  name: ToolName;
  description: string;
  inputSchema: z.ZodType;
  jsonSchema: z.core.JSONSchema.BaseSchema;
  /** Validates `input` against `inputSchema` and returns agent-facing text. */
  execute: (input: unknown) => Promise<string>;
}

export type ToolDefinitions = Readonly<Record<ToolName, ToolDefinition>>;
