import { z } from 'zod';
import { CommandTimeoutError, SecurityViolationError } from '../errors.ts';
import type { Toolkit } from '../toolkit/types.ts';
import type { ToolDefinition, ToolDefinitions, ToolName } from './types.ts';

const bashInputSchema = z.object({
  command: z.string().min(1).describe('Shell command to run'),
  timeout: z.number().positive().optional().describe('Seconds before the command is killed'),
});

const readFileInputSchema = z.object({
  path: z.string().min(1).describe('Path relative to the workspace root'),
});

const writeFileInputSchema = z.object({
  path: z.string().min(1).describe('Path relative to the workspace root'),
  content: z.string().describe('Full new content of the file'),
});

const listDirectoryInputSchema = z.object({
  path: z.string().optional().describe('Directory relative to the workspace root'),
});

const BASH_DESCRIPTION =
  'Execute bash commands in a sandboxed copy of the workspace. Changes never reach the original files.';

function defineTool<TSchema extends z.ZodType>(
  name: ToolName,
  description: string,
  inputSchema: TSchema,
  run: (input: z.infer<TSchema>) => Promise<string>,
): ToolDefinition {
  return {
    name,
    description,
    inputSchema,
    jsonSchema: z.toJSONSchema(inputSchema),
    execute: async (input: unknown) => run(inputSchema.parse(input)),
  };
}

/**
 * Maps the toolkit's operations onto tool descriptors for agent frameworks.
 * The bash description carries the toolkit's tool prompt.
 */
export async function createToolDefinitions(toolkit: Toolkit): Promise<ToolDefinitions> {
  const toolPrompt = await toolkit.getToolPrompt();
  const bashDescription = toolPrompt === '' ? BASH_DESCRIPTION : `${BASH_DESCRIPTION}\n${toolPrompt}`;

  return Object.freeze({
    bash: defineTool('bash', bashDescription, bashInputSchema, async (input) => {
      try {
        const result = await toolkit.bash(
          input.command,
          input.timeout === undefined ? undefined : { timeout: input.timeout },
        );
        if (result.exitCode !== 0 && result.stderr !== '') {
          return `Error (exit ${result.exitCode}): ${result.stderr}`;
        }
        return result.stdout;
      } catch (error) {
        if (error instanceof SecurityViolationError) {
          return `Blocked (${error.category}): ${error.description}`;
        }
        if (error instanceof CommandTimeoutError) {
          return `Error: command timed out after ${error.timeoutMs}ms\n${error.stdout}`;
        }
        throw error;
      }
    }),
    read_file: defineTool(
      'read_file',
      'Read a file from the sandboxed workspace.',
      readFileInputSchema,
      async (input) => toolkit.readFile(input.path),
    ),
    write_file: defineTool(
      'write_file',
      'Write content to a file in the sandboxed workspace.',
      writeFileInputSchema,
      async (input) => {
        await toolkit.writeFile(input.path, input.content);
        return `Written to ${input.path}`;
      },
    ),
    list_directory: defineTool(
      'list_directory',
      'List a directory in the sandboxed workspace. Directories end with a slash.',
      listDirectoryInputSchema,
      async (input) => {
        const entries = await toolkit.listDirectory(input.path);
        return entries
          .map((entry) => (entry.type === 'directory' ? `${entry.name}/` : entry.name))
          .join('\n');
      },
    ),
  });
}
