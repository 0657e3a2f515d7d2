import type { HookCallback, HookInput, HookJSONOutput } from '@anthropic-ai/claude-agent-sdk';
import { z } from 'zod';
import type { Toolkit } from '../toolkit/types.ts';

const bashToolInputSchema = z.object({ command: z.string() });

/**
 * PreToolUse hook that runs Bash tool calls past the toolkit's policy before
 * the agent executes them. Logged matches are approved.
 */
export function createBashPolicyHook(toolkit: Pick<Toolkit, 'evaluate'>): HookCallback {
  return async (
    input: HookInput,
    _toolUseID: string | undefined,
    _options: { signal: AbortSignal },
  ): Promise<HookJSONOutput> => {
    const command = extractCommand(input);

    if (command === '') {
      return { decision: 'approve' };
    }

    const decision = toolkit.evaluate(command);

    if (decision.outcome !== 'block') {
      return { decision: 'approve' };
    }

    return { decision: 'block', reason: decision.reason };
  };
}

function extractCommand(input: HookInput): string {
  if (!('tool_input' in input)) {
    return '';
  }
  const parsed = bashToolInputSchema.safeParse(input.tool_input);
  return parsed.success ? parsed.data.command : '';
}
