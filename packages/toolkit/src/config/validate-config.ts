import { z } from 'zod';
import type { LogLevel } from '../create-logger.ts';
import { ConfigurationError } from '../errors.ts';
import { compileRuleDefinitions } from '../policy-engine/compile-rules.ts';
import { RULE_CATEGORIES, RULE_SEVERITIES, SECURITY_LEVELS } from '../policy-engine/constants.ts';
import { createPolicyEngine } from '../policy-engine/create-policy-engine.ts';
import type { ToolkitConfig } from './types.ts';

const LOG_LEVELS = ['debug', 'info', 'error'] as const satisfies readonly LogLevel[];

const ruleDefinitionSchema = z
  .object({
    id: z.string().min(1),
    category: z.enum(RULE_CATEGORIES),
    pattern: z.string().min(1),
    flags: z
      .string()
      .regex(/^[dgimsuvy]*$/, 'Must contain only regular expression flags')
      .optional(),
    description: z.string().min(1),
    severity: z.enum(RULE_SEVERITIES),
  })
  .strict();

export const toolkitConfigSchema = z
  .object({
    source: z.string().min(1),
    security: z.enum(SECURITY_LEVELS).optional(),
    allowlist: z.array(z.string().trim().min(1)).optional(),
    timeout: z.number().positive().optional(),
    maxOutputBytes: z.number().int().positive().optional(),
    blockingSeverity: z.enum(RULE_SEVERITIES).optional(),
    extraRules: z.array(ruleDefinitionSchema).optional(),
    files: z.record(z.string().min(1), z.string()).optional(),
    env: z.record(z.string(), z.string()).optional(),
    shell: z.string().min(1).optional(),
    discoverTools: z.boolean().optional(),
    extraInstructions: z.string().optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
  })
  .strict();

/**
 * Checks the shape of a config value and the combinations that only make
 * sense together. Throws a ConfigurationError naming the first problem.
 */
export function validateConfig(config: unknown): asserts config is ToolkitConfig {
  const result = toolkitConfigSchema.safeParse(config);
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue === undefined ? '' : issue.path.map(String).join('.');
    const message = issue?.message ?? 'Invalid value';
    throw new ConfigurationError(
      field === '' ? `Invalid config: ${message}` : `Invalid config field '${field}': ${message}`,
    );
  }

  // Building an engine runs the level/allowlist and rule table checks the
  // toolkit applies at construction.
  createPolicyEngine({
    level: result.data.security ?? 'standard',
    ...(result.data.allowlist !== undefined && { allowlist: result.data.allowlist }),
    extraRules: compileRuleDefinitions(result.data.extraRules ?? []),
  });
}
