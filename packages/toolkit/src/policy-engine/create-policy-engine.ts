import { ConfigurationError } from '../errors.ts';
import { DEFAULT_BLOCKING_SEVERITY, RULE_TABLE } from './constants.ts';
import { evaluateCommand } from './evaluate-command.ts';
import type { EvaluationOptions, PolicyEngine, PolicyEngineConfig, Rule } from './types.ts';

/**
 * Builds an engine bound to one security level. The rule table (built-ins
 * followed by `extraRules`) and the allowlist are frozen here; an allowlist
 * outside paranoid mode, or paranoid mode without one, is rejected up front.
 */
export function createPolicyEngine(config: PolicyEngineConfig): PolicyEngine {
  const allowlist = config.allowlist === undefined ? null : new Set(config.allowlist);

  if (config.level !== 'paranoid' && allowlist !== null) {
    throw new ConfigurationError(
      `An allowlist only applies to the paranoid security level (got '${config.level}')`,
    );
  }
  if (config.level === 'paranoid' && (allowlist === null || allowlist.size === 0)) {
    throw new ConfigurationError('The paranoid security level requires a non-empty allowlist');
  }

  const rules: readonly Rule[] = Object.freeze([...RULE_TABLE, ...(config.extraRules ?? [])]);
  assertUniqueRuleIDs(rules);

  const options: EvaluationOptions = {
    level: config.level,
    rules,
    blockingSeverity: config.blockingSeverity ?? DEFAULT_BLOCKING_SEVERITY,
    ...(allowlist !== null && { allowlist }),
  };

  return Object.freeze({
    level: config.level,
    rules,
    allowlist,
    evaluate: (command: string) => evaluateCommand(command, options),
  });
}

function assertUniqueRuleIDs(rules: readonly Rule[]): void {
  const seen = new Set<string>();
  for (const rule of rules) {
    if (seen.has(rule.id)) {
      throw new ConfigurationError(`Duplicate rule id: ${rule.id}`);
    }
    seen.add(rule.id);
  }
}
