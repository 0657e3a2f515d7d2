import { ConfigurationError } from '../errors.ts';
import type { Rule, RuleDefinition } from './types.ts';

// Stateful flags would make RegExp.test depend on previous calls.
const STATEFUL_FLAGS_PATTERN = /[gy]/g;

export function compileRuleDefinitions(definitions: readonly RuleDefinition[]): Rule[] {
  return definitions.map((definition) => {
    const flags = (definition.flags ?? '').replace(STATEFUL_FLAGS_PATTERN, '');
    let pattern: RegExp;
    try {
      pattern = new RegExp(definition.pattern, flags);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Invalid pattern for rule '${definition.id}': ${message}`);
    }
    return Object.freeze({
      id: definition.id,
      category: definition.category,
      pattern,
      description: definition.description,
      severity: definition.severity,
    });
  });
}
