export type SecurityLevel = 'standard' | 'paranoid' | 'permissive';

export type RuleCategory = 'filesystem' | 'rce' | 'resource' | 'privilege' | 'disk';

export type RuleSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Category carried by a block: the matched rule's category, or
 * `not-allowlisted` when a paranoid allowlist rejected the executable.
 */
export type ViolationCategory = RuleCategory | 'not-allowlisted';

export interface Rule {
  readonly id: string;
  readonly category: RuleCategory;
  readonly pattern: RegExp;
  readonly description: string;
  readonly severity: RuleSeverity;
}

/**
 * Serializable form of a rule, as it appears in config files.
 */
export interface RuleDefinition {
  id: string;
  category: RuleCategory;
  pattern: string;
  flags?: string;
  description: string;
  severity: RuleSeverity;
}

export interface AllowDecision {
  outcome: 'allow';
  matchedRule: null;
  reason: string;
}

export interface LogDecision {
  outcome: 'log';
  matchedRule: Rule;
  reason: string;
}

export interface BlockDecision {
  outcome: 'block';
  category: ViolationCategory;
  matchedRule: Rule | null;
  reason: string;
}

export type PolicyDecision = AllowDecision | LogDecision | BlockDecision;

export interface EvaluationOptions {
  level: SecurityLevel;
  rules: readonly Rule[];
  blockingSeverity: RuleSeverity;
  allowlist?: ReadonlySet<string>;
}

export interface PolicyEngineConfig {
  level: SecurityLevel;
  blockingSeverity?: RuleSeverity;
  allowlist?: Iterable<string>;
  extraRules?: readonly Rule[];
}

export interface PolicyEngine {
  readonly level: SecurityLevel;
  readonly rules: readonly Rule[];
  readonly allowlist: ReadonlySet<string> | null;
  evaluate: (command: string) => PolicyDecision;
}
