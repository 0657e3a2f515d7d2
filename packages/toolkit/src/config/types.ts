import type { LogLevel } from '../create-logger.ts';
import type { Rule, RuleDefinition, RuleSeverity, SecurityLevel } from '../policy-engine/types.ts';

/**
 * Toolkit configuration as written by callers or read from
 * `shellfence.config.json`. Only `source` is required.
 */
export interface ToolkitConfig {
  /** Directory the overlay is layered over. Never written to. */
  source: string;
  security?: SecurityLevel;
  /** Executable names or command prefixes; paranoid level only. */
  allowlist?: string[];
  /** Seconds a single command may run before its process group is killed. */
  timeout?: number;
  /** Characters kept from each of stdout and stderr. */
  maxOutputBytes?: number;
  blockingSeverity?: RuleSeverity;
  extraRules?: RuleDefinition[];
  /** Files written into the overlay when the toolkit opens, keyed by relative path. */
  files?: Record<string, string>;
  /** Environment for spawned commands; the parent's environment when omitted. */
  env?: Record<string, string>;
  shell?: string;
  discoverTools?: boolean;
  extraInstructions?: string;
  logLevel?: LogLevel;
}

export interface ResolvedToolkitConfig {
  source: string;
  security: SecurityLevel;
  allowlist: readonly string[] | null;
  timeoutMs: number;
  maxOutputBytes: number;
  blockingSeverity: RuleSeverity;
  extraRules: readonly Rule[];
  files: Readonly<Record<string, string>>;
  env: Readonly<Record<string, string>> | null;
  shell: string;
  discoverTools: boolean;
  extraInstructions: string | null;
  logLevel: LogLevel;
}
