export { createBashPolicyHook } from './adapters/create-bash-policy-hook.ts';
export { createToolDefinitions } from './adapters/create-tool-definitions.ts';
export { buildResolvedConfig } from './config/build-resolved-config.ts';
export { DEFAULT_CONFIG_FILENAME, loadConfig } from './config/load-config.ts';
export { toolkitConfigSchema, validateConfig } from './config/validate-config.ts';
export { createLogger } from './create-logger.ts';
export {
  CommandTimeoutError,
  ConfigurationError,
  ExecutionError,
  LifecycleError,
  OverlayIOError,
  PathEscapeError,
  PathNotFoundError,
  SecurityViolationError,
  ShellfenceError,
} from './errors.ts';
export { createOverlayManager } from './overlay-manager/create-overlay-manager.ts';
export { compileRuleDefinitions } from './policy-engine/compile-rules.ts';
export {
  DEFAULT_BLOCKING_SEVERITY,
  RULE_CATEGORIES,
  RULE_SEVERITIES,
  RULE_TABLE,
  SECURITY_LEVELS,
} from './policy-engine/constants.ts';
export { createPolicyEngine } from './policy-engine/create-policy-engine.ts';
export { evaluateCommand, findMatchingRules } from './policy-engine/evaluate-command.ts';
export { createProcessRunner } from './process-runner/create-process-runner.ts';
export { buildToolPrompt } from './tool-discovery/build-tool-prompt.ts';
export { assertCommandSucceeded } from './toolkit/assert-command-succeeded.ts';
export { createToolkit, openToolkit } from './toolkit/create-toolkit.ts';

export type {
  // Adapters
  ToolDefinition,
  ToolDefinitions,
  ToolName,
} from './adapters/types.ts';
export type {
  // Configuration
  ResolvedToolkitConfig,
  ToolkitConfig,
} from './config/types.ts';
export type { Logger, LogLevel } from './create-logger.ts';
export type { ErrorCode, ExecutionErrorKind } from './errors.ts';
export type {
  // Overlay
  ChangeKind,
  DirectoryEntry,
  EntryKind,
  OverlayChange,
  OverlayManager,
  OverlayManagerConfig,
  OverlayState,
} from './overlay-manager/types.ts';
export type {
  // Policy
  AllowDecision,
  BlockDecision,
  LogDecision,
  PolicyDecision,
  PolicyEngine,
  PolicyEngineConfig,
  Rule,
  RuleCategory,
  RuleDefinition,
  RuleSeverity,
  SecurityLevel,
  ViolationCategory,
} from './policy-engine/types.ts';
export type {
  // Process execution
  ProcessResult,
  ProcessRunner,
  RunProcess,
  RunProcessOptions,
} from './process-runner/types.ts';
export type { DiscoveredTool } from './tool-discovery/types.ts';
export type {
  // Toolkit
  BashOptions,
  CommandResult,
  Toolkit,
  ToolkitDeps,
  ToolkitState,
} from './toolkit/types.ts';
