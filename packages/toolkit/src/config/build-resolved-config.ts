import { resolve } from 'node:path';
import process from 'node:process';
import { compileRuleDefinitions } from '../policy-engine/compile-rules.ts';
import { DEFAULT_BLOCKING_SEVERITY } from '../policy-engine/constants.ts';
import type { ResolvedToolkitConfig, ToolkitConfig } from './types.ts';

const DEFAULTS = {
  security: 'standard' as const,
  timeout: 30,
  maxOutputBytes: 30_000,
  blockingSeverity: DEFAULT_BLOCKING_SEVERITY,
  shell: 'bash',
  discoverTools: true,
  logLevel: 'info' as const,
};

export interface BuildResolvedConfigOptions {
  /** Directory a relative `source` is resolved against; the working directory by default. */
  baseDir?: string;
}

export function buildResolvedConfig(
  config: ToolkitConfig,
  options?: BuildResolvedConfigOptions,
): ResolvedToolkitConfig {
  return {
    source: resolve(options?.baseDir ?? process.cwd(), config.source),
    security: config.security ?? DEFAULTS.security,
    allowlist: config.allowlist === undefined ? null : Object.freeze([...config.allowlist]),
    timeoutMs: Math.round((config.timeout ?? DEFAULTS.timeout) * 1000),
    maxOutputBytes: config.maxOutputBytes ?? DEFAULTS.maxOutputBytes,
    blockingSeverity: config.blockingSeverity ?? DEFAULTS.blockingSeverity,
    extraRules: Object.freeze(compileRuleDefinitions(config.extraRules ?? [])),
    files: Object.freeze({ ...config.files }),
    env: config.env === undefined ? null : Object.freeze({ ...config.env }),
    shell: config.shell ?? DEFAULTS.shell,
    discoverTools: config.discoverTools ?? DEFAULTS.discoverTools,
    extraInstructions: config.extraInstructions ?? null,
    logLevel: config.logLevel ?? DEFAULTS.logLevel,
  };
}
