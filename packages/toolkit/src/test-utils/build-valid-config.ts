import type { ToolkitConfig } from '../config/types.ts';

export function buildValidConfig(overrides?: Partial<ToolkitConfig>): ToolkitConfig {
  return {
    source: '/workspace/project',
    ...overrides,
  };
}
