import { posix } from 'node:path';
import { KNOWN_TOOLS } from './known-tools.ts';
import type { DiscoveredTool, DiscoverToolsOptions } from './types.ts';

const PROBE_TIMEOUT_MS = 10_000;
const PROBE_MAX_OUTPUT = 100_000;

export function buildProbeCommand(names: readonly string[]): string {
  return names.map((name) => `command -v ${name} 2>/dev/null;`).join(' ');
}

/**
 * Checks which known tools the shell can find, with a single `command -v`
 * probe. Builtins and missing tools are left out. Rejects only when the probe
 * itself cannot run.
 */
export async function discoverTools(options: DiscoverToolsOptions): Promise<DiscoveredTool[]> {
  const names = Object.keys(KNOWN_TOOLS.tools);
  const result = await options.runProcess({
    command: buildProbeCommand(names),
    cwd: options.cwd,
    env: options.env,
    timeoutMs: PROBE_TIMEOUT_MS,
    maxOutputBytes: PROBE_MAX_OUTPUT,
  });

  const found = new Map<string, DiscoveredTool>();
  for (const line of result.stdout.split('\n')) {
    const path = line.trim();
    if (!path.includes('/')) {
      continue;
    }
    const name = posix.basename(path);
    const description = KNOWN_TOOLS.tools[name];
    if (description !== undefined && !found.has(name)) {
      found.set(name, { name, description, path });
    }
  }

  const tools = [...found.values()].sort((a, b) => a.name.localeCompare(b.name));
  options.logger.debug('Discovered tools', { count: tools.length, timedOut: result.timedOut });
  return tools;
}
