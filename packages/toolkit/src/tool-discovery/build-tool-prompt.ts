import { posix } from 'node:path';
import type { MergedEntry } from '../overlay-manager/types.ts';
import { KNOWN_TOOLS } from './known-tools.ts';
import type { ToolPromptInput } from './types.ts';

const MAX_SCANNED_ENTRIES = 1000;
const MAX_HINTS_PER_FORMAT = 2;

/**
 * Picks the files whose extensions feed the format hints: the first entries
 * of the merged view, skipping anything under a dot-directory or dot-file.
 */
export function selectPromptFiles(entries: readonly MergedEntry[]): string[] {
  return entries
    .slice(0, MAX_SCANNED_ENTRIES)
    .filter((entry) => entry.kind === 'file')
    .map((entry) => entry.path)
    .filter((path) => !path.split('/').some((part) => part.startsWith('.')));
}

/**
 * Short description of the tools available to commands, meant for an
 * agent's system prompt.
 */
export function buildToolPrompt(input: ToolPromptInput): string {
  const available = new Set(input.tools.map((tool) => tool.name));
  if (available.size === 0) {
    return input.extraInstructions ?? '';
  }

  const lines: string[] = [];

  const core = KNOWN_TOOLS.coreTools.filter((name) => available.has(name)).sort();
  if (core.length > 0) {
    lines.push(`Available tools: ${core.join(', ')}, and more`);
  }

  const special: string[] = [];
  if (available.has('jq')) {
    special.push('jq for JSON');
  }
  if (available.has('yq')) {
    special.push('yq for YAML/XML');
  }
  if (available.has('rg') || available.has('ag')) {
    special.push(`${available.has('rg') ? 'rg' : 'ag'} for fast search`);
  }
  if (special.length > 0) {
    lines.push(`Special: ${special.join(', ')}`);
  }

  const extensions = new Set(
    input.files.map((file) => posix.extname(file).toLowerCase()).filter((ext) => ext !== ''),
  );
  for (const ext of [...extensions].sort()) {
    const hints = (KNOWN_TOOLS.formatHints[ext] ?? []).filter((hint) => {
      const [tool = ''] = hint.split(' ');
      return available.has(tool) || hint.toLowerCase().includes('python');
    });
    if (hints.length > 0) {
      lines.push(`For ${ext} files: ${hints.slice(0, MAX_HINTS_PER_FORMAT).join(', ')}`);
    }
  }

  if (input.extraInstructions !== null && input.extraInstructions !== '') {
    lines.push('', input.extraInstructions);
  }

  return lines.join('\n');
}
