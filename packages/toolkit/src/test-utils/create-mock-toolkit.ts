import type { Mock } from 'vitest';
import { vi } from 'vitest';
import type { CommandResult, Toolkit } from '../toolkit/types.ts';

export interface MockToolkitResult {
  toolkit: Toolkit;
  bash: Mock<Toolkit['bash']>;
  evaluate: Mock<Toolkit['evaluate']>;
  readFile: Mock<Toolkit['readFile']>;
  writeFile: Mock<Toolkit['writeFile']>;
  listDirectory: Mock<Toolkit['listDirectory']>;
  getToolPrompt: Mock<Toolkit['getToolPrompt']>;
}

export function createMockToolkit(): MockToolkitResult {
  const bash = vi.fn<Toolkit['bash']>().mockResolvedValue(buildCommandResult());
  const evaluate = vi.fn<Toolkit['evaluate']>().mockReturnValue({
    outcome: 'allow',
    matchedRule: null,
    reason: 'No rule matched',
  });
  const readFile = vi.fn<Toolkit['readFile']>().mockResolvedValue('');
  const writeFile = vi.fn<Toolkit['writeFile']>().mockResolvedValue(undefined);
  const listDirectory = vi.fn<Toolkit['listDirectory']>().mockResolvedValue([]);
  const getToolPrompt = vi.fn<Toolkit['getToolPrompt']>().mockResolvedValue('');

  const toolkit: Toolkit = {
    getState: vi.fn<Toolkit['getState']>().mockReturnValue('open'),
    open: vi.fn<Toolkit['open']>().mockResolvedValue(undefined),
    bash,
    evaluate,
    readFile,
    writeFile,
    delete: vi.fn<Toolkit['delete']>().mockResolvedValue(undefined),
    listDirectory,
    diff: vi.fn<Toolkit['diff']>().mockReturnValue([]),
    getDiscoveredTools: vi.fn<Toolkit['getDiscoveredTools']>().mockReturnValue([]),
    getToolPrompt,
    close: vi.fn<Toolkit['close']>().mockResolvedValue(undefined),
  };

  return { toolkit, bash, evaluate, readFile, writeFile, listDirectory, getToolPrompt };
}

export function buildCommandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return {
    command: 'true',
    stdout: '',
    stderr: '',
    exitCode: 0,
    durationMs: 1,
    truncated: false,
    decision: { outcome: 'allow', matchedRule: null, reason: 'No rule matched' },
    ...overrides,
  };
}
