import { existsSync } from 'node:fs';
import { mkdtemp, readdir, readFile, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, expect, test, vi } from 'vitest';
import type { ToolkitConfig } from '../config/types.ts';
import {
  CommandTimeoutError,
  ConfigurationError,
  LifecycleError,
  PathEscapeError,
  PathNotFoundError,
  SecurityViolationError,
} from '../errors.ts';
import type { ProcessResult, RunProcess } from '../process-runner/types.ts';
import { createMockLogger } from '../test-utils/create-mock-logger.ts';
import { createToolkit, openToolkit } from './create-toolkit.ts';
import type { Toolkit, ToolkitDeps } from './types.ts';

const tempDirs: string[] = [];
const toolkits: Toolkit[] = [];

afterEach(async () => {
  await Promise.all(toolkits.splice(0).map((toolkit) => toolkit.close()));
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

async function makeTempDir(prefix: string): Promise<string> {
  const dir = await realpath(await mkdtemp(join(tmpdir(), prefix)));
  tempDirs.push(dir);
  return dir;
}

interface TestContext {
  source: string;
  shadowParent: string;
  messages: ReturnType<typeof createMockLogger>['messages'];
  build: (config?: Partial<ToolkitConfig>, deps?: ToolkitDeps) => Toolkit;
  open: (config?: Partial<ToolkitConfig>, deps?: ToolkitDeps) => Promise<Toolkit>;
}

async function setupTest(files: Record<string, string> = {}): Promise<TestContext> {
  const source = await makeTempDir('toolkit-source-');
  const shadowParent = await makeTempDir('toolkit-shadow-');
  for (const [name, content] of Object.entries(files)) {
    await writeFile(join(source, name), content);
  }
  const { logger, messages } = createMockLogger();

  function build(config: Partial<ToolkitConfig> = {}, deps: ToolkitDeps = {}): Toolkit {
    const toolkit = createToolkit(
      { source, shell: 'sh', discoverTools: false, ...config },
      { logger, tempDir: shadowParent, ...deps },
    );
    toolkits.push(toolkit);
    return toolkit;
  }

  async function open(config?: Partial<ToolkitConfig>, deps?: ToolkitDeps): Promise<Toolkit> {
    const toolkit = build(config, deps);
    await toolkit.open();
    return toolkit;
  }

  return { source, shadowParent, messages, build, open };
}

function buildResult(overrides: Partial<ProcessResult> = {}): ProcessResult {
  return {
    stdout: '',
    stderr: '',
    exitCode: 0,
    signal: null,
    timedOut: false,
    truncated: false,
    durationMs: 1,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

test('it rejects commands before the toolkit is opened', async () => {
  const { build } = await setupTest();
  const toolkit = build();

  expect(toolkit.getState()).toBe('created');
  await expect(toolkit.bash('ls')).rejects.toThrow(
    new LifecycleError('run a command', 'created'),
  );
});

test('it rejects commands after the toolkit is closed', async () => {
  const { open } = await setupTest();
  const toolkit = await open();

  await toolkit.close();

  expect(toolkit.getState()).toBe('closed');
  await expect(toolkit.bash('ls')).rejects.toBeInstanceOf(LifecycleError);
  await expect(toolkit.readFile('a.txt')).rejects.toBeInstanceOf(LifecycleError);
  expect(() => toolkit.diff()).toThrow(new LifecycleError('diff the overlay', 'closed'));
});

test('it treats repeated close calls as no-ops', async () => {
  const { open } = await setupTest();
  const toolkit = await open();

  await toolkit.close();
  await expect(toolkit.close()).resolves.toBeUndefined();
  expect(toolkit.getState()).toBe('closed');
});

test('it closes a toolkit that was never opened', async () => {
  const { build, shadowParent } = await setupTest();
  const toolkit = build();

  await toolkit.close();

  expect(toolkit.getState()).toBe('closed');
  expect(await readdir(shadowParent)).toStrictEqual([]);
});

test('it refuses to open twice', async () => {
  const { open } = await setupTest();
  const toolkit = await open();

  await expect(toolkit.open()).rejects.toThrow(new LifecycleError('open', 'open'));
});

test('it ends up closed when opening fails', async () => {
  const { build, source, shadowParent } = await setupTest();
  const toolkit = build({ source: join(source, 'missing') });

  await expect(toolkit.open()).rejects.toBeInstanceOf(PathNotFoundError);

  expect(toolkit.getState()).toBe('closed');
  expect(await readdir(shadowParent)).toStrictEqual([]);
});

test('it rejects an invalid configuration before creating anything', async () => {
  const { build } = await setupTest();

  expect(() => build({ security: 'paranoid' })).toThrow(ConfigurationError);
  expect(() => build({ security: 'standard', allowlist: ['ls'] })).toThrow(ConfigurationError);
});

test('it waits for in-flight commands before discarding the overlay', async () => {
  const { open } = await setupTest();
  const toolkit = await open();

  let finished = false;
  const pending = toolkit.bash('sleep 0.3; echo done > late.txt').then((result) => {
    finished = true;
    return result;
  });
  await toolkit.close();

  expect(finished).toBe(true);
  await expect(pending).resolves.toMatchObject({ exitCode: 0 });
  await expect(toolkit.bash('ls')).rejects.toBeInstanceOf(LifecycleError);
});

test('it opens and returns a toolkit in one call', async () => {
  const { source, shadowParent } = await setupTest();
  const { logger } = createMockLogger();

  const toolkit = await openToolkit(
    { source, shell: 'sh', discoverTools: false },
    { logger, tempDir: shadowParent },
  );
  toolkits.push(toolkit);

  expect(toolkit.getState()).toBe('open');
});

// ---------------------------------------------------------------------------
// Policy
// ---------------------------------------------------------------------------

test('it blocks a dangerous command without starting a process', async () => {
  const { open } = await setupTest();
  const runProcess = vi.fn<RunProcess>().mockResolvedValue(buildResult());
  const toolkit = await open({}, { runProcess });

  const error = await toolkit.bash('rm -rf /').catch((caught: unknown) => caught);

  expect(error).toBeInstanceOf(SecurityViolationError);
  expect(error).toMatchObject({
    code: 'SECURITY_VIOLATION',
    category: 'filesystem',
    command: 'rm -rf /',
  });
  expect(runProcess).not.toHaveBeenCalled();
});

test('it only runs allowlisted executables under the paranoid level', async () => {
  const { open } = await setupTest({ 'notes.txt': 'hello\n' });
  const toolkit = await open({ security: 'paranoid', allowlist: ['ls', 'grep'] });

  await expect(toolkit.bash('cat secrets')).rejects.toMatchObject({
    category: 'not-allowlisted',
  });
  await expect(toolkit.bash('ls | sh')).rejects.toMatchObject({ category: 'rce' });

  const result = await toolkit.bash('ls');
  expect(result.stdout).toBe('notes.txt\n');
  expect(result.decision.outcome).toBe('allow');
});

test('it runs matching commands under the permissive level and records the match', async () => {
  const { open, messages } = await setupTest();
  const runProcess = vi.fn<RunProcess>().mockResolvedValue(buildResult({ exitCode: 1 }));
  const toolkit = await open({ security: 'permissive' }, { runProcess });

  const result = await toolkit.bash('rm -rf /');

  expect(runProcess).toHaveBeenCalledTimes(1);
  expect(result.exitCode).toBe(1);
  expect(result.decision.outcome).toBe('log');
  expect(result.decision.matchedRule?.category).toBe('filesystem');
  expect(messages).toContainEqual({
    level: 'info',
    message: 'Command matched a rule and will run',
    data: { component: 'toolkit', command: 'rm -rf /', category: 'filesystem', rule: 'fs-rm-root' },
  });
});

test('it evaluates a command without running it', async () => {
  const { build } = await setupTest();
  const runProcess = vi.fn<RunProcess>();
  const toolkit = build({}, { runProcess });

  expect(toolkit.evaluate('ls -la')).toStrictEqual({
    outcome: 'allow',
    matchedRule: null,
    reason: 'No rule matched',
  });
  expect(toolkit.evaluate('sudo ls').outcome).toBe('block');
  expect(runProcess).not.toHaveBeenCalled();
});

// ---------------------------------------------------------------------------
// Commands and the overlay
// ---------------------------------------------------------------------------

test('it keeps command output in the overlay and out of the source', async () => {
  const { open, source, shadowParent } = await setupTest();
  const toolkit = await open();

  const result = await toolkit.bash('echo hi > out.txt');

  expect(result).toStrictEqual({
    command: 'echo hi > out.txt',
    stdout: '',
    stderr: '',
    exitCode: 0,
    durationMs: result.durationMs,
    truncated: false,
    decision: { outcome: 'allow', matchedRule: null, reason: 'No rule matched' },
  });
  expect(Object.isFrozen(result)).toBe(true);
  expect(await toolkit.readFile('out.txt')).toBe('hi\n');
  expect(existsSync(join(source, 'out.txt'))).toBe(false);

  await toolkit.close();

  expect(await readdir(shadowParent)).toStrictEqual([]);
  expect(await readdir(source)).toStrictEqual([]);
});

test('it captures modifications and deletions made by commands', async () => {
  const { open, source } = await setupTest({ 'notes.txt': 'one\n', 'old.txt': 'old\n' });
  const toolkit = await open();

  await toolkit.bash('echo two >> notes.txt && rm old.txt && mkdir build');

  expect(await toolkit.readFile('notes.txt')).toBe('one\ntwo\n');
  expect(await readFile(join(source, 'notes.txt'), 'utf8')).toBe('one\n');
  expect(await readFile(join(source, 'old.txt'), 'utf8')).toBe('old\n');
  expect(toolkit.diff()).toStrictEqual([
    { path: 'build', change: 'added', kind: 'directory' },
    { path: 'notes.txt', change: 'modified', kind: 'file' },
    { path: 'old.txt', change: 'deleted', kind: 'file' },
  ]);
});

test('it shows overlay changes to later commands', async () => {
  const { open } = await setupTest({ 'a.txt': 'a\n', 'b.txt': 'b\n' });
  const toolkit = await open();

  await toolkit.delete('a.txt');
  await toolkit.writeFile('c.txt', 'c\n');
  const result = await toolkit.bash('ls; cat c.txt');

  expect(result.stdout).toBe('b.txt\nc.txt\nc\n');
  expect((await toolkit.listDirectory()).map((entry) => entry.name)).toStrictEqual([
    'b.txt',
    'c.txt',
  ]);
});

test('it reports a non-zero exit status as data', async () => {
  const { open } = await setupTest();
  const toolkit = await open();

  const result = await toolkit.bash('echo failing >&2; exit 4');

  expect(result.exitCode).toBe(4);
  expect(result.stderr).toBe('failing\n');
});

test('it keeps partial writes when a command times out', async () => {
  const { open } = await setupTest();
  const toolkit = await open();

  const error = await toolkit
    .bash('echo partial > partial.txt; echo started; sleep 5', { timeout: 0.3 })
    .catch((caught: unknown) => caught);

  expect(error).toBeInstanceOf(CommandTimeoutError);
  expect(error).toMatchObject({ kind: 'timeout', timeoutMs: 300, stdout: 'started\n' });
  expect(await toolkit.readFile('partial.txt')).toBe('partial\n');
});

test.each([[0], [-1], [Number.NaN], [Number.POSITIVE_INFINITY]])(
  'it rejects the per-command timeout %s before running anything',
  async (timeout) => {
    const { open } = await setupTest();
    const runProcess = vi.fn<RunProcess>();
    const toolkit = await open({}, { runProcess });

    await expect(toolkit.bash('echo hi', { timeout })).rejects.toThrow(
      new ConfigurationError(
        `Invalid bash option 'timeout': expected a positive number of seconds, got ${timeout}`,
      ),
    );
    expect(runProcess).not.toHaveBeenCalled();
  },
);

test('it truncates long output', async () => {
  const { open } = await setupTest();
  const toolkit = await open({ maxOutputBytes: 10 });

  const result = await toolkit.bash('printf 0123456789abcdef');

  expect(result.truncated).toBe(true);
  expect(result.stdout).toBe('0123456789\n\n[Truncated: 6 characters removed]');
});

test('it writes inline files into the overlay on open', async () => {
  const { open, source } = await setupTest();
  const toolkit = await open({ files: { 'notes/todo.md': '# todo\n' } });

  expect(await toolkit.readFile('notes/todo.md')).toBe('# todo\n');
  expect((await toolkit.bash('cat notes/todo.md')).stdout).toBe('# todo\n');
  expect(existsSync(join(source, 'notes'))).toBe(false);
});

test('it rejects file paths outside the source root', async () => {
  const { open } = await setupTest();
  const toolkit = await open();

  await expect(toolkit.readFile('../../etc/passwd')).rejects.toBeInstanceOf(PathEscapeError);
  await expect(toolkit.writeFile('/etc/passwd', 'x')).rejects.toBeInstanceOf(PathEscapeError);
});

// ---------------------------------------------------------------------------
// Tool discovery
// ---------------------------------------------------------------------------

test('it discovers tools once on open and builds the tool prompt', async () => {
  const { open } = await setupTest({ 'data.json': '{}' });
  const runProcess = vi
    .fn<RunProcess>()
    .mockResolvedValue(buildResult({ stdout: '/usr/bin/grep\n/usr/bin/jq\n' }));
  const toolkit = await open({ discoverTools: true, extraInstructions: 'Prefer jq.' }, { runProcess });

  expect(runProcess).toHaveBeenCalledTimes(1);
  expect(toolkit.getDiscoveredTools().map((tool) => tool.name)).toStrictEqual(['grep', 'jq']);
  expect(await toolkit.getToolPrompt()).toBe(
    [
      'Available tools: grep, and more',
      'Special: jq for JSON',
      "For .json files: jq, python3 -c 'import json...'",
      '',
      'Prefer jq.',
    ].join('\n'),
  );
  expect(runProcess).toHaveBeenCalledTimes(1);
});

test('it opens without tools when discovery fails', async () => {
  const { open, messages } = await setupTest();
  const runProcess = vi.fn<RunProcess>().mockRejectedValue(new Error('probe failed'));
  const toolkit = await open({ discoverTools: true }, { runProcess });

  expect(toolkit.getState()).toBe('open');
  expect(toolkit.getDiscoveredTools()).toStrictEqual([]);
  expect(messages).toContainEqual({
    level: 'info',
    message: 'Tool discovery failed',
    data: { component: 'toolkit', error: 'probe failed' },
  });
});
