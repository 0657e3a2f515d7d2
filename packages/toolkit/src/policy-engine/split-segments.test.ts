import { expect, test } from 'vitest';
import { extractInvocation, findRedirection, splitSegments } from './split-segments.ts';

// ── splitSegments ───────────────────────────────────────────────────────────

test('it returns one segment for a simple command', () => {
  expect(splitSegments('ls -la')).toStrictEqual(['ls -la']);
});

test('it splits on pipes, logical operators and semicolons', () => {
  expect(splitSegments('ls | grep a && cat b || echo c; pwd')).toStrictEqual([
    'ls ',
    ' grep a ',
    ' cat b ',
    ' echo c',
    ' pwd',
  ]);
});

test('it splits on a background ampersand and newlines', () => {
  expect(splitSegments('sleep 1 & echo done\nls')).toStrictEqual(['sleep 1 ', ' echo done', 'ls']);
});

test('it does not split on the ampersand of a redirection', () => {
  expect(splitSegments('make 2>&1 | tee log &> out')).toStrictEqual(['make 2>&1 ', ' tee log &> out']);
});

test('it does not split on operators inside quotes', () => {
  expect(splitSegments(`echo 'a | b' "c && d"`)).toStrictEqual([`echo 'a | b' "c && d"`]);
});

test('it splits at command substitution even inside double quotes', () => {
  expect(splitSegments('echo "$(cat secrets)"')).toStrictEqual(['echo "', 'cat secrets)"']);
});

test('it splits at backticks and subshell parentheses', () => {
  expect(splitSegments('echo `whoami`; (cd src)')).toStrictEqual(['echo ', 'whoami', 'cd src']);
});

test('it keeps an escaped separator inside the segment', () => {
  expect(splitSegments('find . -exec grep x {} \\;')).toStrictEqual(['find . -exec grep x {} \\;']);
});

test('it lets a backslash escape a quote inside an ANSI-C string', () => {
  expect(splitSegments("echo $'\\'' ; cat secrets ; echo ''")).toStrictEqual([
    "echo $'\\'' ",
    ' cat secrets ',
    " echo ''",
  ]);
});

test('it does not split on operators inside an ANSI-C string', () => {
  expect(splitSegments("echo $'a;b' | wc")).toStrictEqual(["echo $'a;b' ", ' wc']);
});

// ── extractInvocation ───────────────────────────────────────────────────────

test('it reports the first word as the executable', () => {
  expect(extractInvocation(' grep -r todo .')).toStrictEqual({
    executable: 'grep',
    words: ['grep', '-r', 'todo', '.'],
  });
});

test('it reduces an absolute executable path to its basename', () => {
  expect(extractInvocation('/bin/ls -la')?.executable).toBe('ls');
});

test('it skips leading environment variable assignments', () => {
  expect(extractInvocation('FOO=bar LANG=C ls -la')?.executable).toBe('ls');
});

test('it skips leading redirections', () => {
  expect(extractInvocation('2>/dev/null ls')?.executable).toBe('ls');
  expect(extractInvocation('> out.txt echo hi')?.executable).toBe('echo');
});

test('it skips a leading negation', () => {
  expect(extractInvocation('! grep -q x file')?.executable).toBe('grep');
});

test('it dequotes the executable name', () => {
  expect(extractInvocation(`"c"at secrets`)?.executable).toBe('cat');
});

test('it returns null for a segment that only assigns variables', () => {
  expect(extractInvocation('FOO=bar')).toBeNull();
});

// ── findRedirection ─────────────────────────────────────────────────────────

test('it reports the operator of a detached redirection', () => {
  expect(findRedirection('> notes.txt')).toBe('>');
});

test('it reports the operator of a redirection attached to its target', () => {
  expect(findRedirection('2>>log.txt')).toBe('2>>');
  expect(findRedirection('&>out.txt')).toBe('&>');
});

test('it returns null for a segment without a redirection', () => {
  expect(findRedirection('ls -la')).toBeNull();
});
