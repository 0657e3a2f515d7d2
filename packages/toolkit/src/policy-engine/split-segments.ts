import { basename } from 'node:path';
import invariant from 'tiny-invariant';
import { collapseWhitespace, dequoteCommand } from './normalize-command.ts';

export interface Invocation {
  executable: string;
  words: string[];
}

const ENV_ASSIGNMENT_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*=/;
const REDIRECT_OPERATOR_PATTERN = /^\d*(?:>>?|<<?|&>>?|>&|<&)$/;
const ATTACHED_REDIRECT_PATTERN = /^\d*(?:>>?|<|&>>?|>&|<&)\S/;
const REDIRECT_PREFIX_PATTERN = /^\d*(?:&>>?|>&|<&|>>?|<<?)/;
const PREFIX_KEYWORDS: Set<string> = new Set(['!', 'then', 'do', 'else', 'elif']);

// Quote-aware command segmentation. Splits on &&, ||, |&, |, ;, &, newlines,
// subshell parentheses, $( and backticks. Single-quoted strings are literal;
// in ANSI-C strings ($'...') a backslash escapes the next character, `\'`
// included. Inside double quotes only $( and backticks split, since command
// substitution still runs there. `&` that belongs to a redirection (2>&1, &>)
// is not a separator.
export function splitSegments(command: string): string[] {
  const segments: string[] = [];
  let current = '';
  let quote = '';
  let i = 0;

  function cut(): void {
    segments.push(current);
    current = '';
  }

  while (i < command.length) {
    const c = command[i];
    invariant(c !== undefined, 'index within bounds of command string');
    const next = command[i + 1];

    if (quote === "'") {
      if (c === "'") {
        quote = '';
      }
      current += c;
      i += 1;
    } else if (quote === "$'") {
      if (c === '\\' && next !== undefined) {
        current += c + next;
        i += 2;
      } else {
        if (c === "'") {
          quote = '';
        }
        current += c;
        i += 1;
      }
    } else if (quote === '"') {
      if (c === '\\' && next !== undefined) {
        current += c + next;
        i += 2;
      } else if (c === '$' && next === '(') {
        cut();
        i += 2;
      } else if (c === '`') {
        cut();
        i += 1;
      } else {
        if (c === '"') {
          quote = '';
        }
        current += c;
        i += 1;
      }
    } else if (c === '$' && next === "'") {
      quote = "$'";
      current += c + next;
      i += 2;
    } else if (c === '"' || c === "'") {
      quote = c;
      current += c;
      i += 1;
    } else if (c === '\\' && next !== undefined) {
      current += c + next;
      i += 2;
    } else if (isTwoCharOperator(c, next)) {
      cut();
      i += 2;
    } else if (c === '$' && next === '(') {
      cut();
      i += 2;
    } else if (c === '&' && isRedirectAmpersand(command, i)) {
      current += c;
      i += 1;
    } else if (isSingleCharOperator(c)) {
      cut();
      i += 1;
    } else {
      current += c;
      i += 1;
    }
  }

  if (current !== '') {
    segments.push(current);
  }

  return segments.filter((segment) => segment.trim() !== '');
}

function isTwoCharOperator(c: string, next: string | undefined): boolean {
  if (next === undefined) {
    return false;
  }
  const twoChar = c + next;
  return twoChar === '&&' || twoChar === '||' || twoChar === '|&';
}

function isSingleCharOperator(c: string): boolean {
  return c === '|' || c === ';' || c === '&' || c === '\n' || c === '(' || c === ')' || c === '`';
}

function isRedirectAmpersand(command: string, index: number): boolean {
  const previous = command[index - 1];
  const next = command[index + 1];
  return previous === '>' || previous === '<' || next === '>';
}

/**
 * Finds the program a segment runs: skips leading variable assignments,
 * redirections and the `!`/`then`/`do` style keywords, and reports the
 * basename of the first remaining word along with the words from there on.
 * Returns null for a segment that runs nothing.
 */
export function extractInvocation(segment: string): Invocation | null {
  const words = splitWords(segment);

  let index = 0;
  while (index < words.length) {
    const word = words[index];
    invariant(word !== undefined, 'index within bounds of words');

    if (ENV_ASSIGNMENT_PATTERN.test(word) || PREFIX_KEYWORDS.has(word)) {
      index += 1;
    } else if (REDIRECT_OPERATOR_PATTERN.test(word)) {
      index += 2;
    } else if (ATTACHED_REDIRECT_PATTERN.test(word)) {
      index += 1;
    } else {
      const rest = words.slice(index);
      return { executable: basename(word), words: rest };
    }
  }

  return null;
}

/**
 * Returns the operator of the first redirection in a segment (`>`, `2>>`,
 * `&>`), or null when the segment redirects nothing.
 */
export function findRedirection(segment: string): string | null {
  for (const word of splitWords(segment)) {
    if (REDIRECT_OPERATOR_PATTERN.test(word) || ATTACHED_REDIRECT_PATTERN.test(word)) {
      const operator = REDIRECT_PREFIX_PATTERN.exec(word);
      return operator === null ? word : operator[0];
    }
  }
  return null;
}

function splitWords(segment: string): string[] {
  return collapseWhitespace(dequoteCommand(segment))
    .split(/\s+/)
    .filter((word) => word !== '');
}
