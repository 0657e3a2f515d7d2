import invariant from 'tiny-invariant';

const LINE_CONTINUATION_PATTERN = /\\\r?\n/g;
const IFS_PATTERN = /\$\{IFS\}|\$IFS(?![A-Za-z0-9_])/g;
const HORIZONTAL_WHITESPACE_PATTERN = /[ \t\f\v\r]+/g;
const DOUBLE_QUOTE_ESCAPABLE = '"\\$`';

/**
 * Builds the views of a command that rule patterns are matched against: the
 * raw text and a dequoted copy, both with line continuations joined, `$IFS`
 * expanded to a space and whitespace runs collapsed. Matching either view is a
 * match.
 *
 * This undoes simple obfuscation (split quoting such as `r''m`, backslash
 * escapes, doubled spaces). It is a heuristic and does not decode base64,
 * variables or any other encoding.
 */
export function buildMatchViews(command: string): string[] {
  const base = command.replace(LINE_CONTINUATION_PATTERN, '').replace(IFS_PATTERN, ' ');
  const raw = collapseWhitespace(base);
  const dequoted = collapseWhitespace(dequoteCommand(base));
  return raw === dequoted ? [raw] : [raw, dequoted];
}

export function collapseWhitespace(text: string): string {
  return text.replace(HORIZONTAL_WHITESPACE_PATTERN, ' ').trim();
}

// Removes shell quoting the way the shell would before running the command.
// Single-quoted content is literal. In ANSI-C ($'...') content a backslash
// escapes the next character, so `\'` does not end the string; escape
// sequences such as \n are kept as the bare letter. Double-quoted content
// keeps everything except escapes of " \ $ and `, and an unquoted backslash
// escapes the next character. An unterminated quote runs to the end.
export function dequoteCommand(command: string): string {
  const result: string[] = [];
  let quote = '';
  let i = 0;

  while (i < command.length) {
    const c = command[i];
    invariant(c !== undefined, 'index within bounds of command string');
    const next = command[i + 1];

    if (quote === "'") {
      if (c === "'") {
        quote = '';
      } else {
        result.push(c);
      }
      i += 1;
    } else if (quote === "$'") {
      if (c === '\\' && next !== undefined) {
        result.push(next);
        i += 2;
      } else {
        if (c === "'") {
          quote = '';
        } else {
          result.push(c);
        }
        i += 1;
      }
    } else if (quote === '"') {
      if (c === '\\' && next !== undefined && DOUBLE_QUOTE_ESCAPABLE.includes(next)) {
        result.push(next);
        i += 2;
      } else {
        if (c === '"') {
          quote = '';
        } else {
          result.push(c);
        }
        i += 1;
      }
    } else if (c === '\\' && next !== undefined) {
      result.push(next);
      i += 2;
    } else if (c === '$' && next === "'") {
      quote = "$'";
      i += 2;
    } else if (c === "'" || c === '"') {
      quote = c;
      i += 1;
    } else {
      result.push(c);
      i += 1;
    }
  }

  return result.join('');
}
