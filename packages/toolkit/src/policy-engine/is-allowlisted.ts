import { collapseWhitespace } from './normalize-command.ts';
import type { Invocation } from './split-segments.ts';

/**
 * An entry is either a single command name (`grep`, or an exact path such as
 * `./scripts/check.sh`) or a multi-word prefix (`git status`) that the
 * invocation's leading words must equal.
 */
export function isAllowlisted(invocation: Invocation, allowlist: ReadonlySet<string>): boolean {
  for (const entry of allowlist) {
    const entryWords = collapseWhitespace(entry).split(' ');
    const [head, ...rest] = entryWords;
    if (head === undefined || head === '') {
      continue;
    }
    if (head !== invocation.executable && head !== invocation.words[0]) {
      continue;
    }
    if (rest.every((word, index) => invocation.words[index + 1] === word)) {
      return true;
    }
  }
  return false;
}
