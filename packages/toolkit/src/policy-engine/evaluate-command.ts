import invariant from 'tiny-invariant';
import { match } from 'ts-pattern';
import { SEVERITY_RANK } from './constants.ts';
import { isAllowlisted } from './is-allowlisted.ts';
import { buildMatchViews } from './normalize-command.ts';
import type { Invocation } from './split-segments.ts';
import { extractInvocation, findRedirection, splitSegments } from './split-segments.ts';
import type { EvaluationOptions, PolicyDecision, Rule } from './types.ts';

const NO_MATCH: PolicyDecision = { outcome: 'allow', matchedRule: null, reason: 'No rule matched' };

const EMPTY_ALLOWLIST: ReadonlySet<string> = new Set();

type MatchAction = 'block' | 'log';

/**
 * Classifies a command. Pure: no process is spawned and nothing on disk is
 * touched, so the same inputs always produce the same decision.
 */
export function evaluateCommand(command: string, options: EvaluationOptions): PolicyDecision {
  if (command.trim() === '') {
    return NO_MATCH;
  }

  return match(options.level)
    .with('standard', () => classifyRuleMatches(command, options, 'block'))
    .with('permissive', () => classifyRuleMatches(command, options, 'log'))
    .with('paranoid', () => evaluateParanoid(command, options))
    .exhaustive();
}

export function findMatchingRules(command: string, rules: readonly Rule[]): Rule[] {
  const views = buildMatchViews(command);
  return rules.filter((rule) => views.some((view) => rule.pattern.test(view)));
}

// The leading executable must be allowlisted before anything else is looked
// at. Rule matching still runs for allowlisted commands, so `grep x | sh` is
// blocked by a pattern even though grep is listed. Executables in later
// segments (after a pipe, `&&`, `;` or inside `$(...)`) must be listed too.
// A segment that only redirects (`> notes.txt`) writes without running
// anything, and is checked as if its operator were the executable.
function evaluateParanoid(command: string, options: EvaluationOptions): PolicyDecision {
  const allowlist = options.allowlist ?? EMPTY_ALLOWLIST;
  const invocations = splitSegments(command)
    .map(toCheckedInvocation)
    .filter((invocation): invocation is Invocation => invocation !== null);
  const [leading, ...rest] = invocations;

  if (leading !== undefined && !isAllowlisted(leading, allowlist)) {
    return buildNotAllowlisted(leading);
  }

  const ruleDecision = classifyRuleMatches(command, options, 'block');
  if (ruleDecision.outcome === 'block') {
    return ruleDecision;
  }

  const rejected = rest.find((invocation) => !isAllowlisted(invocation, allowlist));
  if (rejected !== undefined) {
    return buildNotAllowlisted(rejected);
  }

  return ruleDecision;
}

function toCheckedInvocation(segment: string): Invocation | null {
  const invocation = extractInvocation(segment);
  if (invocation !== null) {
    return invocation;
  }
  const redirection = findRedirection(segment);
  return redirection === null ? null : { executable: redirection, words: [redirection] };
}

function buildNotAllowlisted(invocation: Invocation): PolicyDecision {
  return {
    outcome: 'block',
    category: 'not-allowlisted',
    matchedRule: null,
    reason: `Blocked: '${invocation.executable}' is not allowlisted`,
  };
}

function classifyRuleMatches(
  command: string,
  options: EvaluationOptions,
  action: MatchAction,
): PolicyDecision {
  const matches = findMatchingRules(command, options.rules);
  if (matches.length === 0) {
    return NO_MATCH;
  }

  const threshold = SEVERITY_RANK[options.blockingSeverity];
  const blocking = matches.find((rule) => SEVERITY_RANK[rule.severity] >= threshold);

  if (blocking !== undefined && action === 'block') {
    return {
      outcome: 'block',
      category: blocking.category,
      matchedRule: blocking,
      reason: `Blocked: ${blocking.description} (pattern '${blocking.pattern.source}')`,
    };
  }

  const recorded = blocking ?? matches[0];
  invariant(recorded !== undefined, 'at least one rule matched');
  return {
    outcome: 'log',
    matchedRule: recorded,
    reason: `Logged: ${recorded.description} (pattern '${recorded.pattern.source}')`,
  };
}
