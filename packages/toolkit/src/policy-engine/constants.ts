import type { Rule, RuleCategory, RuleSeverity, SecurityLevel } from './types.ts';

export const SECURITY_LEVELS = [
  'standard',
  'paranoid',
  'permissive',
] as const satisfies readonly SecurityLevel[];

export const RULE_CATEGORIES = [
  'filesystem',
  'rce',
  'resource',
  'privilege',
  'disk',
] as const satisfies readonly RuleCategory[];

export const RULE_SEVERITIES = [
  'low',
  'medium',
  'high',
  'critical',
] as const satisfies readonly RuleSeverity[];

export const SEVERITY_RANK: Record<RuleSeverity, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

export const DEFAULT_BLOCKING_SEVERITY: RuleSeverity = 'medium';

// Patterns run against whitespace-collapsed views of the command, so a single
// `\s` also covers runs of spaces and tabs in the original text.
export const RULE_TABLE: readonly Rule[] = Object.freeze([
  // Filesystem destruction
  {
    id: 'fs-rm-root',
    category: 'filesystem',
    pattern: /\brm\s+(?:-\S+\s+)*(?:\/|~|\$HOME|\$\{HOME\})\/?\*?(?=$|[\s;&|)])/,
    description: 'Recursive delete of root or home directory',
    severity: 'critical',
  },
  {
    id: 'fs-rm-system-dir',
    category: 'filesystem',
    pattern:
      /\brm\s+(?:-\S+\s+)*\/(?:bin|boot|dev|etc|home|lib|lib32|lib64|opt|proc|root|sbin|srv|sys|usr|var)\/?\*?(?=$|[\s;&|)])/,
    description: 'Delete of a top-level system directory',
    severity: 'critical',
  },
  {
    id: 'fs-mkfs',
    category: 'filesystem',
    pattern: /\bmkfs(?:\.[a-z0-9]+)?\b/,
    description: 'Filesystem creation/destruction',
    severity: 'critical',
  },
  {
    id: 'fs-find-delete-root',
    category: 'filesystem',
    pattern: /\bfind\s+\/\s.*\s-delete\b/,
    description: 'Bulk delete starting from the root directory',
    severity: 'high',
  },

  // Remote code execution
  {
    id: 'rce-fetch-pipe-shell',
    category: 'rce',
    pattern:
      /\b(?:curl|wget)\b.*\|\s*(?:(?:sudo|env|command|exec|nice|nohup)\s+)*(?:\S*\/)?(?:ba|z|k|da|fi)?sh\b/,
    description: 'Remote code execution via download piped into a shell',
    severity: 'critical',
  },
  {
    id: 'rce-fetch-pipe-interpreter',
    category: 'rce',
    pattern:
      /\b(?:curl|wget)\b.*\|\s*(?:(?:sudo|env|command|exec|nice|nohup)\s+)*(?:\S*\/)?(?:python[0-9.]*|perl|ruby|node|php)\b/,
    description: 'Remote code execution via download piped into an interpreter',
    severity: 'critical',
  },
  {
    id: 'rce-fetch-substitution',
    category: 'rce',
    pattern:
      /(?:\b(?:(?:ba|z|k|da)?sh\s+-c|eval)\s+\$\(|\b(?:(?:ba|z|k|da)?sh|source)\s+<\()\s*(?:curl|wget)\b/,
    description: 'Remote code execution via downloaded script substitution',
    severity: 'critical',
  },
  {
    id: 'rce-pipe-shell',
    category: 'rce',
    pattern: /\|\s*(?:(?:sudo|env|command|exec|nice|nohup)\s+)*(?:\S*\/)?(?:ba|z|k|da|fi)?sh\b/,
    description: 'Output piped into a shell interpreter',
    severity: 'high',
  },
  {
    id: 'rce-netcat',
    category: 'rce',
    pattern: /\b(?:nc|ncat|netcat)\s+(?:\S+\s+)*-[a-zA-Z]*[le][a-zA-Z]*\b/,
    description: 'Netcat listener or exec (potential backdoor)',
    severity: 'medium',
  },
  {
    id: 'rce-ssh',
    category: 'rce',
    pattern: /\bssh\s+.*@/,
    description: 'Outbound SSH connection',
    severity: 'medium',
  },

  // Resource exhaustion
  {
    id: 'res-fork-bomb',
    category: 'resource',
    pattern: /:\s*\(\s*\)\s*\{.*\}/,
    description: 'Fork bomb pattern',
    severity: 'critical',
  },
  {
    id: 'res-fork-bomb-named',
    category: 'resource',
    pattern: /\b(\w+)\s*\(\s*\)\s*\{\s*\1\s*\|\s*\1\s*&/,
    description: 'Fork bomb pattern (named function)',
    severity: 'critical',
  },
  {
    id: 'res-yes-output',
    category: 'resource',
    pattern: /(?:^|[;&|(]\s*)yes\b[^|;&]*[|>]/,
    description: 'Infinite output piped or redirected',
    severity: 'medium',
  },
  {
    id: 'res-device-generator',
    category: 'resource',
    pattern: /\bcat\s+\/dev\/(?:zero|u?random)\b/,
    description: 'Unbounded read from a generator device',
    severity: 'high',
  },
  {
    id: 'res-killall',
    category: 'resource',
    pattern: /\bkillall\b/,
    description: 'Mass process termination',
    severity: 'medium',
  },
  {
    id: 'res-pkill-kill',
    category: 'resource',
    pattern: /\bpkill\s+-(?:9|KILL)\b/,
    description: 'Forceful process termination',
    severity: 'medium',
  },

  // Privilege escalation
  {
    id: 'priv-sudo',
    category: 'privilege',
    pattern: /\bsudo\b/,
    description: 'Privilege escalation via sudo',
    severity: 'high',
  },
  {
    id: 'priv-su',
    category: 'privilege',
    pattern: /(?:^|[;&|(]\s*)su(?=$|[\s;&|)])/,
    description: 'Privilege escalation via su',
    severity: 'high',
  },
  {
    id: 'priv-doas',
    category: 'privilege',
    pattern: /\b(?:doas|pkexec)\b/,
    description: 'Privilege escalation via doas/pkexec',
    severity: 'high',
  },
  {
    id: 'priv-chmod-777-absolute',
    category: 'privilege',
    pattern: /\bchmod\s+(?:-\S+\s+)*[0-7]*777\s+\//,
    description: 'Dangerous permission change on an absolute path',
    severity: 'high',
  },
  {
    id: 'priv-setuid',
    category: 'privilege',
    pattern: /\bchmod\s+(?:-\S+\s+)*(?:[ugoa]*\+[rwx]*s|[2467][0-7]{3})\b/,
    description: 'Setting the setuid/setgid bit',
    severity: 'high',
  },
  {
    id: 'priv-chown-recursive-absolute',
    category: 'privilege',
    pattern: /\bchown\s+-R\s+.*\s+\//,
    description: 'Recursive ownership change on an absolute path',
    severity: 'high',
  },
  {
    id: 'priv-systemctl',
    category: 'privilege',
    pattern: /\bsystemctl\s+(?:stop|disable|mask)\b/,
    description: 'Service disruption',
    severity: 'high',
  },

  // Direct disk access and root-owned writes
  {
    id: 'disk-dd-device',
    category: 'disk',
    pattern: /\bdd\b.*\bof=\/dev\/(?!null\b)/,
    description: 'Direct disk write via dd',
    severity: 'critical',
  },
  {
    id: 'disk-redirect-device',
    category: 'disk',
    pattern: />\s*\/dev\/(?:sd[a-z]|nvme\d|hd[a-z]|xvd[a-z]|vd[a-z]|mmcblk\d|disk\d)/,
    description: 'Direct block device write',
    severity: 'critical',
  },
  {
    id: 'disk-partition',
    category: 'disk',
    pattern: /\b(?:fdisk|sfdisk|parted|wipefs)\b/,
    description: 'Partition table modification',
    severity: 'high',
  },
  {
    id: 'disk-credential-write',
    category: 'disk',
    pattern: /(?:>|\btee\s+(?:-\S+\s+)*)\s*\/etc\/(?:passwd|shadow|sudoers|group)\b/,
    description: 'Write to a system credential file',
    severity: 'critical',
  },
] satisfies Rule[]);
