/**
 * Command classification for shell-running tools.
 *
 * Two tiers besides "free":
 * - BLOCKED: never runs. Privilege escalation, system package mutation and
 *   machine-wrecking commands. No flag overrides it.
 * - CONFIRM: destructive but legitimate (rm -rf build/, git push --force).
 *   Runs only when the tool call carries `confirm: true`.
 *
 * Patterns are matched against the whole normalised command line, so they hit
 * regardless of the shell syntax around them (`;`, `&&`, `$(...)`, quoting,
 * `bash -c "..."`, absolute binary paths).
 *
 * User additions come from `<config dir>/safety.json` and the `safety` config
 * key; both are compiled into a CommandPolicy instance, never module state.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import type { Logger } from './log.js';
import type { SafetyConfig } from './types.js';
import { configDir, errorCode, isRecord } from './utils.js';

export type Pattern = { re: RegExp; reason: string };

// Word boundary that also treats `/` (absolute binary paths), quotes, `\` and brace lists as separators.
const B = String.raw`(?:^|[\s;&|()\`'"/=$\\{},])`;

function cmd(word: string, rest = ''): RegExp {
  return new RegExp(`${B}${word}\\b${rest}`);
}

// ──────────────────────────────────────────────────────
// Blocked patterns: never run
// ──────────────────────────────────────────────────────

export const BLOCKED_PATTERNS: Pattern[] = [
  // Privilege escalation
  { re: cmd('sudo'), reason: 'sudo (privilege escalation)' },
  { re: cmd('doas'), reason: 'doas (privilege escalation)' },
  { re: cmd('pkexec'), reason: 'pkexec (privilege escalation)' },
  { re: cmd('su', String.raw`(\s+-\S*)*(\s+root\b|\s+-\s|\s+-$|$)`), reason: 'su (privilege escalation)' },

  // System package managers
  {
    re: cmd('(apt|apt-get|aptitude)', String.raw`(\s+-\S+)*\s+(install|remove|purge|autoremove|upgrade|dist-upgrade|full-upgrade|reinstall)\b`),
    reason: 'system package install/remove',
  },
  {
    re: cmd('(dnf|yum|zypper)', String.raw`(\s+-\S+)*\s+(install|remove|erase|upgrade|update|reinstall|in|rm|up)\b`),
    reason: 'system package install/remove',
  },
  { re: cmd('apk', String.raw`(\s+-\S+)*\s+(add|del|upgrade)\b`), reason: 'system package install/remove' },
  { re: cmd('pacman', String.raw`\s+(-\S*\s+)*-[SRU]\w*`), reason: 'system package install/remove' },
  { re: cmd('(snap|flatpak)', String.raw`\s+(install|remove|refresh|uninstall)\b`), reason: 'system package install/remove' },
  { re: cmd('(brew|port)', String.raw`\s+(install|uninstall|remove|upgrade|reinstall)\b`), reason: 'system package install/remove' },
  { re: cmd('rpm', String.raw`\s+(-\S*\s+)*-(i|e|U|F)\w*`), reason: 'system package install/remove' },
  { re: cmd('dpkg', String.raw`\s+(-\S*\s+)*(-i|-r|-P|--install|--remove|--purge)\b`), reason: 'system package install/remove' },

  // Wipe root / home / system directories
  { re: /\brm\s+(-\w*\s+)*(\/|\/\*)(\s|$)/, reason: 'rm targeting /' },
  {
    re: /\brm\s+(-\w*\s+)*\/(boot|etc|usr|lib|lib64|sbin|bin|var|sys|proc|dev|root|home)\/?(\s|$)/,
    reason: 'rm targeting system directory',
  },
  { re: /\brm\s+(-\w*[rf]\w*\s+)+(~|\$HOME)\/?(\s|$)/, reason: 'rm targeting home directory' },

  // Block device / partition destruction
  { re: /\bdd\b.*\bof\s*=\s*\/dev\//, reason: 'dd writing to block device' },
  { re: /\bmkfs(\.\w+)?\b/, reason: 'mkfs (filesystem creation)' },
  { re: /\b(fdisk|sfdisk|parted|wipefs)\b/, reason: 'partition table modification' },

  // Recursive permission nuke
  { re: /\bchmod\s+(-\w*R\w*\s+)*(0?777|a\+rwx)\s+\/\s*$/, reason: 'chmod 777 /' },
  { re: /\bchown\s+(-\w*R\w*\s+).*\s+\/\s*$/, reason: 'chown targeting /' },

  // Fork bomb
  { re: /:\s*\(\s*\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/, reason: 'fork bomb' },

  // Direct passwd/shadow manipulation
  { re: />\s*\/etc\/(passwd|shadow|sudoers)\b/, reason: 'overwriting system account files' },

  // System shutdown/reboot
  { re: /\b(shutdown|reboot|poweroff|halt)\b|\binit\s+[06]\b/, reason: 'system shutdown/reboot' },

  // Remote history overwrite
  { re: /\bgit\s+push\s+.*--mirror\b/, reason: 'git mirror push (overwrites remote)' },
];

// ──────────────────────────────────────────────────────
// Confirm patterns: destructive, need confirm=true
// ──────────────────────────────────────────────────────

export const CONFIRM_PATTERNS: Pattern[] = [
  { re: /\brm\s+(-\w*\s+)*-\w*[rRf]/, reason: 'rm with -r or -f flags' },
  { re: /\bgit\s+push\b.*\s(--force(-with-lease)?|-f)\b/, reason: 'git force push' },
  { re: /\bgit\s+reset\s+.*--hard\b|\bgit\s+reset\s+--hard\b/, reason: 'git reset --hard' },
  { re: /\bgit\s+clean\s+-\w*[fdx]/, reason: 'git clean (removes untracked files)' },
  { re: /\bgit\s+checkout\s+(--\s+\S+|\.)/, reason: 'git checkout (discards local changes)' },
  { re: /\bgit\s+branch\s+-D\b/, reason: 'git branch -D' },
  { re: /\b(pip3?|python3?\s+-m\s+pip)\s+(install|uninstall)\b/, reason: 'pip install/uninstall' },
  { re: /\bnpm\s+(install|i|uninstall|rm)\s+(.*\s)?(-g|--global)\b/, reason: 'global npm install/uninstall' },
  { re: /\bdocker\s+(rm|rmi|system\s+prune|volume\s+rm)\b/, reason: 'docker resource removal' },
  { re: /\bcurl\b.*\|\s*(ba|z)?sh\b|\bwget\b.*\|\s*(ba|z)?sh\b/, reason: 'piping a download into a shell' },
  { re: /\bfind\b.*\s-delete\b/, reason: 'find -delete' },
  { re: /\btruncate\s+/, reason: 'truncate' },
];

export type CommandVerdict =
  | { verdict: 'blocked'; reason: string }
  | { verdict: 'allowed'; confirm?: string };

export class CommandPolicy {
  private readonly blocked: Pattern[];
  private readonly confirm: Pattern[];
  private readonly allow: RegExp[];

  constructor(
    cfg: SafetyConfig = {},
    private readonly log?: Logger
  ) {
    this.blocked = [...BLOCKED_PATTERNS, ...compilePatterns(cfg.blocked_patterns, 'blocked', log)];
    this.confirm = [...CONFIRM_PATTERNS, ...compilePatterns(cfg.confirm_patterns, 'confirm', log)];
    this.allow = compilePatterns(cfg.allow_patterns, 'allow', log).map((p) => p.re);
  }

  /** Screen a command line. Blocked wins over everything, allow_patterns only waive the confirm tier. */
  classify(command: string): CommandVerdict {
    // Normalize: collapse whitespace, trim
    const line = command.replace(/\s+/g, ' ').trim();
    // The shell drops quotes and escapes before running: s\udo and "su"do are sudo.
    const bare = line.replace(/[\\'"]/g, '');
    const hits = (re: RegExp) => re.test(line) || re.test(bare);

    for (const { re, reason } of this.blocked) {
      if (hits(re)) {
        this.log?.warn(`BLOCKED: ${reason}: ${line}`);
        return { verdict: 'blocked', reason };
      }
    }

    for (const { re, reason } of this.confirm) {
      if (!hits(re)) continue;
      if (this.allow.some((a) => a.test(line))) {
        this.log?.debug(`allowed by allow_patterns: ${line}`);
        return { verdict: 'allowed' };
      }
      this.log?.debug(`confirm: ${reason}: ${line}`);
      return { verdict: 'allowed', confirm: reason };
    }

    this.log?.debug(`free: ${line}`);
    return { verdict: 'allowed' };
  }
}

/** Stateless convenience around a default policy. */
export function classifyCommand(command: string): CommandVerdict {
  return new CommandPolicy().classify(command);
}

function compilePatterns(patterns: unknown, label: string, log?: Logger): Pattern[] {
  if (!Array.isArray(patterns)) return [];
  const result: Pattern[] = [];
  for (const p of patterns) {
    if (typeof p !== 'string') continue;
    try {
      result.push({ re: new RegExp(p), reason: `user ${label}: ${p}` });
    } catch (e: unknown) {
      log?.warn(`warning: invalid regex in ${label}_patterns: ${p} (${e instanceof Error ? e.message : String(e)})`);
    }
  }
  return result;
}

/**
 * Load safety.json (config dir by default). Missing file means no additions;
 * an unreadable or malformed one is reported and ignored.
 */
export async function loadSafetyConfig(configPath?: string, log?: Logger): Promise<SafetyConfig> {
  const p = configPath ?? path.join(configDir(), 'safety.json');
  let raw: string;
  try {
    raw = await fs.readFile(p, 'utf8');
  } catch (e: unknown) {
    if (errorCode(e) === 'ENOENT') return {};
    log?.warn(`warning: failed to read ${p}: ${e instanceof Error ? e.message : String(e)}`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    log?.warn(`warning: invalid JSON in ${p}: ${e instanceof Error ? e.message : String(e)}`);
    return {};
  }
  if (!isRecord(parsed)) return {};

  const list = (v: unknown) => (Array.isArray(v) ? v.filter((x): x is string => typeof x === 'string') : undefined);
  return {
    blocked_patterns: list(parsed.blocked_patterns),
    confirm_patterns: list(parsed.confirm_patterns),
    allow_patterns: list(parsed.allow_patterns),
  };
}

/** Merge two safety sections, concatenating the pattern lists. */
export function mergeSafetyConfig(a: SafetyConfig, b: SafetyConfig): SafetyConfig {
  const cat = (x?: string[], y?: string[]) => (x || y ? [...(x ?? []), ...(y ?? [])] : undefined);
  return {
    blocked_patterns: cat(a.blocked_patterns, b.blocked_patterns),
    confirm_patterns: cat(a.confirm_patterns, b.confirm_patterns),
    allow_patterns: cat(a.allow_patterns, b.allow_patterns),
  };
}
