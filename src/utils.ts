/**
 * Shared utility functions.
 */

import { spawnSync } from 'node:child_process';
import { randomBytes } from 'node:crypto';
import { readFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

/** Package version read once at startup. Falls back to '0.0.0'. */
export const PKG_VERSION: string = (() => {
  // src/ under tsx, dist/src/ once built
  for (const rel of ['../package.json', '../../package.json']) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(new URL(rel, import.meta.url), 'utf8'));
      if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    } catch {
      continue;
    }
  }
  return '0.0.0';
})();

/** Resolved absolute path to bash, so spawn doesn't depend on PATH lookups. */
export const BASH_PATH: string = (() => {
  try {
    const r = spawnSync('which', ['bash'], { encoding: 'utf8', timeout: 1000 });
    const p = r.stdout?.split(/\r?\n/)[0]?.trim();
    if (p && p.startsWith('/')) return p;
  } catch {
    /* fallback */
  }
  return '/bin/bash';
})();

export function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * XDG-compatible state directory for transcripts and the retrieval index.
 * `~/.local/state/lathe`
 */
export function stateDir(): string {
  if (process.env.LATHE_STATE_DIR) return process.env.LATHE_STATE_DIR;
  if (process.env.XDG_STATE_HOME) return path.join(process.env.XDG_STATE_HOME, 'lathe');
  return path.join(os.homedir(), '.local', 'state', 'lathe');
}

/**
 * XDG-compatible config directory.
 * `~/.config/lathe`, overridable with LATHE_CONFIG_DIR.
 */
export function configDir(): string {
  if (process.env.LATHE_CONFIG_DIR) return process.env.LATHE_CONFIG_DIR;
  if (process.env.XDG_CONFIG_HOME) return path.join(process.env.XDG_CONFIG_HOME, 'lathe');
  return path.join(os.homedir(), '.config', 'lathe');
}

/**
 * Generate a short random hex ID.
 * @param bytes - Number of random bytes (default 6 = 12 hex chars)
 */
export function randomId(bytes = 6): string {
  return randomBytes(bytes).toString('hex');
}

/** `<ts36>-<random>`; sortable by creation time. */
export function timestampedId(): string {
  const ts = Date.now().toString(36);
  const rand = randomBytes(4).toString('hex');
  return `${ts}-${rand}`;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function errorCode(e: unknown): string | undefined {
  if (isRecord(e) && typeof e.code === 'string') return e.code;
  return undefined;
}
