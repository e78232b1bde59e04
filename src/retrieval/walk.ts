import fs from 'node:fs/promises';
import path from 'node:path';

import { escapeRegex } from '../utils.js';

const DEFAULT_SKIP_DIRS = new Set(['.git', 'node_modules', 'dist', 'build']);

/** Files larger than this are not indexed. */
export const MAX_INDEX_FILE_BYTES = 1_000_000;
const HARD_FILE_LIMIT = 20_000;

type IgnoreRule = {
  regex: RegExp;
  negate: boolean;
  directoryOnly: boolean;
};

export type WalkedFile = { abs: string; rel: string };

function toPosixRel(filePath: string): string {
  return filePath.replace(/\\/g, '/').replace(/^\/+/, '');
}

function globToRegex(glob: string, anchored: boolean, directoryOnly: boolean): RegExp {
  let src = '';
  const input = glob.replace(/\\/g, '/');

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (ch === '*') {
      if (input[i + 1] === '*') {
        src += '.*';
        i++;
      } else {
        src += '[^/]*';
      }
      continue;
    }
    if (ch === '?') {
      src += '[^/]';
      continue;
    }
    src += escapeRegex(ch);
  }

  const prefix = anchored ? '^' : '^(?:|.*/)';
  const suffix = directoryOnly ? '(?:/.*)?$' : '$';
  return new RegExp(`${prefix}${src}${suffix}`);
}

export function parseIgnoreRules(raw: string): IgnoreRule[] {
  const rules: IgnoreRule[] = [];

  for (const line of raw.split(/\r?\n/)) {
    let pat = line.trim();
    if (!pat || pat.startsWith('#')) continue;

    let negate = false;
    if (pat.startsWith('!')) {
      negate = true;
      pat = pat.slice(1).trim();
    }

    let directoryOnly = false;
    if (pat.endsWith('/')) {
      directoryOnly = true;
      pat = pat.slice(0, -1);
    }

    // a slash anywhere but the end anchors the pattern to the ignore file's dir
    const anchored = pat.includes('/');
    pat = pat.replace(/^\/+/, '');
    if (!pat) continue;

    rules.push({ regex: globToRegex(pat, anchored, directoryOnly), negate, directoryOnly });
  }

  return rules;
}

export async function loadIgnoreRules(root: string): Promise<IgnoreRule[]> {
  const rules: IgnoreRule[] = [];
  for (const name of ['.gitignore', '.latheignore']) {
    const raw = await fs.readFile(path.join(root, name), 'utf8').catch(() => '');
    if (raw.trim()) rules.push(...parseIgnoreRules(raw));
  }
  return rules;
}

export function isIgnored(relPath: string, isDir: boolean, rules: IgnoreRule[]): boolean {
  const rel = toPosixRel(relPath);
  if (rel.split('/').some((p) => DEFAULT_SKIP_DIRS.has(p))) return true;

  let ignored = false;
  for (const rule of rules) {
    if (rule.directoryOnly && !isDir) continue;
    if (rule.regex.test(rel)) ignored = !rule.negate;
  }
  return ignored;
}

/**
 * Files under `start` (a file or directory inside `root`), relative paths
 * taken from `root`. Symlinks are not followed; ignore rules and the default
 * skip list apply to every level.
 */
export async function walkFiles(root: string, start: string, rules: IgnoreRule[]): Promise<WalkedFile[]> {
  const out: WalkedFile[] = [];

  const visit = async (abs: string, isDir: boolean): Promise<void> => {
    const rel = toPosixRel(path.relative(root, abs));
    if (rel && isIgnored(rel, isDir, rules)) return;

    if (!isDir) {
      out.push({ abs, rel });
      if (out.length > HARD_FILE_LIMIT) {
        throw new Error(`more than ${HARD_FILE_LIMIT} files after ignore filters; refusing to index`);
      }
      return;
    }

    const entries = await fs.readdir(abs, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      if (entry.isSymbolicLink()) continue;
      if (entry.isDirectory()) await visit(path.join(abs, entry.name), true);
      else if (entry.isFile()) await visit(path.join(abs, entry.name), false);
    }
  };

  const st = await fs.lstat(start);
  if (st.isDirectory()) await visit(start, true);
  else if (st.isFile()) await visit(start, false);
  return out;
}

/** UTF-8 text of a file, or null for binaries (a NUL in the first 512 bytes) and oversized files. */
export async function readTextFile(filePath: string): Promise<string | null> {
  const st = await fs.stat(filePath);
  if (st.size > MAX_INDEX_FILE_BYTES) return null;
  const buf = await fs.readFile(filePath);
  if (buf.subarray(0, 512).includes(0)) return null;
  return buf.toString('utf8');
}
