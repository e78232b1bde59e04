/**
 * Path containment helpers shared by the sandbox and the retrieval walker.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { errorCode } from '../utils.js';

import { ToolError } from './tool-error.js';

/**
 * Check if a resolved target path resides within a directory.
 * Handles the classic root directory edge case: when dir is `/`, every absolute path is valid.
 */
export function isWithinDir(target: string, dir: string): boolean {
  if (dir === path.parse(dir).root) return path.isAbsolute(target);
  const rel = path.relative(dir, target);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

const MAX_LINK_HOPS = 40;

async function readLinkIfAny(p: string): Promise<string | undefined> {
  try {
    return await fs.readlink(p);
  } catch (e: unknown) {
    const code = errorCode(e);
    if (code === 'EINVAL' || code === 'ENOENT' || code === 'ENOTDIR') return undefined;
    throw e;
  }
}

/**
 * Canonicalise a path that may not exist yet: realpath the deepest existing
 * ancestor and re-append the missing tail. `..` is collapsed lexically
 * first; symlinks in the existing part are then followed, so
 * `link-to-outside/x` resolves to where it really points. A dangling
 * symlink is followed to its target too, so it can't pass for a new file.
 */
export async function canonicalize(absPath: string, hops = 0): Promise<string> {
  if (hops > MAX_LINK_HOPS) {
    throw new ToolError('blocked', `too many levels of symbolic links: ${absPath}`);
  }
  const missing: string[] = [];
  let cur = path.resolve(absPath);

  for (;;) {
    try {
      const real = await fs.realpath(cur);
      return missing.length ? path.join(real, ...missing.reverse()) : real;
    } catch (e: unknown) {
      const code = errorCode(e);
      if (code !== 'ENOENT' && code !== 'ENOTDIR') throw e;
      const link = await readLinkIfAny(cur);
      if (link !== undefined) {
        const target = await canonicalize(path.resolve(path.dirname(cur), link), hops + 1);
        return missing.length ? path.join(target, ...missing.reverse()) : target;
      }
      const parent = path.dirname(cur);
      if (parent === cur) return path.resolve(absPath);
      missing.push(path.basename(cur));
      cur = parent;
    }
  }
}
