import { constants as fsc } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { canonicalize } from './path-safety.js';
import { argBool, argInt, argStr, type ToolArgs } from './args.js';
import type { ToolContext, ToolDef, ToolDescriptor } from './registry.js';
import { bool, confirmFlag, int, obj, oneOf, str } from './schema.js';
import { ToolError } from './tool-error.js';
import { errorCode } from '../utils.js';

const SKIP_DIRS = new Set(['.git', 'node_modules']);
const DEFAULT_READ_LIMIT = 400;

async function exists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch (e: unknown) {
    if (errorCode(e) === 'ENOENT') return false;
    throw e;
  }
}

/** Resolve without throwing; destructive() checks must not pre-empt the handler's own error. */
async function peek(ctx: ToolContext, p: unknown): Promise<string | undefined> {
  const d = await ctx.sandbox.resolve(p);
  return d.allowed ? d.path : undefined;
}

// Writes never follow a symlink at the final component, even one swapped in after resolve().
const CREATE_FLAGS = fsc.O_WRONLY | fsc.O_CREAT | fsc.O_EXCL | fsc.O_NOFOLLOW;
const OVERWRITE_FLAGS = fsc.O_WRONLY | fsc.O_CREAT | fsc.O_TRUNC | fsc.O_NOFOLLOW;
const APPEND_FLAGS = fsc.O_WRONLY | fsc.O_CREAT | fsc.O_APPEND | fsc.O_NOFOLLOW;

async function writeNoFollow(abs: string, content: string, flag: number, tool: string, shown: string): Promise<void> {
  try {
    await fs.writeFile(abs, content, { encoding: 'utf8', flag });
  } catch (e: unknown) {
    if (errorCode(e) === 'ELOOP') throw new ToolError('blocked', `${tool}: ${shown} is a symbolic link`);
    throw e;
  }
}

async function refuseRoot(ctx: ToolContext, abs: string, tool: string) {
  if (abs === (await canonicalize(ctx.sandbox.root))) {
    throw new ToolError('blocked', `${tool}: refusing to operate on the workspace root itself`);
  }
}

// ── read_file ────────────────────────────────────────────────────────────

const readFile: ToolDef = {
  descriptor: {
    name: 'read_file',
    description: 'Read a text file inside the workspace. Returns numbered lines.',
    readOnly: true,
    parameters: obj(
      {
        path: str('File path, relative to the workspace root'),
        offset: int('First line to return (1-based)', { min: 1, default: 1 }),
        limit: int('Maximum number of lines', { min: 1, max: 2000, default: DEFAULT_READ_LIMIT }),
      },
      ['path']
    ),
  },
  async handler(args, ctx) {
    const abs = await ctx.sandbox.requirePath(args.path);
    const buf = await fs.readFile(abs);
    if (buf.subarray(0, 512).includes(0)) {
      throw new ToolError('invalid_args', `read_file: ${argStr(args, 'path')} looks like a binary file`);
    }
    const lines = buf.toString('utf8').split(/\r?\n/);
    if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();

    const offset = argInt(args, 'offset', 1);
    const limit = argInt(args, 'limit', DEFAULT_READ_LIMIT);
    if (lines.length === 0 || (lines.length === 1 && lines[0] === '')) return '[empty file]';
    if (offset > lines.length) {
      throw new ToolError('invalid_args', `read_file: offset ${offset} is past the end (${lines.length} lines)`);
    }

    const slice = lines.slice(offset - 1, offset - 1 + limit);
    const width = String(offset + slice.length - 1).length;
    const body = slice.map((l, i) => `${String(offset + i).padStart(width)}| ${l}`).join('\n');
    const last = offset + slice.length - 1;
    if (last < lines.length) {
      return `${body}\n[lines ${offset}-${last} of ${lines.length}; use offset=${last + 1} to continue]`;
    }
    return body;
  },
};

// ── create_file ──────────────────────────────────────────────────────────

const createFile: ToolDef = {
  descriptor: {
    name: 'create_file',
    description: 'Create a new file with the given content. Fails if the file already exists. Parent directories are created.',
    parameters: obj({ path: str('File path, relative to the workspace root'), content: str('Full file content') }, [
      'path',
      'content',
    ]),
  },
  async handler(args, ctx) {
    const abs = await ctx.sandbox.requirePath(args.path);
    const content = argStr(args, 'content');
    await fs.mkdir(path.dirname(abs), { recursive: true });
    try {
      await writeNoFollow(abs, content, CREATE_FLAGS, 'create_file', argStr(args, 'path'));
    } catch (e: unknown) {
      if (errorCode(e) === 'EEXIST') {
        throw new ToolError(
          'conflict',
          `create_file: ${argStr(args, 'path')} already exists`,
          false,
          'use write_file to replace or append'
        );
      }
      throw e;
    }
    return `created ${await ctx.sandbox.relative(abs)} (${Buffer.byteLength(content)} bytes)`;
  },
};

// ── write_file ───────────────────────────────────────────────────────────

const writeFile: ToolDef = {
  descriptor: {
    name: 'write_file',
    description:
      'Write content to a file. mode="append" adds to the end; mode="overwrite" replaces an existing file and needs confirm=true.',
    parameters: obj(
      {
        path: str('File path, relative to the workspace root'),
        content: str('Content to write'),
        mode: oneOf(['overwrite', 'append'], 'Write mode', 'overwrite'),
        confirm: confirmFlag(),
      },
      ['path', 'content']
    ),
    async destructive(args, ctx) {
      if (args.mode === 'append') return undefined;
      const abs = await peek(ctx, args.path);
      if (abs && (await exists(abs))) return `overwrites existing file ${String(args.path)}`;
      return undefined;
    },
  },
  async handler(args, ctx) {
    const abs = await ctx.sandbox.requirePath(args.path);
    const content = argStr(args, 'content');
    await fs.mkdir(path.dirname(abs), { recursive: true });
    const rel = await ctx.sandbox.relative(abs);
    if (args.mode === 'append') {
      await writeNoFollow(abs, content, APPEND_FLAGS, 'write_file', rel);
      return `appended ${Buffer.byteLength(content)} bytes to ${rel}`;
    }
    await writeNoFollow(abs, content, OVERWRITE_FLAGS, 'write_file', rel);
    return `wrote ${rel} (${Buffer.byteLength(content)} bytes)`;
  },
};

// ── list_dir ─────────────────────────────────────────────────────────────

const listDir: ToolDef = {
  descriptor: {
    name: 'list_dir',
    description: 'List a directory inside the workspace. Directories end with "/".',
    readOnly: true,
    parameters: obj({
      path: str('Directory, relative to the workspace root', { default: '.' }),
      recursive: bool('Descend into subdirectories (skips .git and node_modules)', false),
      max_entries: int('Maximum entries to return', { min: 1, max: 5000, default: 200 }),
    }),
  },
  async handler(args, ctx) {
    const abs = await ctx.sandbox.requirePath(args.path ?? '.');
    const st = await fs.stat(abs);
    if (!st.isDirectory()) throw new ToolError('invalid_args', `list_dir: ${String(args.path)} is not a directory`);

    const recursive = argBool(args, 'recursive');
    const max = argInt(args, 'max_entries', 200);
    const out: string[] = [];
    let more = false;

    const walk = async (dir: string, prefix: string): Promise<void> => {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      entries.sort((a, b) => a.name.localeCompare(b.name));
      for (const entry of entries) {
        if (out.length >= max) {
          more = true;
          return;
        }
        const rel = prefix + entry.name;
        if (entry.isDirectory()) {
          out.push(rel + '/');
          if (recursive && !SKIP_DIRS.has(entry.name)) await walk(path.join(dir, entry.name), rel + '/');
        } else {
          out.push(entry.isSymbolicLink() ? rel + '@' : rel);
        }
      }
    };
    await walk(abs, '');

    if (!out.length) return '[empty directory]';
    return more ? `${out.join('\n')}\n[stopped at ${max} entries]` : out.join('\n');
  },
};

// ── delete_path ──────────────────────────────────────────────────────────

const deletePath: ToolDef = {
  descriptor: {
    name: 'delete_path',
    description: 'Delete a file, or a directory with recursive=true. Always needs confirm=true.',
    parameters: obj(
      {
        path: str('Path to delete, relative to the workspace root'),
        recursive: bool('Delete a non-empty directory and everything in it', false),
        confirm: confirmFlag(),
      },
      ['path']
    ),
    destructive: (args) => `deletes ${String(args.path)}`,
  },
  async handler(args, ctx) {
    const abs = await ctx.sandbox.requirePath(args.path);
    await refuseRoot(ctx, abs, 'delete_path');
    const st = await fs.lstat(abs);
    const rel = await ctx.sandbox.relative(abs);
    if (st.isDirectory()) {
      if (argBool(args, 'recursive')) await fs.rm(abs, { recursive: true, force: false });
      else await fs.rmdir(abs);
      return `deleted directory ${rel}`;
    }
    await fs.unlink(abs);
    return `deleted ${rel}`;
  },
};

// ── move_path / copy_path ────────────────────────────────────────────────

function transferDescriptor(name: 'move_path' | 'copy_path', verb: string): ToolDescriptor {
  return {
    name,
    description: `${verb} a file or directory inside the workspace. Replacing an existing destination needs confirm=true.`,
    parameters: obj({ from: str('Source path'), to: str('Destination path'), confirm: confirmFlag() }, ['from', 'to']),
    async destructive(args: ToolArgs, ctx: ToolContext) {
      const dest = await peek(ctx, args.to);
      if (dest && (await exists(dest))) return `replaces existing ${String(args.to)}`;
      return undefined;
    },
  };
}

const movePath: ToolDef = {
  descriptor: transferDescriptor('move_path', 'Move or rename'),
  async handler(args, ctx) {
    const from = await ctx.sandbox.requirePath(args.from);
    const to = await ctx.sandbox.requirePath(args.to);
    await refuseRoot(ctx, from, 'move_path');
    await fs.lstat(from);
    await fs.mkdir(path.dirname(to), { recursive: true });
    try {
      await fs.rename(from, to);
    } catch (e: unknown) {
      if (errorCode(e) !== 'EXDEV') throw e;
      await fs.cp(from, to, { recursive: true, force: true });
      await fs.rm(from, { recursive: true });
    }
    return `moved ${await ctx.sandbox.relative(from)} -> ${await ctx.sandbox.relative(to)}`;
  },
};

const copyPath: ToolDef = {
  descriptor: transferDescriptor('copy_path', 'Copy'),
  async handler(args, ctx) {
    const from = await ctx.sandbox.requirePath(args.from);
    const to = await ctx.sandbox.requirePath(args.to);
    await fs.lstat(from);
    await fs.mkdir(path.dirname(to), { recursive: true });
    await fs.cp(from, to, { recursive: true, force: true, verbatimSymlinks: true });
    return `copied ${await ctx.sandbox.relative(from)} -> ${await ctx.sandbox.relative(to)}`;
  },
};

export const fileTools: ToolDef[] = [readFile, createFile, writeFile, listDir, deletePath, movePath, copyPath];
