import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';

import { CommandBlockedError, OutOfBoundsError, Sandbox } from '../src/sandbox.js';
import { isWithinDir } from '../src/tools/path-safety.js';
import { ToolError } from '../src/tools/tool-error.js';

describe('Sandbox path confinement', () => {
  let base: string;
  let root: string;
  let outside: string;
  let sandbox: Sandbox;

  before(async () => {
    base = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'lathe-sandbox-test-')));
    root = path.join(base, 'ws');
    outside = path.join(base, 'outside');
    await fs.mkdir(path.join(root, 'src'), { recursive: true });
    await fs.mkdir(outside);
    await fs.writeFile(path.join(outside, 'secret.txt'), 'nope');
    await fs.symlink(outside, path.join(root, 'link-out'));
    await fs.symlink(path.join(root, 'src'), path.join(root, 'link-in'));
    await fs.symlink(path.join(outside, 'new.txt'), path.join(root, 'dangling-out'));
    await fs.symlink(path.join(root, 'src', 'new.ts'), path.join(root, 'dangling-in'));
    sandbox = new Sandbox({ root });
  });

  after(async () => {
    await fs.rm(base, { recursive: true, force: true });
  });

  it('resolves relative paths inside the root, existing or not', async () => {
    assert.deepEqual(await sandbox.resolve('notes/todo.txt'), { allowed: true, path: path.join(root, 'notes/todo.txt') });
    assert.deepEqual(await sandbox.resolve('.'), { allowed: true, path: root });
  });

  it('rejects traversal out of the root', async () => {
    assert.deepEqual(await sandbox.resolve('../escape.txt'), {
      allowed: false,
      reason: 'path escapes workspace root: ../escape.txt',
    });
    assert.equal((await sandbox.resolve('src/../../outside/secret.txt')).allowed, false);
  });

  it('rejects absolute paths outside and accepts absolute paths inside', async () => {
    assert.equal((await sandbox.resolve('/etc/passwd')).allowed, false);
    assert.deepEqual(await sandbox.resolve(path.join(root, 'src')), { allowed: true, path: path.join(root, 'src') });
  });

  it('follows symlinks before deciding', async () => {
    assert.equal((await sandbox.resolve('link-out/secret.txt')).allowed, false);
    assert.deepEqual(await sandbox.resolve('link-in/a.ts'), { allowed: true, path: path.join(root, 'src', 'a.ts') });
  });

  it('resolves a dangling symlink to its target', async () => {
    assert.deepEqual(await sandbox.resolve('dangling-out'), {
      allowed: false,
      reason: 'path escapes workspace root: dangling-out',
    });
    assert.deepEqual(await sandbox.resolve('dangling-in'), { allowed: true, path: path.join(root, 'src', 'new.ts') });
  });

  it('rejects empty and NUL-containing paths', async () => {
    assert.deepEqual(await sandbox.resolve(''), { allowed: false, reason: 'missing path' });
    assert.deepEqual(await sandbox.resolve(42), { allowed: false, reason: 'missing path' });
    assert.deepEqual(await sandbox.resolve('a\0b'), { allowed: false, reason: 'path contains a NUL byte' });
  });

  it('resolve is idempotent', async () => {
    for (const p of ['src', 'link-in/x/y.txt', 'new/dir/file', '.']) {
      const first = await sandbox.resolve(p);
      assert.equal(first.allowed, true);
      if (!first.allowed) continue;
      assert.deepEqual(await sandbox.resolve(first.path), first);
    }
  });

  it('requirePath throws OutOfBoundsError with code blocked', async () => {
    await assert.rejects(
      () => sandbox.requirePath('../x'),
      (e: unknown) => e instanceof OutOfBoundsError && e.code === 'blocked' && e.message === 'path escapes workspace root: ../x'
    );
  });

  it('relative() renders workspace paths', async () => {
    assert.equal(await sandbox.relative(path.join(root, 'src', 'a.ts')), path.join('src', 'a.ts'));
    assert.equal(await sandbox.relative(root), '.');
  });
});

describe('isWithinDir', () => {
  it('handles prefixes and the filesystem root', () => {
    assert.equal(isWithinDir('/a/b/c', '/a/b'), true);
    assert.equal(isWithinDir('/a/b', '/a/b'), true);
    assert.equal(isWithinDir('/a/bc', '/a/b'), false);
    assert.equal(isWithinDir('/a', '/a/b'), false);
    assert.equal(isWithinDir('/anything', '/'), true);
  });
});

describe('Sandbox processes', () => {
  let root: string;
  let sandbox: Sandbox;

  before(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'lathe-proc-test-')));
    sandbox = new Sandbox({ root, defaultTimeoutSec: 10, maxTimeoutSec: 20, maxOutputBytes: 256 });
  });

  after(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('caps timeouts', () => {
    assert.equal(sandbox.capTimeout(), 10);
    assert.equal(sandbox.capTimeout(500), 20);
    assert.equal(sandbox.capTimeout(2.2), 3);
    assert.equal(sandbox.capTimeout(-1), 10);
  });

  it('runs a command in the root', async () => {
    const r = await sandbox.runShell('echo hi; pwd');
    assert.equal(r.exitCode, 0);
    assert.equal(r.stdout, `hi\n${root}\n`);
    assert.equal(r.timedOut, false);
  });

  it('never spawns a blocked command', async () => {
    await assert.rejects(() => sandbox.runShell(`sudo touch ${path.join(root, 'marker')}`), CommandBlockedError);
    await assert.rejects(fs.access(path.join(root, 'marker')));
  });

  it('kills a command at its timeout', async () => {
    const started = Date.now();
    const r = await sandbox.runShell('sleep 30', { timeoutSec: 1 });
    const elapsed = Date.now() - started;
    assert.equal(r.timedOut, true);
    assert.equal(r.timeoutSec, 1);
    assert.ok(elapsed >= 1000 && elapsed < 2500, `killed after ${elapsed}ms`);
  });

  it('kills a command when the signal aborts', async () => {
    const ac = new AbortController();
    setTimeout(() => ac.abort(), 100);
    const r = await sandbox.runShell('sleep 30', { signal: ac.signal });
    assert.equal(r.cancelled, true);
    assert.equal(r.timedOut, false);
  });

  it('caps captured output', async () => {
    const r = await sandbox.runShell("head -c 1000 /dev/zero | tr '\\0' a");
    assert.equal(r.truncated, true);
    assert.equal(r.stdout, 'a'.repeat(256) + '\n...[output truncated, 1000 bytes total]');
  });

  it('confines the working directory', async () => {
    await assert.rejects(() => sandbox.runProcess(['ls'], { cwd: '..' }), OutOfBoundsError);
    await assert.rejects(
      () => sandbox.runProcess(['ls'], { cwd: 'missing' }),
      (e: unknown) => e instanceof ToolError && e.code === 'not_found'
    );
  });
});
