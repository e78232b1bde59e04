/**
 * The confinement layer every tool goes through: paths are resolved inside
 * the workspace root, shell commands are classified before they spawn, and
 * every process runs under a capped wall-clock timeout and output ceiling.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import type { Logger } from './log.js';
import { CommandPolicy, type CommandVerdict } from './safety.js';
import { runProcess } from './tools/exec-core.js';
import { canonicalize, isWithinDir } from './tools/path-safety.js';
import { ToolError } from './tools/tool-error.js';
import type { LatheConfig, ProcessResult } from './types.js';
import { BASH_PATH } from './utils.js';

export class SandboxViolation extends ToolError {
  constructor(message: string, hint?: string) {
    super('blocked', message, false, hint);
    this.name = 'SandboxViolation';
  }
}

export class OutOfBoundsError extends SandboxViolation {
  constructor(public readonly pathArg: string) {
    super(`path escapes workspace root: ${pathArg}`, 'use a path inside the workspace root; do not retry the same path');
    this.name = 'OutOfBoundsError';
  }
}

export class CommandBlockedError extends SandboxViolation {
  constructor(
    public readonly command: string,
    public readonly reason: string
  ) {
    super(`command blocked (${reason}): ${command}`, 'this command is never allowed; find another way or ask the user to run it');
    this.name = 'CommandBlockedError';
  }
}

export type SandboxDecision = { allowed: true; path: string } | { allowed: false; reason: string };

export type SandboxOptions = {
  root: string;
  policy?: CommandPolicy;
  /** Per-call default when the tool doesn't ask for one. */
  defaultTimeoutSec?: number;
  /** Hard ceiling; requests above it are clamped. */
  maxTimeoutSec?: number;
  maxOutputBytes?: number;
  log?: Logger;
};

export type SandboxRunOptions = {
  /** Workspace-relative; resolved through the sandbox. */
  cwd?: string;
  env?: Record<string, string | undefined>;
  timeoutSec?: number;
  signal?: AbortSignal;
  stdin?: string;
};

export class Sandbox {
  readonly root: string;
  readonly policy: CommandPolicy;
  readonly defaultTimeoutSec: number;
  readonly maxTimeoutSec: number;
  readonly maxOutputBytes: number;
  private readonly log?: Logger;

  constructor(opts: SandboxOptions) {
    this.root = path.resolve(opts.root);
    this.policy = opts.policy ?? new CommandPolicy({}, opts.log);
    this.maxTimeoutSec = Math.max(1, opts.maxTimeoutSec ?? 120);
    this.defaultTimeoutSec = Math.min(Math.max(1, opts.defaultTimeoutSec ?? 30), this.maxTimeoutSec);
    this.maxOutputBytes = opts.maxOutputBytes ?? 16384;
    this.log = opts.log;
  }

  static fromConfig(config: LatheConfig, log?: Logger, policy?: CommandPolicy): Sandbox {
    return new Sandbox({
      root: config.dir,
      policy: policy ?? new CommandPolicy(config.safety, log?.child('safety')),
      defaultTimeoutSec: config.tool_timeout,
      maxTimeoutSec: config.max_timeout,
      maxOutputBytes: config.max_output_bytes,
      log,
    });
  }

  /**
   * Resolve a tool-supplied path inside the root. The root itself is
   * re-canonicalised on every call; nothing is cached.
   */
  async resolve(pathArg: unknown): Promise<SandboxDecision> {
    if (typeof pathArg !== 'string' || !pathArg.trim()) {
      return { allowed: false, reason: 'missing path' };
    }
    if (pathArg.includes('\0')) {
      return { allowed: false, reason: 'path contains a NUL byte' };
    }

    const root = await canonicalize(this.root);
    const target = await canonicalize(path.resolve(this.root, pathArg));
    if (!isWithinDir(target, root)) {
      this.log?.debug(`path rejected: ${pathArg} -> ${target}`);
      return { allowed: false, reason: `path escapes workspace root: ${pathArg}` };
    }
    return { allowed: true, path: target };
  }

  /** `resolve`, throwing OutOfBoundsError instead of returning a rejection. */
  async requirePath(pathArg: unknown): Promise<string> {
    const d = await this.resolve(pathArg);
    if (d.allowed) return d.path;
    if (d.reason.startsWith('path escapes')) throw new OutOfBoundsError(String(pathArg));
    throw new ToolError('invalid_args', d.reason);
  }

  /** Workspace-relative display form of an absolute path inside the root. */
  async relative(abs: string): Promise<string> {
    const root = await canonicalize(this.root);
    return path.relative(root, abs) || '.';
  }

  classifyCommand(command: string): CommandVerdict {
    return this.policy.classify(command);
  }

  capTimeout(requested?: number): number {
    const t = typeof requested === 'number' && Number.isFinite(requested) && requested > 0 ? requested : this.defaultTimeoutSec;
    return Math.min(Math.ceil(t), this.maxTimeoutSec);
  }

  async runProcess(argv: string[], opts: SandboxRunOptions = {}): Promise<ProcessResult> {
    const cwd = await this.requirePath(opts.cwd ?? '.');
    const st = await fs.stat(cwd).catch(() => null);
    if (!st?.isDirectory()) {
      throw new ToolError('not_found', `working directory does not exist: ${opts.cwd ?? '.'}`);
    }

    const timeoutSec = this.capTimeout(opts.timeoutSec);
    this.log?.debug(`spawn [${argv.join(' ')}] cwd=${cwd} timeout=${timeoutSec}s`);
    const result = await runProcess(argv, {
      cwd,
      env: opts.env,
      timeoutSec,
      maxBytes: this.maxOutputBytes,
      signal: opts.signal,
      stdin: opts.stdin,
    });
    if (result.timedOut) this.log?.warn(`killed after ${timeoutSec}s timeout: ${argv.join(' ')}`);
    return result;
  }

  /** Classify, then run through bash. Blocked commands never spawn. */
  async runShell(command: string, opts: SandboxRunOptions = {}): Promise<ProcessResult> {
    const verdict = this.classifyCommand(command);
    if (verdict.verdict === 'blocked') throw new CommandBlockedError(command, verdict.reason);
    return this.runProcess([BASH_PATH, '-c', command], opts);
  }
}
