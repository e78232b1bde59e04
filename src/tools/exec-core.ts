import { spawn } from 'node:child_process';

import type { ProcessResult } from '../types.js';

import { stripAnsi, truncateBytes } from './text-utils.js';
import { ToolError } from './tool-error.js';

export const DEFAULT_MAX_EXEC_BYTES = 16384;

export type RunProcessOptions = {
  cwd: string;
  env?: Record<string, string | undefined>;
  /** Already capped by the caller. */
  timeoutSec: number;
  maxBytes?: number;
  signal?: AbortSignal;
  stdin?: string;
};

/**
 * Spawn `argv` in its own process group and wait for it.
 *
 * The group is SIGKILLed on timeout or abort so grandchildren die with it.
 * Each stream keeps at most `maxBytes`; the rest is counted, dropped and
 * reported through a truncation marker.
 */
export async function runProcess(argv: string[], opts: RunProcessOptions): Promise<ProcessResult> {
  const [file, ...args] = argv;
  if (!file) throw new ToolError('invalid_args', 'runProcess: empty argv');

  const timeoutSec = Math.max(1, opts.timeoutSec);
  const maxBytes = opts.maxBytes ?? DEFAULT_MAX_EXEC_BYTES;
  const started = Date.now();

  if (opts.signal?.aborted) {
    return {
      exitCode: null,
      signal: null,
      stdout: '',
      stderr: '',
      timedOut: false,
      cancelled: true,
      truncated: false,
      durationMs: 0,
      timeoutSec,
    };
  }

  const child = spawn(file, args, {
    cwd: opts.cwd,
    env: { ...process.env, ...opts.env },
    stdio: [opts.stdin === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
    detached: true,
  });

  const outChunks: Buffer[] = [];
  const errChunks: Buffer[] = [];
  let outSeen = 0;
  let errSeen = 0;
  let outCaptured = 0;
  let errCaptured = 0;
  let timedOut = false;
  let cancelled = false;

  const killProcessGroup = () => {
    const pid = child.pid;
    if (!pid) return;
    try {
      process.kill(-pid, 'SIGKILL');
    } catch {
      // no group (already reaped); kill() reports a dead child by returning false
      child.kill('SIGKILL');
    }
  };

  const killTimer = setTimeout(() => {
    timedOut = true;
    killProcessGroup();
  }, timeoutSec * 1000);

  const onAbort = () => {
    cancelled = true;
    killProcessGroup();
  };
  opts.signal?.addEventListener('abort', onAbort, { once: true });

  const pushCapped = (buf: Buffer, kind: 'out' | 'err') => {
    const n = buf.length;
    if (kind === 'out') outSeen += n;
    else errSeen += n;
    const captured = kind === 'out' ? outCaptured : errCaptured;
    const remaining = maxBytes - captured;
    if (remaining <= 0) return;
    const take = n <= remaining ? buf : buf.subarray(0, remaining);
    if (kind === 'out') {
      outChunks.push(Buffer.from(take));
      outCaptured += take.length;
    } else {
      errChunks.push(Buffer.from(take));
      errCaptured += take.length;
    }
  };

  child.stdout?.on('data', (d: Buffer) => pushCapped(d, 'out'));
  child.stderr?.on('data', (d: Buffer) => pushCapped(d, 'err'));
  if (opts.stdin !== undefined && child.stdin) {
    child.stdin.on('error', () => {
      /* child exited before reading stdin */
    });
    child.stdin.end(opts.stdin);
  }

  const done = await new Promise<{ code: number | null; signal: NodeJS.Signals | null }>((resolve, reject) => {
    child.on('error', (err: NodeJS.ErrnoException) => {
      reject(
        err.code === 'ENOENT'
          ? new ToolError('not_found', `command not found: ${file}`)
          : new ToolError('internal', `failed to spawn ${file} (cwd=${opts.cwd}): ${err.message}`)
      );
    });
    child.on('close', (code, signal) => resolve({ code, signal }));
  }).finally(() => {
    clearTimeout(killTimer);
    opts.signal?.removeEventListener('abort', onAbort);
  });

  const outT = truncateBytes(
    stripAnsi(Buffer.concat(outChunks).toString('utf8')),
    maxBytes,
    outSeen > outCaptured ? outSeen : undefined
  );
  const errT = truncateBytes(
    stripAnsi(Buffer.concat(errChunks).toString('utf8')),
    maxBytes,
    errSeen > errCaptured ? errSeen : undefined
  );

  return {
    exitCode: done.code,
    signal: done.signal,
    stdout: outT.text,
    stderr: errT.text,
    timedOut,
    cancelled,
    truncated: outT.truncated || errT.truncated,
    durationMs: Date.now() - started,
    timeoutSec,
  };
}

/**
 * Render a finished process the way tools report it: stdout, then stderr
 * under a marker, then a status line for anything but a clean exit.
 */
export function formatProcessResult(r: ProcessResult): string {
  const parts: string[] = [];
  const out = r.stdout.trimEnd();
  const err = r.stderr.trimEnd();
  if (out) parts.push(out);
  if (err) parts.push(`[stderr]\n${err}`);
  if (r.timedOut) parts.push(`[killed: timed out after ${r.timeoutSec}s]`);
  else if (r.cancelled) parts.push('[killed: cancelled]');
  else if (r.exitCode !== 0) parts.push(`[exit code ${r.exitCode ?? r.signal ?? 'unknown'}]`);
  if (!parts.length) parts.push('[command completed successfully with no output]');
  return parts.join('\n');
}
