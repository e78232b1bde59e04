import type { ProcessResult } from '../types.js';

import { argOptInt, argOptStr, argStr, argStrList } from './args.js';
import { formatProcessResult } from './exec-core.js';
import type { ToolDef } from './registry.js';
import { arr, confirmFlag, int, obj, str } from './schema.js';
import { ToolError } from './tool-error.js';

/**
 * Map a finished process onto a tool outcome: a clean exit returns the
 * rendered output, anything else raises with that output attached.
 */
export function processOutcome(label: string, r: ProcessResult): string {
  const rendered = formatProcessResult(r);
  if (r.timedOut) {
    throw new ToolError('timeout', `${label} timed out after ${r.timeoutSec}s\n${rendered}`, true, 'raise timeout or make the command faster');
  }
  if (r.cancelled) throw new ToolError('cancelled', `${label} was cancelled\n${rendered}`);
  if (r.exitCode !== 0) {
    throw new ToolError('exit_status', `${label} failed with exit code ${r.exitCode ?? r.signal ?? 'unknown'}\n${rendered}`);
  }
  return rendered;
}

const timeoutParam = () => int('Timeout in seconds (capped by max_timeout)', { min: 1 });

const runShell: ToolDef = {
  descriptor: {
    name: 'run_shell',
    description:
      'Run a bash command in the workspace. Output is captured and capped. Risky commands need confirm=true; some are never allowed.',
    parameters: obj(
      {
        command: str('The bash command line', { minLength: 1 }),
        cwd: str('Working directory, relative to the workspace root'),
        timeout: timeoutParam(),
        confirm: confirmFlag(),
      },
      ['command']
    ),
    destructive(args, ctx) {
      if (typeof args.command !== 'string') return undefined;
      const v = ctx.sandbox.classifyCommand(args.command);
      return v.verdict === 'allowed' ? v.confirm : undefined;
    },
  },
  async handler(args, ctx) {
    const command = argStr(args, 'command');
    const r = await ctx.sandbox.runShell(command, {
      cwd: argOptStr(args, 'cwd'),
      timeoutSec: argOptInt(args, 'timeout'),
      signal: ctx.signal,
    });
    return processOutcome('command', r);
  },
};

const runPython: ToolDef = {
  descriptor: {
    name: 'run_python',
    description: 'Run a Python script from the workspace with python3.',
    parameters: obj(
      {
        path: str('Script path, relative to the workspace root'),
        args: arr(str(), 'Command-line arguments for the script', []),
        timeout: timeoutParam(),
      },
      ['path']
    ),
  },
  async handler(args, ctx) {
    const script = await ctx.sandbox.requirePath(args.path);
    const r = await ctx.sandbox.runProcess(['python3', script, ...argStrList(args, 'args')], {
      timeoutSec: argOptInt(args, 'timeout'),
      signal: ctx.signal,
    });
    return processOutcome('script', r);
  },
};

export const shellTools: ToolDef[] = [runShell, runPython];
