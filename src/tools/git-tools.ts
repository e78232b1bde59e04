import { argBool, argInt, argOptStr, argStr, type ToolArgs } from './args.js';
import type { ToolContext, ToolDef } from './registry.js';
import { bool, confirmFlag, int, obj, str } from './schema.js';
import { processOutcome } from './shell-tools.js';
import { ToolError } from './tool-error.js';

async function git(ctx: ToolContext, args: string[]): Promise<string> {
  const r = await ctx.sandbox.runProcess(['git', ...args], {
    signal: ctx.signal,
    env: { GIT_TERMINAL_PROMPT: '0', GIT_PAGER: 'cat' },
  });
  return processOutcome(`git ${args[0]}`, r);
}

const gitStatus: ToolDef = {
  descriptor: {
    name: 'git_status',
    description: 'Show the working tree status (git status -sb).',
    readOnly: true,
    parameters: obj({}),
  },
  handler: (_args, ctx) => git(ctx, ['status', '-sb']),
};

const gitDiff: ToolDef = {
  descriptor: {
    name: 'git_diff',
    description: 'Show unstaged changes, or staged ones with staged=true. Optionally limited to one path.',
    readOnly: true,
    parameters: obj({
      staged: bool('Diff the index against HEAD instead of the working tree', false),
      path: str('Limit the diff to this path'),
    }),
  },
  async handler(args, ctx) {
    const argv = ['diff'];
    if (argBool(args, 'staged')) argv.push('--staged');
    const p = argOptStr(args, 'path');
    if (p !== undefined) argv.push('--', await ctx.sandbox.relative(await ctx.sandbox.requirePath(p)));
    return git(ctx, argv);
  },
};

const gitLog: ToolDef = {
  descriptor: {
    name: 'git_log',
    description: 'Show recent commits, one per line.',
    readOnly: true,
    parameters: obj({ limit: int('Number of commits', { min: 1, max: 200, default: 10 }) }),
  },
  handler: (args, ctx) => git(ctx, ['log', '--oneline', '-n', String(argInt(args, 'limit', 10))]),
};

const gitCommit: ToolDef = {
  descriptor: {
    name: 'git_commit',
    description: 'Commit staged changes, or all tracked changes with all=true.',
    parameters: obj(
      {
        message: str('Commit message', { minLength: 1 }),
        all: bool('Stage modified and deleted tracked files first (git commit -a)', false),
      },
      ['message']
    ),
  },
  handler(args, ctx) {
    const argv = ['commit'];
    if (argBool(args, 'all')) argv.push('-a');
    argv.push('-m', argStr(args, 'message'));
    return git(ctx, argv);
  },
};

/** Remote and refspec as given. Anything starting with `-` would reach git as an option. */
function pushTarget(args: ToolArgs): { remote: string; branch?: string } {
  const remote = argOptStr(args, 'remote') ?? 'origin';
  const branch = argOptStr(args, 'branch') || undefined;
  for (const [field, value] of [['remote', remote], ['branch', branch]] as const) {
    if (value?.startsWith('-')) throw new ToolError('invalid_args', `git_push: ${field} must not start with "-" (got ${value})`);
  }
  return { remote, branch };
}

function pushHazard(args: ToolArgs): string | undefined {
  const { branch } = pushTarget(args);
  if (args.force === true || branch?.startsWith('+')) return 'force-push rewrites remote history';
  if (branch?.startsWith(':')) return 'an empty source deletes the remote branch';
  return undefined;
}

const gitPush: ToolDef = {
  descriptor: {
    name: 'git_push',
    description:
      'Push to a remote. force=true, or a branch refspec starting with "+", rewrites remote history and needs confirm=true.',
    parameters: obj({
      remote: str('Remote name', { default: 'origin' }),
      branch: str('Branch to push; defaults to the current upstream'),
      force: bool('Force-push', false),
      confirm: confirmFlag(),
    }),
    destructive: (args) => pushHazard(args),
  },
  handler(args, ctx) {
    const { remote, branch } = pushTarget(args);
    const argv = ['push'];
    if (argBool(args, 'force')) argv.push('--force');
    argv.push('--', remote);
    if (branch) argv.push(branch);
    return git(ctx, argv);
  },
};

export const gitTools: ToolDef[] = [gitStatus, gitDiff, gitLog, gitCommit, gitPush];
