import readline from 'node:readline/promises';

import { Command, CommanderError } from 'commander';

import { loadConfig } from '../config.js';
import type { ProcessResult } from '../types.js';
import { makeStyler, resolveColorMode, err as errFmt, type Styler } from '../term.js';
import { PKG_VERSION } from '../utils.js';

import { EXIT } from './agent-turn.js';
import { cliOverrides, friendlyError, parseConfirmation, parsePositiveInt, type GlobalOpts } from './args.js';
import { formatToolList } from './commands/tools.js';
import { runOneShot } from './oneshot.js';
import { runRepl } from './repl.js';
import { buildRuntime, type Runtime, type RuntimeOverrides } from './runtime.js';

export type CliDeps = {
  overrides?: RuntimeOverrides;
  stdin?: NodeJS.ReadableStream;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  /** Where transcripts live; defaults to the state dir. */
  stateBase?: string;
};

type Io = {
  out: (text: string) => void;
  line: (text: string) => void;
  note: (text: string) => void;
};

function isInteractive(stream: NodeJS.ReadableStream | NodeJS.WritableStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true;
}

/**
 * Parse argv (without the node/script prefix) and run the chosen command.
 * Resolves to the process exit code; nothing here calls process.exit.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdin = deps.stdin ?? process.stdin;
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const io: Io = {
    out: (t) => {
      stdout.write(t);
    },
    line: (t) => {
      stdout.write(t + '\n');
    },
    note: (t) => {
      stderr.write(t + '\n');
    },
  };

  let exitCode = 0;

  const setup = async (cmd: Command): Promise<{ rt: Runtime; S: Styler }> => {
    const g = cmd.optsWithGlobals<GlobalOpts>();
    const { config } = await loadConfig({ configPath: g.config, cli: cliOverrides(g) });
    const S = makeStyler(resolveColorMode(config.color, { isTTY: isInteractive(stdout) }).enabled);
    const rt = await buildRuntime(config, deps.overrides);
    return { rt, S };
  };

  const program = new Command()
    .name('lathe')
    .description('Terminal agent: turns requests into sandboxed tool calls through an OpenAI-compatible model')
    .version(PKG_VERSION)
    .option('--endpoint <url>', 'model endpoint base URL')
    .option('--model <name>', 'chat model')
    .option('--dir <path>', 'workspace root every tool is confined to')
    .option('--api-key <key>', 'bearer token for the endpoint')
    .option('--max-rounds <n>', 'tool rounds allowed per turn', parsePositiveInt)
    .option('--no-stream', 'do not stream the final answer')
    .option('--confirmation <policy>', 'who approves destructive calls: model or user', parseConfirmation)
    .option('--verbose', 'debug logging')
    .option('--config <path>', 'config file (default: <config dir>/config.json)')
    .option('--no-color', 'disable colour')
    .exitOverride()
    .configureOutput({
      writeOut: (s) => {
        stdout.write(s);
      },
      writeErr: (s) => {
        stderr.write(s);
      },
    });

  program
    .command('chat', { isDefault: true })
    .description('interactive session (default)')
    .action(async (_opts: object, cmd: Command) => {
      const { rt, S } = await setup(cmd);
      exitCode = await runRepl({ runtime: rt, S, input: stdin, output: stdout, stateBase: deps.stateBase });
    });

  program
    .command('ask')
    .description('run one instruction and print the answer')
    .argument('<prompt...>', 'the instruction')
    .action(async (prompt: string[], _opts: object, cmd: Command) => {
      const { rt, S } = await setup(cmd);
      const session = rt.createSession();

      let rl: readline.Interface | undefined;
      const answer = isInteractive(stdin)
        ? async (question: string) => {
            const iface = (rl ??= readline.createInterface({ input: stdin, output: stderr }));
            return iface.question(`${S.yellow('?')} ${question}\n${S.yellow('answer> ')}`);
          }
        : undefined;

      const onSigint = () => session.cancel();
      process.on('SIGINT', onSigint);
      try {
        exitCode = await runOneShot({
          session,
          instruction: prompt.join(' '),
          S,
          writer: { out: io.out, note: io.note },
          verbose: rt.config.verbose,
          answer,
        });
      } finally {
        process.off('SIGINT', onSigint);
        rl?.close();
      }
    });

  program
    .command('index')
    .description('build the retrieval index')
    .argument('[paths...]', 'files or directories inside the workspace', ['.'])
    .action(async (paths: string[], _opts: object, cmd: Command) => {
      const { rt, S } = await setup(cmd);
      const s = await rt.index.build(paths.length ? paths : ['.']);
      io.line(`indexed ${s.chunks} chunks from ${s.files} files (${s.skipped} skipped, dim ${s.dim})`);
      io.line(S.dim(s.dir));
    });

  program
    .command('search')
    .description('query the retrieval index')
    .argument('<query...>', 'what to look for')
    .option('-k, --k <n>', 'number of results', parsePositiveInt, 5)
    .action(async (query: string[], opts: { k: number }, cmd: Command) => {
      const { rt, S } = await setup(cmd);
      const hits = await rt.index.query(query.join(' '), opts.k);
      if (!hits.length) io.line(S.dim('[no matches]'));
      for (const h of hits) {
        io.line(`${h.score.toFixed(3)}  ${S.bold(h.chunkId)}`);
        for (const l of h.snippet.split('\n')) io.line(S.dim(`    ${l}`));
      }
    });

  /** Run a sandboxed process with Ctrl-C wired to cancel, copying its output and exit status through. */
  async function passThrough(S: Styler, start: (signal: AbortSignal) => Promise<ProcessResult>) {
    const ac = new AbortController();
    const onSigint = () => ac.abort();
    process.on('SIGINT', onSigint);
    try {
      const r = await start(ac.signal);
      if (r.stdout) io.out(r.stdout.endsWith('\n') ? r.stdout : r.stdout + '\n');
      if (r.stderr) stderr.write(r.stderr.endsWith('\n') ? r.stderr : r.stderr + '\n');
      if (r.timedOut) {
        io.note(errFmt(`timed out after ${r.timeoutSec}s`, S));
        exitCode = 124;
      } else if (r.cancelled) {
        exitCode = EXIT.cancelled;
      } else {
        exitCode = r.exitCode ?? EXIT.failed;
      }
    } finally {
      process.off('SIGINT', onSigint);
    }
  }

  program
    .command('exec')
    .description('run a shell command through the sandbox')
    .argument('<command...>', 'command line')
    .option('--confirm', 'allow commands that need confirmation')
    .option('--timeout <s>', 'timeout in seconds (capped by max_timeout)', parsePositiveInt)
    .action(async (words: string[], opts: { confirm?: boolean; timeout?: number }, cmd: Command) => {
      const { rt, S } = await setup(cmd);
      const command = words.join(' ');
      const verdict = rt.sandbox.classifyCommand(command);
      if (verdict.verdict === 'blocked') {
        io.note(errFmt(`blocked: ${verdict.reason}`, S));
        exitCode = EXIT.failed;
        return;
      }
      if (verdict.confirm && !opts.confirm) {
        io.note(errFmt(`needs --confirm: ${verdict.confirm}`, S));
        exitCode = EXIT.failed;
        return;
      }

      await passThrough(S, (signal) => rt.sandbox.runShell(command, { timeoutSec: opts.timeout, signal }));
    });

  program
    .command('run')
    .description('run a workspace Python script through the sandbox')
    .argument('<path>', 'script path inside the workspace')
    .argument('[args...]', 'arguments for the script')
    .option('--timeout <s>', 'timeout in seconds (capped by max_timeout)', parsePositiveInt)
    .action(async (scriptPath: string, args: string[], opts: { timeout?: number }, cmd: Command) => {
      const { rt, S } = await setup(cmd);
      const script = await rt.sandbox.requirePath(scriptPath);
      await passThrough(S, (signal) => rt.sandbox.runProcess(['python3', script, ...args], { timeoutSec: opts.timeout, signal }));
    });

  program
    .command('tools')
    .description('list the tool catalogue')
    .action(async (_opts: object, cmd: Command) => {
      const { rt, S } = await setup(cmd);
      for (const l of formatToolList(rt.registry, S)) io.line(l);
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (e: unknown) {
    if (e instanceof CommanderError) {
      // help and version exit through here with code 0
      return e.exitCode;
    }
    io.note(errFmt(friendlyError(e), makeStyler(resolveColorMode('auto', { isTTY: isInteractive(stderr) }).enabled)));
    return EXIT.failed;
  }
  return exitCode;
}
