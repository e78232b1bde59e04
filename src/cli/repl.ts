import readline from 'node:readline/promises';

import { banner, err as errFmt, type Styler } from '../term.js';
import { PKG_VERSION } from '../utils.js';

import { describeOutcome, turnView } from './agent-turn.js';
import { friendlyError } from './args.js';
import { dispatchSlash, findCommand, registerAll } from './command-registry.js';
import { modelCommands } from './commands/model.js';
import { sessionCommands } from './commands/session.js';
import { toolCommands } from './commands/tools.js';
import type { ReplContext } from './repl-context.js';
import type { Runtime } from './runtime.js';

registerAll([...sessionCommands, ...modelCommands, ...toolCommands]);

export type ReplOptions = {
  runtime: Runtime;
  S: Styler;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  stateBase?: string;
};

/**
 * Interactive chat. Each line is a slash command or an instruction; while a
 * turn is suspended on a question, the next line is its answer. Ctrl-C
 * cancels a running turn and closes the prompt when idle.
 */
export async function runRepl(opts: ReplOptions): Promise<number> {
  const { runtime, S } = opts;
  const input = opts.input ?? process.stdin;
  const output = opts.output ?? process.stdout;
  const session = runtime.createSession();

  const rl = readline.createInterface({ input, output, terminal: 'isTTY' in input && input.isTTY === true });
  const lines = rl[Symbol.asyncIterator]();
  const print = (line: string) => {
    output.write(line + '\n');
  };

  let exitRequested = false;
  let turnRunning = false;
  rl.on('SIGINT', () => {
    if (turnRunning) {
      session.cancel();
      return;
    }
    rl.close();
  });

  const ctx: ReplContext = {
    runtime,
    session,
    config: runtime.config,
    S,
    print,
    stateBase: opts.stateBase,
    requestExit: () => {
      exitRequested = true;
    },
  };

  print(banner(`lathe ${PKG_VERSION}`, S));
  print(S.dim(`${runtime.config.model} @ ${runtime.config.endpoint}  ·  ${runtime.config.dir}`));
  print(S.dim('/help for commands, /exit to leave'));

  try {
    while (!exitRequested) {
      const pending = session.pending;
      rl.setPrompt(pending ? S.yellow('answer> ') : S.cyan('lathe> '));
      rl.prompt();
      const next = await lines.next();
      if (next.done) break;
      const line = next.value;
      if (!line.trim()) continue;

      const isCommand = pending ? findCommand(line) !== null : line.trim().startsWith('/');
      if (isCommand) {
        try {
          await dispatchSlash(ctx, line);
        } catch (e: unknown) {
          print(errFmt(friendlyError(e), S));
        }
        continue;
      }

      const view = turnView({ out: (t) => output.write(t), note: print }, S, runtime.config.verbose);
      turnRunning = true;
      try {
        const outcome = pending
          ? await session.resume(pending.token, line, view.hooks)
          : await session.ask(line, view.hooks);
        if (view.wroteText) output.write('\n');
        const desc = describeOutcome(outcome, S);
        if (desc) print(desc);
      } catch (e: unknown) {
        print(errFmt(friendlyError(e), S));
      } finally {
        turnRunning = false;
      }
    }
  } finally {
    rl.close();
  }
  return 0;
}
