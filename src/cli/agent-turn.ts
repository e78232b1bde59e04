/**
 * Terminal rendering of one agent turn, shared by the REPL and `lathe ask`.
 */

import type { AgentHooks, TurnOutcome } from '../agent.js';
import { err as errFmt, toolLine, type Styler } from '../term.js';

import { friendlyError } from './args.js';

export type TurnWriter = {
  /** Answer text (stdout). */
  out: (text: string) => void;
  /** Progress and diagnostics (stderr in one-shot mode). */
  note: (line: string) => void;
};

export type TurnView = {
  hooks: AgentHooks;
  /** True once any answer text has been written. */
  readonly wroteText: boolean;
};

export function turnView(w: TurnWriter, S: Styler, verbose = false): TurnView {
  let wroteText = false;
  const hooks: AgentHooks = {
    onToken: (t) => {
      wroteText = true;
      w.out(t);
    },
    onToolCall: (call) => {
      if (verbose) w.note(S.dim(`→ ${call.name} ${call.arguments.slice(0, 160)}`));
    },
    onToolResult: (r) => w.note(toolLine(r.name, r.ok, r.ok ? '' : r.output.replace(/^ERROR: [^\n]*\n(msg=)?/, ''), S)),
  };
  return {
    hooks,
    get wroteText() {
      return wroteText;
    },
  };
}

/** Exit codes for a turn that ended without an answer on an interactive terminal. */
export const EXIT = { ok: 0, failed: 1, needsInput: 2, cancelled: 130 } as const;

/** Final line(s) for an outcome; the answer text itself has already streamed through hooks. */
export function describeOutcome(o: TurnOutcome, S: Styler): string | undefined {
  switch (o.kind) {
    case 'done':
      return undefined;
    case 'needs_input':
      return `${S.yellow('?')} ${o.question}`;
    case 'failed':
      return errFmt(friendlyError(o.error), S);
    case 'cancelled':
      return S.dim('[cancelled]');
  }
}
