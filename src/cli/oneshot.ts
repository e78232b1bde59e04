/**
 * `lathe ask`: one instruction, one turn, an exit code.
 */

import type { AgentSession, TurnOutcome } from '../agent.js';
import type { Styler } from '../term.js';

import { EXIT, describeOutcome, turnView, type TurnWriter } from './agent-turn.js';

export type OneShotOpts = {
  session: AgentSession;
  instruction: string;
  S: Styler;
  writer: TurnWriter;
  verbose?: boolean;
  /**
   * Reads an answer when the turn asks a question. Absent when stdin is not
   * interactive; the run then stops with EXIT.needsInput.
   */
  answer?: (question: string) => Promise<string>;
};

export async function runOneShot(opts: OneShotOpts): Promise<number> {
  const { session, S, writer } = opts;
  const view = turnView(writer, S, opts.verbose);

  let outcome: TurnOutcome = await session.ask(opts.instruction, view.hooks);
  while (outcome.kind === 'needs_input' && opts.answer) {
    const answer = await opts.answer(outcome.question);
    outcome = await session.resume(outcome.token, answer, view.hooks);
  }

  if (outcome.kind === 'done') {
    if (view.wroteText) writer.out('\n');
    return EXIT.ok;
  }

  if (view.wroteText) writer.out('\n');
  const line = describeOutcome(outcome, S);
  if (line) writer.note(line);
  if (outcome.kind === 'needs_input') return EXIT.needsInput;
  if (outcome.kind === 'cancelled') return EXIT.cancelled;
  return EXIT.failed;
}
