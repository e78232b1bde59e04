import { SessionStateError, TurnBudgetExceeded } from './agent/errors.js';
import { buildSystemPrompt } from './agent/prompt.js';
import { isAbortError } from './client/errors.js';
import { Conversation } from './conversation.js';
import { enforceContextBudget, estimateToolSchemaTokens } from './history.js';
import { silentLogger, type Logger } from './log.js';
import { questionOf, type ModelClient } from './model.js';
import type { ToolExecutor } from './tools/executor.js';
import type { ToolRegistry } from './tools/registry.js';
import { ToolError } from './tools/tool-error.js';
import type { ChatMessage, LatheConfig, LoopState, ToolCall, ToolResult } from './types.js';
import { randomId } from './utils.js';

export type AgentHooks = {
  onState?: (state: LoopState) => void;
  onToken?: (t: string) => void;
  onToolCall?: (call: ToolCall) => void;
  onToolResult?: (result: ToolResult) => void;
  onRound?: (round: number) => void;
};

type Counters = { rounds: number; toolCalls: number };

export type TurnOutcome =
  | ({ kind: 'done'; text: string } & Counters)
  | ({ kind: 'needs_input'; question: string; token: string } & Counters)
  | ({ kind: 'failed'; reason: string; error: Error } & Counters)
  | ({ kind: 'cancelled' } & Counters);

export type PendingQuestion = {
  token: string;
  question: string;
  /** 'ask' for an ask_user call, 'approval' for a destructive call under confirmation: 'user'. */
  kind: 'ask' | 'approval';
};

type Suspension = {
  kind: PendingQuestion['kind'];
  question: string;
  calls: ToolCall[];
  /** The call waiting on the answer; everything after it still has to run. */
  index: number;
};

type Pending = PendingQuestion & Suspension & Counters & { roundCheckpoint: number };

type TurnCtx = Counters & {
  signal: AbortSignal;
  hooks: AgentHooks;
  /** Conversation length before the current round's assistant message. */
  roundCheckpoint: number;
};

export type AgentSession = {
  readonly conversation: Conversation;
  readonly state: LoopState;
  readonly pending: PendingQuestion | undefined;
  ask: (instruction: string, hooks?: AgentHooks) => Promise<TurnOutcome>;
  resume: (token: string, answer: string, hooks?: AgentHooks) => Promise<TurnOutcome>;
  /** Abort the running turn, or drop a pending question. */
  cancel: () => void;
  /** Cancel, then clear the conversation (system prompt kept). */
  reset: () => void;
  setSystemPrompt: (text: string) => void;
};

const APPROVE_RE = /^\s*y(es)?\s*$/i;

export function createSession(opts: {
  config: LatheConfig;
  model: ModelClient;
  registry: ToolRegistry;
  executor: ToolExecutor;
  conversation?: Conversation;
  systemPrompt?: string;
  log?: Logger;
}): AgentSession {
  const { config, model, registry, executor } = opts;
  const log = opts.log ?? silentLogger;
  const conversation = opts.conversation ?? new Conversation();

  const catalogue = registry.schemaCatalogue();
  const toolSchemaTokens = estimateToolSchemaTokens(catalogue);
  const userInputTools = new Set(registry.names().filter((n) => registry.lookup(n)?.kind === 'user_input'));

  const defaultPrompt = () =>
    opts.systemPrompt ||
    config.system_prompt ||
    buildSystemPrompt({ root: config.dir, confirmation: config.confirmation, toolNames: registry.names() });
  if (conversation.system === undefined) conversation.setSystem(defaultPrompt());

  let state: LoopState = 'idle';
  let running: AbortController | undefined;
  let pending: Pending | undefined;
  let stateHook: AgentHooks['onState'];

  const setState = (next: LoopState) => {
    if (next === state) return;
    log.debug(`${state} -> ${next}`);
    state = next;
    stateHook?.(next);
  };

  const counters = (ctx: Counters): Counters => ({ rounds: ctx.rounds, toolCalls: ctx.toolCalls });

  const record = (ctx: TurnCtx, r: ToolResult) => {
    conversation.addToolResult(r.toolCallId, r.output);
    ctx.toolCalls++;
    ctx.hooks.onToolResult?.(r);
  };

  /**
   * Execute `calls` from `from` on, in order. Stops at the first call that
   * needs an answer from the user and reports it.
   */
  async function runCalls(ctx: TurnCtx, calls: ToolCall[], from: number): Promise<Suspension | undefined> {
    for (let i = from; i < calls.length; ) {
      if (ctx.signal.aborted) return undefined;
      const call = calls[i];
      if (userInputTools.has(call.name)) {
        return { kind: 'ask', question: questionOf(call), calls, index: i };
      }
      const approval = await executor.approvalQuestion(call);
      if (approval) return { kind: 'approval', question: approval, calls, index: i };

      const group = executor.nextGroup(calls, i);
      for (const c of group) ctx.hooks.onToolCall?.(c);
      const results = await executor.executeGroup(group, { signal: ctx.signal });
      if (ctx.signal.aborted) return undefined;
      for (const r of results) record(ctx, r);
      i += group.length;
    }
    return undefined;
  }

  function suspend(ctx: TurnCtx, s: Suspension): TurnOutcome {
    const token = randomId(8);
    pending = { ...s, token, rounds: ctx.rounds, toolCalls: ctx.toolCalls, roundCheckpoint: ctx.roundCheckpoint };
    log.debug(`suspended on ${s.calls[s.index].name} (${s.kind})`);
    setState('suspended');
    return { kind: 'needs_input', question: s.question, token, ...counters(ctx) };
  }

  function cancelled(ctx: TurnCtx): TurnOutcome {
    conversation.rollback(Math.min(ctx.roundCheckpoint, conversation.length));
    setState('cancelled');
    return { kind: 'cancelled', ...counters(ctx) };
  }

  async function finish(ctx: TurnCtx, decided: string, messages: ChatMessage[]): Promise<TurnOutcome> {
    let text = decided;
    if (config.stream) {
      setState('streaming');
      let streamed = '';
      for await (const t of model.stream(messages, { signal: ctx.signal })) {
        if (ctx.signal.aborted) break;
        streamed += t;
        ctx.hooks.onToken?.(t);
      }
      if (ctx.signal.aborted) return cancelled(ctx);
      if (streamed) text = streamed;
      else if (text) ctx.hooks.onToken?.(text);
    } else if (text) {
      ctx.hooks.onToken?.(text);
    }
    conversation.addAssistant(text);
    setState('done');
    return { kind: 'done', text, ...counters(ctx) };
  }

  /** AwaitingModel ⇄ ExecutingTools until a final answer, a suspension or a failure. */
  async function loop(ctx: TurnCtx): Promise<TurnOutcome> {
    for (;;) {
      if (ctx.signal.aborted) return cancelled(ctx);
      ctx.roundCheckpoint = conversation.checkpoint();
      setState('awaiting_model');

      const messages = enforceContextBudget({
        messages: conversation.snapshot(),
        contextWindow: config.context_window,
        maxTokens: config.max_tokens,
        toolSchemaTokens,
        log,
      });
      const decision = await model.decide(messages, catalogue, {
        signal: ctx.signal,
        round: ctx.rounds + 1,
        userInputTools,
      });
      if (ctx.signal.aborted) return cancelled(ctx);

      if (decision.kind === 'final') return finish(ctx, decision.text, messages);

      if (ctx.rounds >= config.max_rounds) throw new TurnBudgetExceeded(config.max_rounds, ctx.rounds);

      conversation.addAssistantToolCalls(decision.text, decision.calls);
      ctx.rounds++;
      ctx.hooks.onRound?.(ctx.rounds);
      setState('executing_tools');

      const suspension = await runCalls(ctx, decision.calls, 0);
      if (ctx.signal.aborted) return cancelled(ctx);
      if (suspension) return suspend(ctx, suspension);
    }
  }

  async function runTurn(
    hooks: AgentHooks,
    start: Counters & { roundCheckpoint: number },
    first: (ctx: TurnCtx) => Promise<Suspension | undefined>
  ): Promise<TurnOutcome> {
    const ac = new AbortController();
    running = ac;
    stateHook = hooks.onState;
    const ctx: TurnCtx = { ...start, signal: ac.signal, hooks };
    try {
      const suspension = await first(ctx);
      if (ctx.signal.aborted) return cancelled(ctx);
      if (suspension) return suspend(ctx, suspension);
      return await loop(ctx);
    } catch (e: unknown) {
      if (ctx.signal.aborted || isAbortError(e)) return cancelled(ctx);
      const error = e instanceof Error ? e : new Error(String(e));
      // Never leave a half-answered round behind a failure.
      if (conversation.unansweredCalls().length) conversation.rollback(ctx.roundCheckpoint);
      log.debug(`turn failed: ${error.name}: ${error.message}`);
      setState('failed');
      return { kind: 'failed', reason: error.message, error, ...counters(ctx) };
    } finally {
      running = undefined;
    }
  }

  const assertIdle = (what: string) => {
    if (running) throw new SessionStateError(`cannot ${what}: a turn is already running`);
  };

  return {
    conversation,
    get state() {
      return state;
    },
    get pending(): PendingQuestion | undefined {
      return pending && { token: pending.token, question: pending.question, kind: pending.kind };
    },

    async ask(instruction, hooks = {}) {
      assertIdle('ask');
      if (pending) throw new SessionStateError('cannot ask: a question is pending; answer it or reset the session');
      return runTurn(hooks, { rounds: 0, toolCalls: 0, roundCheckpoint: conversation.checkpoint() }, async () => {
        conversation.addUser(instruction);
        return undefined;
      });
    },

    async resume(token, answer, hooks = {}) {
      assertIdle('resume');
      if (!pending || pending.token !== token) throw new SessionStateError('unknown or stale resume token');
      const p = pending;
      pending = undefined;
      const start = { rounds: p.rounds, toolCalls: p.toolCalls, roundCheckpoint: p.roundCheckpoint };
      return runTurn(hooks, start, async (ctx) => {
        setState('executing_tools');
        const call = p.calls[p.index];
        if (p.kind === 'ask') {
          record(ctx, { toolCallId: call.id, name: call.name, output: answer, ok: true });
        } else if (APPROVE_RE.test(answer)) {
          ctx.hooks.onToolCall?.(call);
          const r = await executor.execute(call, { signal: ctx.signal, approved: true });
          if (ctx.signal.aborted) return undefined;
          record(ctx, r);
        } else {
          const declined = new ToolError('confirmation_required', 'declined by user', false, 'do not retry this call; ask the user how to proceed');
          record(ctx, { toolCallId: call.id, name: call.name, output: declined.toToolResult(), ok: false, code: declined.code });
        }
        return runCalls(ctx, p.calls, p.index + 1);
      });
    },

    cancel() {
      if (running) {
        running.abort();
        return;
      }
      if (pending) {
        conversation.rollback(Math.min(pending.roundCheckpoint, conversation.length));
        pending = undefined;
        setState('cancelled');
      }
    },

    reset() {
      running?.abort();
      pending = undefined;
      conversation.clear();
      if (conversation.system === undefined) conversation.setSystem(defaultPrompt());
      setState('idle');
    },

    setSystemPrompt(text: string) {
      conversation.setSystem(text || defaultPrompt());
    },
  };
}
