import type { Logger } from './log.js';
import type { ChatMessage } from './types.js';

function messageChars(m: ChatMessage): number {
  let chars = (m.content ?? '').length + 20;
  if (m.role === 'assistant' && m.tool_calls) {
    for (const t of m.tool_calls) chars += t.function.name.length + t.function.arguments.length + 30;
  }
  return chars;
}

export function estimateTokensFromMessages(messages: ChatMessage[]): number {
  // crude: chars/4 plus per-message framing
  let chars = 0;
  for (const m of messages) chars += messageChars(m);
  return Math.ceil(chars / 4);
}

/** Tokens the `tools` array costs on every request (JSON length / 4). */
export function estimateToolSchemaTokens(tools: unknown[] | undefined): number {
  if (!tools || tools.length === 0) return 0;
  let chars = 0;
  for (const t of tools) chars += JSON.stringify(t).length;
  return Math.ceil(chars / 4);
}

/**
 * Exclusive end of the group starting at `idx`: an assistant message with
 * tool_calls plus the tool results that follow it. Any other message is a
 * group of one.
 */
function groupEnd(msgs: ChatMessage[], idx: number): number {
  const m = msgs[idx];
  if (m.role !== 'assistant' || !m.tool_calls?.length) return idx + 1;
  let i = idx + 1;
  while (i < msgs.length && msgs[i].role === 'tool') i++;
  return i;
}

/**
 * Trim the message list sent to the model so it fits the context window.
 * The oldest tool-call groups go first, then the oldest messages; the system
 * message and the last `minTailMessages` are kept. Groups are dropped whole,
 * so no tool message is ever left without its assistant message.
 * The input array is not modified.
 */
export function enforceContextBudget(opts: {
  messages: ChatMessage[];
  contextWindow: number;
  maxTokens: number;
  toolSchemaTokens?: number;
  minTailMessages?: number;
  log?: Logger;
}): ChatMessage[] {
  const minTail = opts.minTailMessages ?? 4;
  const reserve = 1024 + (opts.toolSchemaTokens ?? 800);
  const budget = Math.max(1024, opts.contextWindow - opts.maxTokens - reserve);

  const msgs = [...opts.messages];
  const before = estimateTokensFromMessages(msgs);
  if (before <= budget) return msgs;

  const sysStart = msgs[0]?.role === 'system' ? 1 : 0;
  let tokens = before;

  const drop = (start: number) => {
    const end = groupEnd(msgs, start);
    for (const d of msgs.splice(start, end - start)) tokens -= Math.ceil(messageChars(d) / 4);
  };

  // Phase 1: oldest tool-call groups outside the protected tail.
  for (let i = sysStart; tokens > budget && i < msgs.length - minTail; ) {
    const m = msgs[i];
    if (m.role === 'assistant' && m.tool_calls?.length && groupEnd(msgs, i) <= msgs.length - minTail) drop(i);
    else i++;
  }

  // Phase 2: oldest messages of any kind.
  while (tokens > budget && msgs.length - sysStart > minTail) {
    if (groupEnd(msgs, sysStart) > msgs.length - minTail) break;
    drop(sysStart);
  }

  // A trimmed head must not start with orphaned tool results.
  while (msgs.length > sysStart && msgs[sysStart].role === 'tool') drop(sysStart);

  const dropped = opts.messages.length - msgs.length;
  if (dropped > 0) {
    opts.log?.debug(`context budget: dropped ${dropped} old messages (~${before - tokens} tokens, budget ${budget})`);
  }
  return msgs;
}
