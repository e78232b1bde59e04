import { parseToolCallsFromContent } from './agent/tool-calls.js';
import type { OpenAIClient } from './client.js';
import type { Logger } from './log.js';
import type { ChatMessage, Decision, LatheConfig, ToolCall, ToolSchema } from './types.js';
import { isRecord } from './utils.js';

export type DecideOptions = {
  signal?: AbortSignal;
  /** 1-based tool round this decision would start; used for synthetic call ids. */
  round: number;
  /** Tools answered by the user rather than executed. Defaults to ask_user. */
  userInputTools?: ReadonlySet<string>;
};

/** What the loop needs from a model: a decision per round, and a stream for final answers. */
export interface ModelClient {
  decide(messages: ChatMessage[], catalogue: ToolSchema[], opts: DecideOptions): Promise<Decision>;
  stream(messages: ChatMessage[], opts: { signal?: AbortSignal }): AsyncIterable<string>;
}

const DEFAULT_USER_INPUT = new Set(['ask_user']);

/** Give every call a unique id, synthesising `call_<round>_<index>` where the endpoint sent none. */
export function assignCallIds(
  raw: Array<{ id?: string; name: string; arguments: string }>,
  round: number
): ToolCall[] {
  const seen = new Set<string>();
  return raw.map((c, i) => {
    let id = c.id || `call_${round}_${i}`;
    if (seen.has(id)) {
      let n = 1;
      while (seen.has(`${id}_${n}`)) n++;
      id = `${id}_${n}`;
    }
    seen.add(id);
    return { id, name: c.name, arguments: c.arguments };
  });
}

/** The `question` argument of an ask_user call, or the raw payload when it can't be read. */
export function questionOf(call: ToolCall): string {
  try {
    const parsed: unknown = JSON.parse(call.arguments);
    if (isRecord(parsed) && typeof parsed.question === 'string' && parsed.question.trim()) {
      return parsed.question.trim();
    }
  } catch {
    // fall through to the raw text
  }
  return call.arguments.trim() || 'The assistant needs more information.';
}

/** Turn an assistant reply into a Decision. Exported for tests. */
export function toDecision(
  text: string,
  rawCalls: Array<{ id?: string; name: string; arguments: string }>,
  round: number,
  userInputTools: ReadonlySet<string>
): Decision {
  if (!rawCalls.length) return { kind: 'final', text };
  const calls = assignCallIds(rawCalls, round);
  const askIndex = calls.findIndex((c) => userInputTools.has(c.name));
  if (askIndex >= 0) {
    return { kind: 'needs_input', calls, text, question: questionOf(calls[askIndex]), askIndex };
  }
  return { kind: 'tool_calls', calls, text };
}

export class OpenAIModelClient implements ModelClient {
  constructor(
    private readonly client: OpenAIClient,
    private readonly config: LatheConfig,
    private readonly log?: Logger
  ) {}

  async decide(messages: ChatMessage[], catalogue: ToolSchema[], opts: DecideOptions): Promise<Decision> {
    const resp = await this.client.chat({
      model: this.config.model,
      messages,
      tools: catalogue,
      temperature: this.config.temperature,
      max_tokens: this.config.max_tokens,
      signal: opts.signal,
    });
    const msg = resp.choices[0].message;
    let text = msg.content ?? '';
    let rawCalls = msg.tool_calls ?? [];

    if (!rawCalls.length && text) {
      const known = new Set(catalogue.map((t) => t.function.name));
      const recovered = parseToolCallsFromContent(text);
      if (recovered?.length && recovered.every((c) => known.has(c.name))) {
        this.log?.debug(`recovered ${recovered.length} tool call(s) from message content`);
        rawCalls = recovered;
        text = '';
      }
    }

    return toDecision(text, rawCalls, opts.round, opts.userInputTools ?? DEFAULT_USER_INPUT);
  }

  stream(messages: ChatMessage[], opts: { signal?: AbortSignal }): AsyncIterable<string> {
    return this.client.streamChat({
      model: this.config.model,
      messages,
      temperature: this.config.temperature,
      max_tokens: this.config.max_tokens,
      signal: opts.signal,
    });
  }
}
