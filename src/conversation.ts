import { ConversationError } from './agent/errors.js';
import type { ChatMessage, ChatToolCall, ToolCall } from './types.js';
import { isRecord } from './utils.js';

export type Violation = { index: number; message: string };

/**
 * Check the message-sequence invariants: a system message only at the head,
 * assistant content null only alongside tool calls, and every tool message
 * answering an id from the assistant message that opened its group, once.
 */
export function validateMessages(messages: readonly ChatMessage[]): Violation[] {
  const out: Violation[] = [];
  let openCalls: Set<string> | undefined;
  let answered = new Set<string>();

  messages.forEach((m, index) => {
    switch (m.role) {
      case 'system':
        if (index !== 0) out.push({ index, message: 'system message is only allowed first' });
        openCalls = undefined;
        break;
      case 'user':
        openCalls = undefined;
        break;
      case 'assistant': {
        if (m.content === null && !m.tool_calls?.length) {
          out.push({ index, message: 'assistant content may be null only with tool_calls' });
        }
        openCalls = m.tool_calls?.length ? new Set(m.tool_calls.map((c) => c.id)) : undefined;
        if (openCalls && openCalls.size !== m.tool_calls?.length) {
          out.push({ index, message: 'duplicate tool_call id in one assistant message' });
        }
        answered = new Set();
        break;
      }
      case 'tool':
        if (!openCalls) {
          out.push({ index, message: `tool result ${m.tool_call_id} does not follow an assistant tool-call message` });
        } else if (!openCalls.has(m.tool_call_id)) {
          out.push({ index, message: `tool result ${m.tool_call_id} answers no call of the preceding assistant message` });
        } else if (answered.has(m.tool_call_id)) {
          out.push({ index, message: `tool call ${m.tool_call_id} answered twice` });
        } else {
          answered.add(m.tool_call_id);
        }
        break;
    }
  });
  return out;
}

function parseMessage(raw: unknown, line: number): ChatMessage {
  const bad = (why: string) => new ConversationError(`line ${line}: ${why}`);
  if (!isRecord(raw)) throw bad('not a JSON object');
  const content = raw.content;
  switch (raw.role) {
    case 'system':
    case 'user':
      if (typeof content !== 'string') throw bad(`${raw.role} content must be a string`);
      return raw.role === 'system' ? { role: 'system', content } : { role: 'user', content };
    case 'tool':
      if (typeof content !== 'string') throw bad('tool content must be a string');
      if (typeof raw.tool_call_id !== 'string') throw bad('tool message needs tool_call_id');
      return { role: 'tool', content, tool_call_id: raw.tool_call_id };
    case 'assistant': {
      if (content !== null && typeof content !== 'string') throw bad('assistant content must be a string or null');
      if (raw.tool_calls === undefined) return { role: 'assistant', content };
      if (!Array.isArray(raw.tool_calls)) throw bad('tool_calls must be an array');
      const tool_calls: ChatToolCall[] = raw.tool_calls.map((tc: unknown) => {
        if (
          !isRecord(tc) ||
          typeof tc.id !== 'string' ||
          !isRecord(tc.function) ||
          typeof tc.function.name !== 'string' ||
          typeof tc.function.arguments !== 'string'
        ) {
          throw bad('malformed tool call');
        }
        return { id: tc.id, type: 'function', function: { name: tc.function.name, arguments: tc.function.arguments } };
      });
      return { role: 'assistant', content, tool_calls };
    }
    default:
      throw bad(`unknown role ${JSON.stringify(raw.role)}`);
  }
}

/**
 * The message log of one chat session. Appends go through methods that keep
 * the tool-call pairing intact; readers get copies.
 */
export class Conversation {
  private msgs: ChatMessage[] = [];

  constructor(messages: ChatMessage[] = []) {
    const violations = validateMessages(messages);
    if (violations.length) {
      throw new ConversationError(`invalid conversation: message ${violations[0].index}: ${violations[0].message}`);
    }
    this.msgs = structuredClone(messages);
  }

  get length(): number {
    return this.msgs.length;
  }

  /** Ids of the last assistant tool-call message that have no result yet. */
  unansweredCalls(): string[] {
    let i = this.msgs.length - 1;
    const answered = new Set<string>();
    while (i >= 0) {
      const m = this.msgs[i];
      if (m.role !== 'tool') break;
      answered.add(m.tool_call_id);
      i--;
    }
    const head = this.msgs[i];
    if (!head || head.role !== 'assistant' || !head.tool_calls) return [];
    return head.tool_calls.map((c) => c.id).filter((id) => !answered.has(id));
  }

  private requireSettled(what: string) {
    const open = this.unansweredCalls();
    if (open.length) throw new ConversationError(`cannot add ${what}: tool calls still unanswered (${open.join(', ')})`);
  }

  /** Set or replace the leading system message. */
  setSystem(text: string): void {
    if (this.msgs[0]?.role === 'system') this.msgs[0] = { role: 'system', content: text };
    else this.msgs.unshift({ role: 'system', content: text });
  }

  get system(): string | undefined {
    const first = this.msgs[0];
    return first?.role === 'system' ? first.content : undefined;
  }

  addUser(text: string): void {
    this.requireSettled('a user message');
    this.msgs.push({ role: 'user', content: text });
  }

  addAssistant(text: string): void {
    this.requireSettled('an assistant message');
    this.msgs.push({ role: 'assistant', content: text });
  }

  addAssistantToolCalls(text: string, calls: ToolCall[]): void {
    if (!calls.length) throw new ConversationError('assistant tool-call message needs at least one call');
    if (new Set(calls.map((c) => c.id)).size !== calls.length) {
      throw new ConversationError('duplicate tool_call id in one assistant message');
    }
    this.requireSettled('an assistant message');
    this.msgs.push({
      role: 'assistant',
      content: text || null,
      tool_calls: calls.map((c) => ({ id: c.id, type: 'function', function: { name: c.name, arguments: c.arguments } })),
    });
  }

  addToolResult(toolCallId: string, content: string): void {
    if (!this.unansweredCalls().includes(toolCallId)) {
      throw new ConversationError(`tool result ${toolCallId} answers no open call of the preceding assistant message`);
    }
    this.msgs.push({ role: 'tool', content, tool_call_id: toolCallId });
  }

  /** Answer every open call of the last tool-call message with `content`; returns the ids closed. */
  closeOpenCalls(content: string): string[] {
    const open = this.unansweredCalls();
    for (const id of open) this.msgs.push({ role: 'tool', content, tool_call_id: id });
    return open;
  }

  checkpoint(): number {
    return this.msgs.length;
  }

  /** Drop everything appended since `checkpoint`. */
  rollback(checkpoint: number): void {
    if (checkpoint < 0 || checkpoint > this.msgs.length) {
      throw new ConversationError(`invalid checkpoint ${checkpoint} (length ${this.msgs.length})`);
    }
    this.msgs.length = checkpoint;
  }

  /** Independent copy of the log. */
  snapshot(): ChatMessage[] {
    return structuredClone(this.msgs);
  }

  /** Clear the log, keeping the system message unless told otherwise. */
  clear(keepSystem = true): void {
    const sys = keepSystem ? this.msgs[0] : undefined;
    this.msgs = sys?.role === 'system' ? [sys] : [];
  }

  /** Swap in another log wholesale, e.g. a loaded transcript. */
  replace(other: Conversation): void {
    this.msgs = other.snapshot();
  }

  toJSONL(): string {
    return this.msgs.map((m) => JSON.stringify(m)).join('\n') + (this.msgs.length ? '\n' : '');
  }

  static fromJSONL(text: string): Conversation {
    const messages: ChatMessage[] = [];
    text.split('\n').forEach((line, i) => {
      if (!line.trim()) return;
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        throw new ConversationError(`line ${i + 1}: not valid JSON`);
      }
      messages.push(parseMessage(raw, i + 1));
    });
    return new Conversation(messages);
  }
}
