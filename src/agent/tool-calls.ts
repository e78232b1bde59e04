import { isRecord } from '../utils.js';

/** A tool call recovered from message text, before an id is assigned. */
export type ContentToolCall = { name: string; arguments: string };

const tryParse = (s: string): unknown => {
  try {
    return JSON.parse(s);
  } catch {
    return undefined;
  }
};

const argString = (v: unknown): string => (typeof v === 'string' ? v : JSON.stringify(v ?? {}));

/** `{name, arguments}` or a wire-shaped `{function: {name, arguments}}`. */
function asCall(v: unknown): ContentToolCall | undefined {
  if (!isRecord(v)) return undefined;
  if (typeof v.name === 'string' && v.name && v.arguments !== undefined) {
    return { name: v.name, arguments: argString(v.arguments) };
  }
  if (isRecord(v.function) && typeof v.function.name === 'string' && v.function.name) {
    return { name: v.function.name, arguments: argString(v.function.arguments) };
  }
  return undefined;
}

function fromParsed(v: unknown): ContentToolCall[] | undefined {
  if (isRecord(v) && Array.isArray(v.tool_calls)) {
    const calls = v.tool_calls.map(asCall);
    return calls.every((c): c is ContentToolCall => c !== undefined) && calls.length ? calls : undefined;
  }
  if (Array.isArray(v)) {
    const calls = v.map(asCall);
    return calls.length && calls.every((c): c is ContentToolCall => c !== undefined) ? calls : undefined;
  }
  const one = asCall(v);
  return one ? [one] : undefined;
}

/** Split text into its top-level `{...}` spans, skipping braces inside strings. */
function topLevelObjects(text: string): string[] {
  const objects: string[] = [];
  let depth = 0;
  let start = -1;
  let inStr = false;
  let esc = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inStr) {
      if (esc) esc = false;
      else if (ch === '\\') esc = true;
      else if (ch === '"') inStr = false;
      continue;
    }
    if (ch === '"') {
      inStr = true;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}') {
      if (depth > 0) depth--;
      if (depth === 0 && start !== -1) {
        objects.push(text.slice(start, i + 1));
        start = -1;
      }
    }
  }
  return objects;
}

/**
 * `<tool_call>{"name": ..., "arguments": ...}</tool_call>` blocks, or the
 * XML-parameter form `<tool_call><function=name><parameter=k>v</parameter></function></tool_call>`.
 */
function parseTaggedCalls(content: string): ContentToolCall[] | undefined {
  if (!content.includes('<tool_call>')) return undefined;
  const calls: ContentToolCall[] = [];
  const blockRe = /<tool_call>([\s\S]*?)<\/tool_call>/g;
  let m: RegExpExecArray | null;
  while ((m = blockRe.exec(content)) !== null) {
    const block = m[1].trim();
    const json = fromParsed(tryParse(block));
    if (json) {
      calls.push(...json);
      continue;
    }
    const fn = /<function=([\w.-]+)>/.exec(block);
    if (!fn) continue;
    const args: Record<string, string> = {};
    const paramRe = /<parameter=([\w.-]+)>([\s\S]*?)<\/parameter>/g;
    let p: RegExpExecArray | null;
    while ((p = paramRe.exec(block)) !== null) {
      args[p[1]] = p[2].replace(/^\n/, '').replace(/\n$/, '');
    }
    calls.push({ name: fn[1], arguments: JSON.stringify(args) });
  }
  return calls.length ? calls : undefined;
}

/**
 * Recover tool calls a model wrote into its message text instead of the
 * structured field. Returns undefined when the text doesn't look like one.
 */
export function parseToolCallsFromContent(content: string): ContentToolCall[] | undefined {
  const trimmed = content.trim();
  if (!trimmed) return undefined;

  const tagged = parseTaggedCalls(trimmed);
  if (tagged) return tagged;

  // Whole body is JSON, optionally fenced.
  const fenced = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/.exec(trimmed);
  const whole = fromParsed(tryParse(fenced ? fenced[1] : trimmed));
  if (whole) return whole;

  // Several objects back to back, one call each.
  const objects = topLevelObjects(trimmed);
  if (objects.length > 1 && objects.reduce((rest, o) => rest.replace(o, ''), trimmed).trim() === '') {
    const calls: ContentToolCall[] = [];
    for (const o of objects) {
      const parsed = fromParsed(tryParse(o));
      if (!parsed) return undefined;
      calls.push(...parsed);
    }
    return calls;
  }
  return undefined;
}
