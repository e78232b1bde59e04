import { setTimeout as delay } from 'node:timers/promises';
import { Agent, fetch, type RequestInit, type Response } from 'undici';

import { ProtocolError, TransportError, asError, getRetryDelayMs, isAbortError, isConnRefused } from './client/errors.js';
import type { Logger } from './log.js';
import type { ChatCompletionResponse, ChatMessage, ModelsResponse, ToolSchema } from './types.js';
import { isRecord } from './utils.js';

// ── Persistent connection pool ───────────────────────────────────────────
// Reuses TCP+TLS connections across requests; every call goes through
// undici's fetch with this dispatcher.
const pooledAgent = new Agent({
  keepAliveTimeout: 30_000,
  keepAliveMaxTimeout: 120_000,
  connections: 16,
  pipelining: 1,
  connect: {
    rejectUnauthorized: true,
  },
});

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type ClientOptions = {
  endpoint: string;
  apiKey?: string;
  /** Seconds to wait for a complete response (or between stream chunks). */
  responseTimeoutSec?: number;
  /** Seconds to wait for response headers. */
  connectionTimeoutSec?: number;
  log?: Logger;
  /** Replaces undici's fetch; tests use it to stand in for the server. */
  fetchImpl?: FetchLike;
};

export type ChatRequest = {
  model: string;
  messages: ChatMessage[];
  tools?: ToolSchema[];
  temperature?: number;
  max_tokens?: number;
  signal?: AbortSignal;
};

const MAX_ATTEMPTS = 3;

// ── Response validation ──────────────────────────────────────────────────

function parseToolCallWire(raw: unknown, i: number): { id?: string; name: string; arguments: string } {
  if (!isRecord(raw) || !isRecord(raw.function) || typeof raw.function.name !== 'string') {
    throw new ProtocolError(`tool_calls[${i}] has no function name`);
  }
  const args = raw.function.arguments;
  return {
    ...(typeof raw.id === 'string' && raw.id ? { id: raw.id } : {}),
    name: raw.function.name,
    // Some servers send arguments as an object rather than a JSON string.
    arguments: typeof args === 'string' ? args : args === undefined ? '' : JSON.stringify(args),
  };
}

/** Validate a /chat/completions body and normalise its tool calls. */
export function parseChatResponse(raw: unknown): ChatCompletionResponse {
  if (!isRecord(raw) || !Array.isArray(raw.choices) || raw.choices.length === 0) {
    throw new ProtocolError('response has no choices');
  }
  const first = raw.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) throw new ProtocolError('choices[0] has no message');

  const msg = first.message;
  if (msg.content !== undefined && msg.content !== null && typeof msg.content !== 'string') {
    throw new ProtocolError('message.content must be a string or null');
  }
  if (msg.tool_calls !== undefined && msg.tool_calls !== null && !Array.isArray(msg.tool_calls)) {
    throw new ProtocolError('message.tool_calls must be an array');
  }
  const toolCalls = Array.isArray(msg.tool_calls) ? msg.tool_calls.map(parseToolCallWire) : undefined;

  const usage = isRecord(raw.usage) ? raw.usage : undefined;
  const num = (v: unknown) => (typeof v === 'number' ? v : undefined);

  return {
    ...(typeof raw.id === 'string' && { id: raw.id }),
    ...(typeof raw.model === 'string' && { model: raw.model }),
    choices: [
      {
        index: 0,
        message: {
          role: 'assistant',
          content: typeof msg.content === 'string' ? msg.content : null,
          ...(toolCalls?.length ? { tool_calls: toolCalls } : {}),
        },
        finish_reason: typeof first.finish_reason === 'string' ? first.finish_reason : null,
      },
    ],
    ...(usage && {
      usage: {
        prompt_tokens: num(usage.prompt_tokens),
        completion_tokens: num(usage.completion_tokens),
        total_tokens: num(usage.total_tokens),
      },
    }),
  };
}

function parseEmbeddings(raw: unknown, expected: number): number[][] {
  if (!isRecord(raw) || !Array.isArray(raw.data)) throw new ProtocolError('embeddings response has no data array');
  const rows = raw.data.map((d: unknown, i: number) => {
    if (!isRecord(d) || !Array.isArray(d.embedding) || !d.embedding.every((x: unknown) => typeof x === 'number')) {
      throw new ProtocolError(`data[${i}].embedding must be an array of numbers`);
    }
    const embedding: number[] = d.embedding;
    return { index: typeof d.index === 'number' ? d.index : i, embedding };
  });
  if (rows.length !== expected) {
    throw new ProtocolError(`expected ${expected} embeddings, got ${rows.length}`);
  }
  return rows.sort((a, b) => a.index - b.index).map((r) => r.embedding);
}

function parseModels(raw: unknown): ModelsResponse {
  if (!isRecord(raw) || !Array.isArray(raw.data)) throw new ProtocolError('models response has no data array');
  const data: ModelsResponse['data'] = [];
  for (const m of raw.data) {
    if (isRecord(m) && typeof m.id === 'string') {
      data.push({ id: m.id, ...(typeof m.owned_by === 'string' && { owned_by: m.owned_by }) });
    }
  }
  return { data };
}

/** Pull the content delta out of one SSE `data:` payload; undefined when there is none. */
export function parseStreamDelta(payload: string): string | undefined {
  let obj: unknown;
  try {
    obj = JSON.parse(payload);
  } catch {
    throw new ProtocolError(`malformed stream event: ${payload.slice(0, 200)}`);
  }
  if (!isRecord(obj) || !Array.isArray(obj.choices)) return undefined;
  const choice = obj.choices[0];
  if (!isRecord(choice) || !isRecord(choice.delta)) return undefined;
  return typeof choice.delta.content === 'string' && choice.delta.content ? choice.delta.content : undefined;
}

// ── Client ───────────────────────────────────────────────────────────────

/** Minimal client for an OpenAI-compatible chat/embeddings endpoint. */
export class OpenAIClient {
  readonly endpoint: string;
  private readonly apiKey: string;
  private readonly responseTimeoutMs: number;
  private readonly connectionTimeoutMs: number;
  private readonly log?: Logger;
  private readonly fetchImpl: FetchLike;

  constructor(opts: ClientOptions) {
    this.endpoint = opts.endpoint.replace(/\/+$/, '');
    this.apiKey = opts.apiKey ?? '';
    this.responseTimeoutMs = Math.max(1, opts.responseTimeoutSec ?? 300) * 1000;
    this.connectionTimeoutMs = Math.max(1, opts.connectionTimeoutSec ?? 30) * 1000;
    this.log = opts.log;
    this.fetchImpl = opts.fetchImpl ?? ((url, init) => fetch(url, { ...init, dispatcher: pooledAgent }));
  }

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) h.Authorization = `Bearer ${this.apiKey}`;
    return h;
  }

  /** Wrap fetch with a connection/header timeout, chained to the caller's signal. */
  private async fetchWithConnTimeout(url: string, init: RequestInit, signal?: AbortSignal): Promise<Response> {
    const ac = new AbortController();
    const onCallerAbort = () => ac.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });
    const timer = setTimeout(() => ac.abort(), this.connectionTimeoutMs);
    try {
      // The caller listener stays attached so an abort still tears down the body read.
      return await this.fetchImpl(url, { ...init, signal: ac.signal });
    } catch (e: unknown) {
      signal?.removeEventListener('abort', onCallerAbort);
      if (ac.signal.aborted && !signal?.aborted) {
        throw new TransportError(`connection timeout (${this.connectionTimeoutMs}ms) to ${url}`, undefined, true);
      }
      throw asError(e, `connection failure to ${url}`);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * POST with the shared retry policy: 503/429 and other 5xx back off
   * 2s/4s/8s, refused connections retry every 2s, three attempts in all.
   * Caller aborts propagate untouched.
   */
  private async postWithRetry(pathname: string, body: unknown, signal: AbortSignal): Promise<Response> {
    const url = `${this.endpoint}${pathname}`;
    let lastErr: Error = new TransportError(`POST ${pathname} failed without response`, undefined, true);

    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      let res: Response;
      try {
        this.log?.debug(`→ POST ${url} (attempt ${attempt + 1}/${MAX_ATTEMPTS})`);
        res = await this.fetchWithConnTimeout(
          url,
          { method: 'POST', headers: this.headers(), body: JSON.stringify(body) },
          signal
        );
      } catch (e: unknown) {
        if (signal.aborted) throw e;
        lastErr = asError(e);
        const retryable = isConnRefused(e) || (e instanceof TransportError && e.retryable);
        if (retryable && attempt < MAX_ATTEMPTS - 1) {
          this.log?.debug(`connection error (${lastErr.message}), retrying in 2s`);
          await delay(getRetryDelayMs(2000), undefined, { signal });
          continue;
        }
        if (isConnRefused(e)) {
          throw new TransportError(`cannot reach ${this.endpoint}. Is the model server running? (${lastErr.message})`, undefined, true);
        }
        throw e instanceof TransportError ? e : new TransportError(lastErr.message, undefined, retryable);
      }

      if (res.ok) return res;

      const text = await res.text().catch(() => '');
      const detail = text ? `\n${text.slice(0, 2000)}` : '';
      lastErr = new TransportError(`POST ${pathname} failed: ${res.status} ${res.statusText}${detail}`, res.status, res.status >= 500 || res.status === 429);
      if ((res.status === 429 || res.status >= 500) && attempt < MAX_ATTEMPTS - 1) {
        const backoff = Math.pow(2, attempt + 1) * 1000;
        this.log?.debug(`HTTP ${res.status}, retrying in ${backoff}ms`);
        await delay(getRetryDelayMs(backoff), undefined, { signal });
        continue;
      }
      throw lastErr;
    }
    throw lastErr;
  }

  /** Run `fn` under a response timeout chained to the caller's signal. */
  private async withResponseTimeout<T>(
    callerSignal: AbortSignal | undefined,
    fn: (signal: AbortSignal, rearm: () => void) => Promise<T>
  ): Promise<T> {
    const ac = new AbortController();
    const onCallerAbort = () => ac.abort(callerSignal?.reason);
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const rearm = () => {
      clearTimeout(timer);
      timer = setTimeout(() => {
        timedOut = true;
        ac.abort();
      }, this.responseTimeoutMs);
    };
    rearm();
    try {
      return await fn(ac.signal, rearm);
    } catch (e: unknown) {
      if (timedOut && !callerSignal?.aborted) {
        throw new TransportError(`response timeout (${this.responseTimeoutMs}ms) waiting for ${this.endpoint}`, undefined, true);
      }
      throw e;
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  async chat(req: ChatRequest): Promise<ChatCompletionResponse> {
    const body = {
      model: req.model,
      messages: req.messages,
      ...(req.tools?.length ? { tools: req.tools, tool_choice: 'auto' } : {}),
      temperature: req.temperature,
      max_tokens: req.max_tokens,
      stream: false,
    };
    const started = Date.now();
    return this.withResponseTimeout(req.signal, async (signal) => {
      const res = await this.postWithRetry('/chat/completions', body, signal);
      let json: unknown;
      try {
        json = await res.json();
      } catch (e: unknown) {
        if (signal.aborted) throw e;
        throw new ProtocolError(`response body is not JSON: ${asError(e).message}`);
      }
      const parsed = parseChatResponse(json);
      this.log?.debug(`← chat ${Date.now() - started}ms tokens=${parsed.usage?.completion_tokens ?? '?'}`);
      return parsed;
    });
  }

  /**
   * Stream a plain completion (no tools), yielding content deltas as they
   * arrive. The response timeout applies between chunks.
   */
  async *streamChat(req: ChatRequest): AsyncGenerator<string, void, undefined> {
    const body = {
      model: req.model,
      messages: req.messages,
      temperature: req.temperature,
      max_tokens: req.max_tokens,
      stream: true,
    };

    const ac = new AbortController();
    const onCallerAbort = () => ac.abort(req.signal?.reason);
    req.signal?.addEventListener('abort', onCallerAbort, { once: true });
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const rearm = () => {
      clearTimeout(timer);
      timer = setTimeout(() => {
        timedOut = true;
        ac.abort();
      }, this.responseTimeoutMs);
    };

    try {
      rearm();
      const res = await this.postWithRetry('/chat/completions', body, ac.signal);
      const reader = res.body?.getReader();
      if (!reader) throw new ProtocolError('stream response has no body');

      const decoder = new TextDecoder();
      let buf = '';
      for (;;) {
        rearm();
        const { done, value } = await reader.read();
        if (done) break;
        buf += decoder.decode(value, { stream: true });

        let nl: number;
        while ((nl = buf.indexOf('\n')) >= 0) {
          const line = buf.slice(0, nl).trim();
          buf = buf.slice(nl + 1);
          if (!line.startsWith('data:')) continue;
          const payload = line.slice(5).trim();
          if (payload === '[DONE]') return;
          const delta = parseStreamDelta(payload);
          if (delta !== undefined) yield delta;
        }
      }
      const tail = buf.trim();
      if (tail.startsWith('data:') && tail.slice(5).trim() !== '[DONE]') {
        const delta = parseStreamDelta(tail.slice(5).trim());
        if (delta !== undefined) yield delta;
      }
    } catch (e: unknown) {
      if (timedOut && !req.signal?.aborted) {
        throw new TransportError(`stream stalled for ${this.responseTimeoutMs}ms`, undefined, true);
      }
      if (isAbortError(e) || e instanceof TransportError || e instanceof ProtocolError) throw e;
      throw new TransportError(`stream failed: ${asError(e).message}`, undefined, true);
    } finally {
      clearTimeout(timer);
      req.signal?.removeEventListener('abort', onCallerAbort);
      ac.abort();
    }
  }

  /** Embed `inputs` in one request; rows come back in input order. */
  async embed(inputs: string[], model: string, signal?: AbortSignal): Promise<number[][]> {
    if (!inputs.length) return [];
    return this.withResponseTimeout(signal, async (s) => {
      const res = await this.postWithRetry('/embeddings', { model, input: inputs }, s);
      return parseEmbeddings(await res.json(), inputs.length);
    });
  }

  async models(signal?: AbortSignal): Promise<ModelsResponse> {
    return this.withResponseTimeout(signal, async (s) => {
      const url = `${this.endpoint}/models`;
      const res = await this.fetchWithConnTimeout(url, { method: 'GET', headers: this.headers() }, s);
      if (!res.ok) throw new TransportError(`GET /models failed: ${res.status} ${res.statusText}`, res.status);
      return parseModels(await res.json());
    });
  }
}
