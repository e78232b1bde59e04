import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { DEFAULTS } from '../src/config.js';
import { toDecision, type DecideOptions, type ModelClient } from '../src/model.js';
import type { Embedder } from '../src/retrieval/index.js';
import type { ChatMessage, Decision, LatheConfig, ToolSchema } from '../src/types.js';

/** A realpath'd temp directory, so sandbox results compare equal to it. */
export async function tempWorkspace(prefix: string): Promise<string> {
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), `lathe-${prefix}-`)));
}

export function testConfig(dir: string, overrides: Partial<LatheConfig> = {}): LatheConfig {
  return {
    ...DEFAULTS,
    dir,
    api_key: 'test-secret',
    index_dir: path.join(dir, '.lathe-index'),
    stream: false,
    ...overrides,
  };
}

export type RawReply = {
  text?: string;
  calls?: Array<{ name: string; args?: Record<string, unknown> | string; id?: string }>;
};

/**
 * A ModelClient that replays canned replies in order. Replies go through the
 * real toDecision, so call ids and ask_user handling match the HTTP client.
 */
export class ScriptedModel implements ModelClient {
  readonly seen: ChatMessage[][] = [];
  readonly catalogues: ToolSchema[][] = [];
  streamed = 0;
  private next = 0;

  constructor(
    private readonly replies: RawReply[],
    private readonly streamTokens?: string[]
  ) {}

  get decideCalls(): number {
    return this.next;
  }

  async decide(messages: ChatMessage[], catalogue: ToolSchema[], opts: DecideOptions): Promise<Decision> {
    opts.signal?.throwIfAborted();
    this.seen.push(messages.map((m) => ({ ...m })));
    this.catalogues.push(catalogue);
    const reply = this.replies[this.next++];
    if (!reply) throw new Error(`ScriptedModel: no reply #${this.next}`);
    const calls = (reply.calls ?? []).map((c) => ({
      id: c.id,
      name: c.name,
      arguments: typeof c.args === 'string' ? c.args : JSON.stringify(c.args ?? {}),
    }));
    return toDecision(reply.text ?? '', calls, opts.round, opts.userInputTools ?? new Set(['ask_user']));
  }

  async *stream(_messages: ChatMessage[], opts: { signal?: AbortSignal }): AsyncIterable<string> {
    this.streamed++;
    for (const t of this.streamTokens ?? []) {
      opts.signal?.throwIfAborted();
      yield t;
    }
  }
}

const VOCAB = ['apple', 'banana', 'cherry', 'kernel', 'network', 'socket', 'parser', 'token'];

/** Counts vocabulary words; enough to make cosine ranking predictable. */
export class BagOfWordsEmbedder implements Embedder {
  batches = 0;

  async embed(texts: string[]): Promise<number[][]> {
    this.batches++;
    return texts.map((t) => {
      const words = t.toLowerCase().split(/[^a-z]+/);
      return VOCAB.map((v) => words.filter((w) => w === v).length);
    });
  }
}

export function collectLines(): { lines: string[]; sink: (l: string) => void } {
  const lines: string[] = [];
  return { lines, sink: (l) => lines.push(l) };
}
