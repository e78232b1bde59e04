/**
 * Vector retrieval over workspace files: line-window chunks, embedded through
 * the model endpoint, persisted as a float32 matrix plus a JSON sidecar, and
 * searched by brute-force cosine similarity.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import type { OpenAIClient } from '../client.js';
import { ProtocolError } from '../client/errors.js';
import { silentLogger, type Logger } from '../log.js';
import type { Sandbox } from '../sandbox.js';
import { isWithinDir } from '../tools/path-safety.js';
import { ToolError } from '../tools/tool-error.js';
import type { LatheConfig } from '../types.js';
import { isRecord } from '../utils.js';

import { chunkLines } from './chunk.js';
import { loadIgnoreRules, readTextFile, walkFiles } from './walk.js';

export const INDEX_VERSION = 1;
export const VECTORS_FILE = 'vectors.f32';
export const META_FILE = 'meta.json';
export const EMBED_BATCH = 32;
export const SNIPPET_CHARS = 400;

export interface Embedder {
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/** Embeds through the endpoint's /embeddings route. */
export class ClientEmbedder implements Embedder {
  constructor(
    private readonly client: OpenAIClient,
    private readonly model: string
  ) {}

  embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    return this.client.embed(texts, this.model, signal);
  }
}

export type ChunkMeta = {
  path: string;
  startLine: number;
  endLine: number;
  text: string;
  row: number;
};

export type IndexMeta = {
  version: number;
  model: string;
  dim: number;
  createdAt: string;
  rows: string[];
  chunks: Record<string, ChunkMeta>;
};

export type SearchHit = {
  chunkId: string;
  score: number;
  snippet: string;
  path: string;
  startLine: number;
  endLine: number;
};

export type BuildSummary = {
  files: number;
  chunks: number;
  skipped: number;
  dim: number;
  dir: string;
};

/** Cosine similarity in [-1, 1]; 0 when either vector has zero length. */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return Math.max(-1, Math.min(1, dot / Math.sqrt(na * nb)));
}

function parseMeta(raw: unknown): IndexMeta {
  if (
    !isRecord(raw) ||
    typeof raw.version !== 'number' ||
    typeof raw.model !== 'string' ||
    typeof raw.dim !== 'number' ||
    typeof raw.createdAt !== 'string' ||
    !Array.isArray(raw.rows) ||
    !isRecord(raw.chunks)
  ) {
    throw new Error(`${META_FILE} is malformed`);
  }
  if (raw.version !== INDEX_VERSION) throw new Error(`${META_FILE} has unsupported version ${raw.version}`);

  const rows: string[] = [];
  const chunks: Record<string, ChunkMeta> = {};
  raw.rows.forEach((id: unknown, row: number) => {
    if (typeof id !== 'string') throw new Error(`${META_FILE}: rows[${row}] is not a chunk id`);
    const c = isRecord(raw.chunks) ? raw.chunks[id] : undefined;
    if (
      !isRecord(c) ||
      typeof c.path !== 'string' ||
      typeof c.startLine !== 'number' ||
      typeof c.endLine !== 'number' ||
      typeof c.text !== 'string' ||
      c.row !== row
    ) {
      throw new Error(`${META_FILE}: chunk ${id} does not match row ${row}`);
    }
    rows.push(id);
    chunks[id] = { path: c.path, startLine: c.startLine, endLine: c.endLine, text: c.text, row };
  });
  return { version: raw.version, model: raw.model, dim: raw.dim, createdAt: raw.createdAt, rows, chunks };
}

async function writeAtomic(file: string, data: string | Uint8Array) {
  const tmp = `${file}.tmp-${process.pid}`;
  await fs.writeFile(tmp, data);
  await fs.rename(tmp, file);
}

export type RetrievalIndexOptions = {
  dir: string;
  sandbox: Sandbox;
  embedder: Embedder;
  model: string;
  chunkLines?: number;
  chunkOverlap?: number;
  batchSize?: number;
  log?: Logger;
};

export class RetrievalIndex {
  readonly dir: string;
  private readonly sandbox: Sandbox;
  private readonly embedder: Embedder;
  private readonly model: string;
  private readonly chunkLines: number;
  private readonly chunkOverlap: number;
  private readonly batchSize: number;
  private readonly log: Logger;

  private meta?: IndexMeta;
  private vectors?: Float32Array;

  constructor(opts: RetrievalIndexOptions) {
    this.dir = opts.dir;
    this.sandbox = opts.sandbox;
    this.embedder = opts.embedder;
    this.model = opts.model;
    this.chunkLines = opts.chunkLines ?? 60;
    this.chunkOverlap = opts.chunkOverlap ?? 10;
    this.batchSize = Math.max(1, opts.batchSize ?? EMBED_BATCH);
    this.log = opts.log ?? silentLogger;
  }

  static fromConfig(config: LatheConfig, sandbox: Sandbox, embedder: Embedder, log?: Logger): RetrievalIndex {
    return new RetrievalIndex({
      dir: config.index_dir,
      sandbox,
      embedder,
      model: config.embed_model,
      chunkLines: config.chunk_lines,
      chunkOverlap: config.chunk_overlap,
      log,
    });
  }

  private async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const vecs = await this.embedder.embed(texts, signal);
    if (vecs.length !== texts.length) {
      throw new ProtocolError(`embedder returned ${vecs.length} vectors for ${texts.length} inputs`);
    }
    return vecs;
  }

  /** Chunk, embed and persist every indexable file under `paths`, replacing the previous index. */
  async build(paths: string[] = ['.'], opts: { signal?: AbortSignal } = {}): Promise<BuildSummary> {
    const root = await this.sandbox.requirePath('.');
    const rules = await loadIgnoreRules(root);

    const indexDir = path.resolve(this.dir);
    const seen = new Set<string>();
    const files: Array<{ abs: string; rel: string }> = [];
    for (const p of paths.length ? paths : ['.']) {
      const start = await this.sandbox.requirePath(p);
      for (const f of await walkFiles(root, start, rules)) {
        if (seen.has(f.rel) || isWithinDir(f.abs, indexDir)) continue;
        seen.add(f.rel);
        files.push(f);
      }
    }

    type Pending = { id: string; meta: Omit<ChunkMeta, 'row'> };
    const pending: Pending[] = [];
    let skipped = 0;
    let indexedFiles = 0;
    for (const f of files) {
      const text = await readTextFile(f.abs);
      if (text === null) {
        skipped++;
        continue;
      }
      const chunks = chunkLines(text, this.chunkLines, this.chunkOverlap);
      if (!chunks.length) continue;
      indexedFiles++;
      for (const c of chunks) {
        pending.push({
          id: `${f.rel}#${c.startLine}-${c.endLine}`,
          meta: { path: f.rel, startLine: c.startLine, endLine: c.endLine, text: c.text },
        });
      }
    }
    this.log.info(`indexing ${pending.length} chunks from ${indexedFiles} files (${skipped} skipped)`);

    const rows: number[][] = [];
    for (let i = 0; i < pending.length; i += this.batchSize) {
      const batch = pending.slice(i, i + this.batchSize);
      rows.push(...(await this.embedBatch(batch.map((p) => p.meta.text), opts.signal)));
      this.log.debug(`embedded ${Math.min(i + this.batchSize, pending.length)}/${pending.length}`);
    }

    const dim = rows[0]?.length ?? 0;
    const vectors = new Float32Array(rows.length * dim);
    rows.forEach((v, r) => {
      if (v.length !== dim) throw new ProtocolError(`embedding ${r} has dimension ${v.length}, expected ${dim}`);
      vectors.set(v, r * dim);
    });

    const meta: IndexMeta = {
      version: INDEX_VERSION,
      model: this.model,
      dim,
      createdAt: new Date().toISOString(),
      rows: pending.map((p) => p.id),
      chunks: Object.fromEntries(pending.map((p, row) => [p.id, { ...p.meta, row }])),
    };

    await fs.mkdir(this.dir, { recursive: true });
    await writeAtomic(path.join(this.dir, VECTORS_FILE), new Uint8Array(vectors.buffer));
    await writeAtomic(path.join(this.dir, META_FILE), JSON.stringify(meta));
    this.meta = meta;
    this.vectors = vectors;

    return { files: indexedFiles, chunks: pending.length, skipped, dim, dir: this.dir };
  }

  /**
   * Read the persisted index. Returns false when none exists; throws when the
   * two files disagree about row count or dimension.
   */
  async load(): Promise<boolean> {
    let metaRaw: string;
    let vecBuf: Buffer;
    try {
      metaRaw = await fs.readFile(path.join(this.dir, META_FILE), 'utf8');
      vecBuf = await fs.readFile(path.join(this.dir, VECTORS_FILE));
    } catch (e: unknown) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return false;
      throw e;
    }

    const meta = parseMeta(JSON.parse(metaRaw));
    const expected = meta.rows.length * meta.dim * 4;
    if (vecBuf.byteLength !== expected) {
      throw new Error(
        `index is inconsistent: ${VECTORS_FILE} has ${vecBuf.byteLength} bytes, expected ${expected} (${meta.rows.length} rows x ${meta.dim})`
      );
    }
    // copy into an aligned buffer; readFile's Buffer may sit at any offset
    this.vectors = new Float32Array(new Uint8Array(vecBuf).buffer);
    this.meta = meta;
    return true;
  }

  get size(): number {
    return this.meta?.rows.length ?? 0;
  }

  async query(text: string, k = 5, signal?: AbortSignal): Promise<SearchHit[]> {
    if (!this.meta && !(await this.load())) {
      throw new ToolError('not_found', `no index in ${this.dir}`, false, 'build one first with build_index');
    }
    const meta = this.meta;
    const vectors = this.vectors;
    if (!meta || !vectors || !meta.rows.length) return [];

    const [q] = await this.embedBatch([text], signal);
    if (q.length !== meta.dim) {
      throw new ProtocolError(`query embedding has dimension ${q.length}, index has ${meta.dim}`);
    }

    const scored = meta.rows.map((id, row) => ({
      id,
      score: cosineSimilarity(q, vectors.subarray(row * meta.dim, (row + 1) * meta.dim)),
    }));
    scored.sort((a, b) => b.score - a.score);

    return scored.slice(0, Math.max(0, k)).map(({ id, score }) => {
      const c = meta.chunks[id];
      return {
        chunkId: id,
        score,
        snippet: c.text.length > SNIPPET_CHARS ? c.text.slice(0, SNIPPET_CHARS) + '…' : c.text,
        path: c.path,
        startLine: c.startLine,
        endLine: c.endLine,
      };
    });
  }
}
