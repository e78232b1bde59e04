import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';

import { ProtocolError } from '../src/client/errors.js';
import { silentLogger } from '../src/log.js';
import { chunkLines } from '../src/retrieval/chunk.js';
import { RetrievalIndex, cosineSimilarity, type Embedder } from '../src/retrieval/index.js';
import { isIgnored, parseIgnoreRules, readTextFile, walkFiles } from '../src/retrieval/walk.js';
import { Sandbox } from '../src/sandbox.js';
import { ToolExecutor } from '../src/tools/executor.js';
import { indexTools } from '../src/tools/index-tools.js';
import { ToolRegistry } from '../src/tools/registry.js';
import { ToolError } from '../src/tools/tool-error.js';

import { BagOfWordsEmbedder, tempWorkspace, testConfig } from './helpers.js';

describe('chunkLines', () => {
  it('makes overlapping windows and stops at the end', () => {
    assert.deepEqual(chunkLines('a\nb\nc\nd\ne\n', 2, 1), [
      { startLine: 1, endLine: 2, text: 'a\nb' },
      { startLine: 2, endLine: 3, text: 'b\nc' },
      { startLine: 3, endLine: 4, text: 'c\nd' },
      { startLine: 4, endLine: 5, text: 'd\ne' },
    ]);
  });

  it('drops whitespace-only windows', () => {
    assert.deepEqual(chunkLines('x\n\n  \ny', 1, 0), [
      { startLine: 1, endLine: 1, text: 'x' },
      { startLine: 4, endLine: 4, text: 'y' },
    ]);
    assert.deepEqual(chunkLines('', 10, 2), []);
  });
});

describe('ignore rules', () => {
  const rules = parseIgnoreRules('# comment\n*.log\n!keep.log\nsecret/\n/docs/*.md\n');

  it('matches globs, negations and anchored patterns', () => {
    assert.equal(isIgnored('a.log', false, rules), true);
    assert.equal(isIgnored('deep/b.log', false, rules), true);
    assert.equal(isIgnored('keep.log', false, rules), false);
    assert.equal(isIgnored('docs/a.md', false, rules), true);
    assert.equal(isIgnored('x/docs/a.md', false, rules), false);
  });

  it('applies directory-only rules to directories', () => {
    assert.equal(isIgnored('sub/secret', true, rules), true);
    assert.equal(isIgnored('secret', false, rules), false);
  });

  it('always skips .git and node_modules', () => {
    assert.equal(isIgnored('node_modules/x/index.js', false, []), true);
    assert.equal(isIgnored('.git/config', false, []), true);
  });
});

describe('cosineSimilarity', () => {
  it('is 1 for parallel, 0 for orthogonal and zero vectors', () => {
    assert.equal(cosineSimilarity([1, 1], [2, 2]), 1);
    assert.equal(cosineSimilarity([1, 0], [0, 1]), 0);
    assert.equal(cosineSimilarity([0, 0], [1, 1]), 0);
    assert.equal(cosineSimilarity([1, 0], [-1, 0]), -1);
  });
});

describe('RetrievalIndex', () => {
  let root: string;
  let sandbox: Sandbox;
  let embedder: BagOfWordsEmbedder;
  let index: RetrievalIndex;

  const make = (e: Embedder = embedder) =>
    new RetrievalIndex({ dir: path.join(root, '.lathe-index'), sandbox, embedder: e, model: 'bow', batchSize: 1 });

  before(async () => {
    root = await tempWorkspace('retrieval');
    sandbox = new Sandbox({ root });
    embedder = new BagOfWordsEmbedder();
    await fs.writeFile(path.join(root, 'fruit.txt'), 'apple banana\ncherry apple\n');
    await fs.writeFile(path.join(root, 'net.ts'), 'socket network\nnetwork token\n');
    await fs.writeFile(path.join(root, 'data.bin'), Buffer.from([0x61, 0x00, 0x62]));
    await fs.writeFile(path.join(root, 'debug.log'), 'apple apple apple\n');
    await fs.writeFile(path.join(root, '.gitignore'), '*.log\n');
    index = make();
  });

  after(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('walkFiles honours ignore files and readTextFile skips binaries', async () => {
    const files = await walkFiles(root, root, parseIgnoreRules('*.log\n'));
    assert.deepEqual(files.map((f) => f.rel).sort(), ['.gitignore', 'data.bin', 'fruit.txt', 'net.ts']);
    assert.equal(await readTextFile(path.join(root, 'data.bin')), null);
  });

  it('builds, persists and reports a summary', async () => {
    const summary = await index.build();
    assert.deepEqual(summary, { files: 3, chunks: 3, skipped: 1, dim: 8, dir: path.join(root, '.lathe-index') });
    assert.equal(embedder.batches, 3);
    assert.equal(index.size, 3);

    const meta: unknown = JSON.parse(await fs.readFile(path.join(root, '.lathe-index', 'meta.json'), 'utf8'));
    assert.ok(typeof meta === 'object' && meta !== null && 'rows' in meta);
    assert.deepEqual(meta.rows, ['.gitignore#1-1', 'fruit.txt#1-2', 'net.ts#1-2']);
    const vectors = await fs.stat(path.join(root, '.lathe-index', 'vectors.f32'));
    assert.equal(vectors.size, 3 * 8 * 4);
  });

  it('ranks chunks by cosine similarity', async () => {
    const hits = await index.query('network socket', 2);
    assert.deepEqual(
      hits.map((h) => [h.chunkId, h.score.toFixed(3)]),
      [
        ['net.ts#1-2', '0.866'],
        ['.gitignore#1-1', '0.000'],
      ]
    );
    assert.deepEqual(
      { path: hits[0].path, startLine: hits[0].startLine, endLine: hits[0].endLine, snippet: hits[0].snippet },
      { path: 'net.ts', startLine: 1, endLine: 2, snippet: 'socket network\nnetwork token' }
    );
  });

  it('a fresh instance loads the index from disk', async () => {
    const fresh = make();
    assert.equal(await fresh.load(), true);
    const [top] = await fresh.query('banana', 1);
    assert.equal(top.chunkId, 'fruit.txt#1-2');
  });

  it('rebuilding does not index its own files', async () => {
    const summary = await index.build();
    assert.equal(summary.chunks, 3);
  });

  it('refuses a query embedding of the wrong dimension', async () => {
    const short: Embedder = { embed: async (texts) => texts.map(() => [1, 0, 0]) };
    await assert.rejects(
      () => make(short).query('x'),
      new ProtocolError('query embedding has dimension 3, index has 8')
    );
  });

  it('reports a missing index as not_found', async () => {
    const missing = new RetrievalIndex({ dir: path.join(root, 'nowhere'), sandbox, embedder, model: 'bow' });
    assert.equal(await missing.load(), false);
    await assert.rejects(
      () => missing.query('x'),
      (e: unknown) => e instanceof ToolError && e.code === 'not_found' && e.message === `no index in ${path.join(root, 'nowhere')}`
    );
  });

  it('detects a vectors file that does not match the metadata', async () => {
    const dir = path.join(root, 'broken-index');
    await fs.cp(path.join(root, '.lathe-index'), dir, { recursive: true });
    await fs.truncate(path.join(dir, 'vectors.f32'), 10);
    const broken = new RetrievalIndex({ dir, sandbox, embedder, model: 'bow' });
    await assert.rejects(() => broken.load(), /index is inconsistent: vectors\.f32 has 10 bytes, expected 96/);
  });

  it('refuses to index outside the workspace', async () => {
    await assert.rejects(() => index.build(['..']), /path escapes workspace root/);
  });
});

describe('index tools', () => {
  let root: string;
  let executor: ToolExecutor;

  before(async () => {
    root = await tempWorkspace('index-tools');
    await fs.writeFile(path.join(root, 'notes.md'), `${'apple '.repeat(100)}\n`);
    await fs.mkdir(path.join(root, 'src'));
    await fs.writeFile(path.join(root, 'src', 'net.ts'), 'socket\n');
    const config = testConfig(root);
    const sandbox = Sandbox.fromConfig(config);
    const index = RetrievalIndex.fromConfig(config, sandbox, new BagOfWordsEmbedder());
    const registry = new ToolRegistry();
    for (const d of indexTools(index)) registry.register(d.descriptor, d.handler);
    executor = new ToolExecutor({ registry, sandbox, config, log: silentLogger });
  });

  after(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('search_index before build_index says how to fix it', async () => {
    const r = await executor.execute({ id: 'a', name: 'search_index', arguments: '{"query":"apple"}' });
    assert.equal(r.code, 'not_found');
    assert.match(r.output, /hint=build one first with build_index/);
  });

  it('build_index then search_index', async () => {
    const built = await executor.execute({ id: 'b', name: 'build_index', arguments: '{"paths":["notes.md"]}' });
    assert.equal(built.output, 'indexed 1 chunks from 1 files (0 skipped, dim 8)');

    const hit = await executor.execute({ id: 'c', name: 'search_index', arguments: '{"query":"apple","k":1}' });
    const snippet = 'apple '.repeat(100).slice(0, 400) + '…';
    assert.equal(hit.output, `1.000  notes.md#1-1\n${snippet}`);

    const none = await executor.execute({ id: 'd', name: 'search_index', arguments: '{"query":"socket"}' });
    assert.equal(none.output, '0.000  notes.md#1-1\n' + snippet);
  });

  it('an empty index answers with no matches', async () => {
    await fs.mkdir(path.join(root, 'empty'));
    const built = await executor.execute({ id: 'e', name: 'build_index', arguments: '{"paths":["empty"]}' });
    assert.equal(built.output, 'indexed 0 chunks from 0 files (0 skipped, dim 0)');
    const r = await executor.execute({ id: 'f', name: 'search_index', arguments: '{"query":"apple"}' });
    assert.equal(r.output, '[no matches]');
  });
});
