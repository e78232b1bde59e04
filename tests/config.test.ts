import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';

import { DEFAULTS, coerceFileConfig, envConfig, loadConfig, parseBool, parseNum } from '../src/config.js';

describe('config resolution: CLI > env > file > defaults', () => {
  let tmpDir: string;
  let configPath: string;
  let workDir: string;

  before(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lathe-cfg-test-'));
    configPath = path.join(tmpDir, 'config.json');
    workDir = path.join(tmpDir, 'work');
    await fs.mkdir(workDir);
  });

  after(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('uses defaults when there is no file, env or CLI input', async () => {
    const { config } = await loadConfig({ configPath: path.join(tmpDir, 'missing.json'), env: {} });
    assert.equal(config.endpoint, DEFAULTS.endpoint);
    assert.equal(config.model, 'gpt-oss:20b');
    assert.equal(config.max_rounds, 8);
    assert.equal(config.confirmation, 'model');
    assert.equal(config.stream, true);
  });

  it('treats an empty file as {}', async () => {
    await fs.writeFile(configPath, '   \n', 'utf8');
    const { config } = await loadConfig({ configPath, env: {} });
    assert.equal(config.model, DEFAULTS.model);
  });

  it('throws on a file that is not JSON', async () => {
    await fs.writeFile(configPath, '{ nope', 'utf8');
    await assert.rejects(() => loadConfig({ configPath, env: {} }), SyntaxError);
  });

  it('layers file < env < cli', async () => {
    await fs.writeFile(
      configPath,
      JSON.stringify({ model: 'from-file', max_rounds: 3, temperature: 0.7, dir: workDir }),
      'utf8'
    );
    const { config } = await loadConfig({
      configPath,
      env: { LATHE_MODEL: 'from-env', LATHE_MAX_ROUNDS: '5' },
      cli: { max_rounds: 2 },
    });
    assert.equal(config.model, 'from-env');
    assert.equal(config.max_rounds, 2);
    assert.equal(config.temperature, 0.7);
    assert.equal(config.dir, workDir);
  });

  it('undefined CLI values do not mask lower layers', async () => {
    await fs.writeFile(configPath, JSON.stringify({ model: 'from-file' }), 'utf8');
    const { config } = await loadConfig({ configPath, env: {}, cli: { model: undefined } });
    assert.equal(config.model, 'from-file');
  });

  it('normalizes endpoint, clamps limits and resolves index_dir against dir', async () => {
    await fs.writeFile(
      configPath,
      JSON.stringify({
        endpoint: 'http://127.0.0.1:8080/v1///',
        dir: workDir,
        max_rounds: 0,
        tool_timeout: 500,
        max_timeout: 60,
        chunk_lines: 20,
        chunk_overlap: 40,
        index_dir: '.idx',
      }),
      'utf8'
    );
    const { config } = await loadConfig({ configPath, env: {} });
    assert.equal(config.endpoint, 'http://127.0.0.1:8080/v1');
    assert.equal(config.max_rounds, 1);
    assert.equal(config.tool_timeout, 60);
    assert.equal(config.chunk_overlap, 19);
    assert.equal(config.index_dir, path.join(workDir, '.idx'));
  });

  it('falls back to cwd when dir does not exist', async () => {
    await fs.writeFile(configPath, JSON.stringify({ dir: path.join(tmpDir, 'nope') }), 'utf8');
    const { config } = await loadConfig({ configPath, env: {} });
    assert.equal(config.dir, process.cwd());
  });
});

describe('envConfig', () => {
  it('reads LATHE_* variables and parses types', () => {
    const cfg = envConfig({
      LATHE_ENDPOINT: 'http://h/v1',
      LATHE_STREAM: 'off',
      LATHE_PARALLEL_READ_TOOLS: 'yes',
      LATHE_CONFIRMATION: 'USER',
      LATHE_MAX_TOKENS: '1024',
      LATHE_COLOR: 'never',
      LATHE_SEARCH_API_KEY: 'test-secret',
    });
    assert.deepEqual(cfg, {
      endpoint: 'http://h/v1',
      stream: false,
      parallel_read_tools: true,
      confirmation: 'user',
      max_tokens: 1024,
      color: 'never',
      search_api_key: 'test-secret',
    });
  });

  it('drops unparseable values', () => {
    assert.deepEqual(envConfig({ LATHE_MAX_ROUNDS: 'lots', LATHE_STREAM: 'maybe', LATHE_CONFIRMATION: 'nobody' }), {});
  });
});

describe('coerceFileConfig', () => {
  it('keeps well-typed keys and drops the rest', () => {
    const cfg = coerceFileConfig({
      model: 'm',
      max_rounds: '4',
      verbose: true,
      confirmation: 'user',
      color: 'sometimes',
      safety: { blocked_patterns: ['curl', 3], allow_patterns: 'x' },
      mystery: 1,
    });
    assert.deepEqual(cfg, {
      model: 'm',
      verbose: true,
      confirmation: 'user',
      safety: { blocked_patterns: ['curl'] },
    });
  });

  it('returns {} for a non-object', () => {
    assert.deepEqual(coerceFileConfig([1, 2]), {});
  });
});

describe('parseBool / parseNum', () => {
  it('parseBool accepts the usual spellings', () => {
    for (const v of ['1', 'true', 'YES', 'on']) assert.equal(parseBool(v), true, v);
    for (const v of ['0', 'false', 'no', 'OFF']) assert.equal(parseBool(v), false, v);
    assert.equal(parseBool('2'), undefined);
    assert.equal(parseBool(undefined), undefined);
  });

  it('parseNum takes finite numbers only', () => {
    assert.equal(parseNum('42'), 42);
    assert.equal(parseNum('-1.5'), -1.5);
    assert.equal(parseNum(''), undefined);
    assert.equal(parseNum('Infinity'), undefined);
    assert.equal(parseNum('abc'), undefined);
  });
});
