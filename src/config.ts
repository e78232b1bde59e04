import fs from 'node:fs/promises';
import path from 'node:path';

import type { ColorMode, ConfirmationPolicy, LatheConfig, SafetyConfig } from './types.js';
import { configDir, isRecord, stateDir } from './utils.js';

export const DEFAULTS: LatheConfig = {
  endpoint: 'http://localhost:11434/v1',
  api_key: '',
  model: 'gpt-oss:20b',
  embed_model: 'nomic-embed-text',
  dir: process.cwd(),
  max_tokens: 4096,
  temperature: 0.2,
  context_window: 32768,
  max_rounds: 8,
  stream: true,
  response_timeout: 300,
  connection_timeout: 30,
  tool_timeout: 30,
  max_timeout: 120,
  max_output_bytes: 16384,
  max_result_chars: 20000,
  parallel_read_tools: false,
  confirmation: 'model',
  index_dir: '',
  chunk_lines: 60,
  chunk_overlap: 10,
  web_max_chars: 5000,
  search_endpoint: 'https://serpapi.com/search.json',
  search_api_key: '',
  verbose: false,
  log_file: '',
  color: 'auto',
  system_prompt: '',
  safety: {},
};

export function defaultConfigPath() {
  return path.join(configDir(), 'config.json');
}

export function parseBool(v: string | undefined): boolean | undefined {
  if (v == null) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(v.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(v.toLowerCase())) return false;
  return undefined;
}

export function parseNum(v: string | undefined): number | undefined {
  if (v == null || v.trim() === '') return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

function parseConfirmation(v: unknown): ConfirmationPolicy | undefined {
  return v === 'model' || v === 'user' ? v : undefined;
}

function parseColor(v: unknown): ColorMode | undefined {
  return v === 'auto' || v === 'always' || v === 'never' ? v : undefined;
}

function stringList(v: unknown): string[] | undefined {
  if (!Array.isArray(v)) return undefined;
  return v.filter((x): x is string => typeof x === 'string');
}

function stripUndef<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in obj) {
    if (Object.prototype.hasOwnProperty.call(obj, key) && obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

/**
 * Pick the known keys out of a parsed config.json, dropping values of the
 * wrong type with a warning instead of letting them poison the merge.
 */
export function coerceFileConfig(raw: unknown, source = 'config'): Partial<LatheConfig> {
  if (!isRecord(raw)) {
    if (raw !== undefined) console.warn(`[warn] ${source}: expected a JSON object, ignoring`);
    return {};
  }

  const out: Partial<LatheConfig> = {};
  const bad = (key: string) => console.warn(`[warn] ${source}: ignoring invalid value for "${key}"`);

  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined || value === null) continue;
    switch (key) {
      case 'endpoint':
      case 'api_key':
      case 'model':
      case 'embed_model':
      case 'dir':
      case 'index_dir':
      case 'log_file':
      case 'system_prompt':
      case 'search_endpoint':
      case 'search_api_key':
        if (typeof value === 'string') out[key] = value;
        else bad(key);
        break;
      case 'max_tokens':
      case 'temperature':
      case 'context_window':
      case 'max_rounds':
      case 'response_timeout':
      case 'connection_timeout':
      case 'tool_timeout':
      case 'max_timeout':
      case 'max_output_bytes':
      case 'max_result_chars':
      case 'chunk_lines':
      case 'chunk_overlap':
      case 'web_max_chars':
        if (typeof value === 'number' && Number.isFinite(value)) out[key] = value;
        else bad(key);
        break;
      case 'stream':
      case 'parallel_read_tools':
      case 'verbose':
        if (typeof value === 'boolean') out[key] = value;
        else bad(key);
        break;
      case 'confirmation': {
        const v = parseConfirmation(value);
        if (v) out.confirmation = v;
        else bad(key);
        break;
      }
      case 'color': {
        const v = parseColor(value);
        if (v) out.color = v;
        else bad(key);
        break;
      }
      case 'safety': {
        if (!isRecord(value)) {
          bad(key);
          break;
        }
        const safety: SafetyConfig = stripUndef({
          blocked_patterns: stringList(value.blocked_patterns),
          confirm_patterns: stringList(value.confirm_patterns),
          allow_patterns: stringList(value.allow_patterns),
        });
        out.safety = safety;
        break;
      }
      default:
        console.warn(`[warn] ${source}: unknown key "${key}"`);
    }
  }
  return out;
}

export function envConfig(env: NodeJS.ProcessEnv = process.env): Partial<LatheConfig> {
  return stripUndef<Partial<LatheConfig>>({
    endpoint: env.LATHE_ENDPOINT,
    api_key: env.LATHE_API_KEY,
    model: env.LATHE_MODEL,
    embed_model: env.LATHE_EMBED_MODEL,
    dir: env.LATHE_DIR,
    max_tokens: parseNum(env.LATHE_MAX_TOKENS),
    temperature: parseNum(env.LATHE_TEMPERATURE),
    context_window: parseNum(env.LATHE_CONTEXT_WINDOW),
    max_rounds: parseNum(env.LATHE_MAX_ROUNDS),
    stream: parseBool(env.LATHE_STREAM),
    response_timeout: parseNum(env.LATHE_RESPONSE_TIMEOUT),
    connection_timeout: parseNum(env.LATHE_CONNECTION_TIMEOUT),
    tool_timeout: parseNum(env.LATHE_TOOL_TIMEOUT),
    max_timeout: parseNum(env.LATHE_MAX_TIMEOUT),
    max_output_bytes: parseNum(env.LATHE_MAX_OUTPUT_BYTES),
    parallel_read_tools: parseBool(env.LATHE_PARALLEL_READ_TOOLS),
    confirmation: parseConfirmation(env.LATHE_CONFIRMATION?.toLowerCase()),
    index_dir: env.LATHE_INDEX_DIR,
    verbose: parseBool(env.LATHE_VERBOSE),
    log_file: env.LATHE_LOG_FILE,
    color: parseColor(env.LATHE_COLOR?.toLowerCase()),
    search_endpoint: env.LATHE_SEARCH_ENDPOINT,
    search_api_key: env.LATHE_SEARCH_API_KEY,
  });
}

function clampInt(v: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  return Math.min(max, Math.max(min, Math.floor(v)));
}

export async function loadConfig(opts: {
  configPath?: string;
  cli?: Partial<LatheConfig>;
  env?: NodeJS.ProcessEnv;
}): Promise<{ config: LatheConfig; configPath: string }> {
  const configPath = opts.configPath ?? defaultConfigPath();

  let fileCfg: Partial<LatheConfig> = {};
  try {
    const raw = await fs.readFile(configPath, 'utf8');
    if (raw.trim().length) {
      fileCfg = coerceFileConfig(JSON.parse(raw), configPath);
    }
  } catch (e: unknown) {
    if (!(e instanceof Error && 'code' in e && e.code === 'ENOENT')) throw e;
  }

  const envCfg = envConfig(opts.env);
  const cliCfg = stripUndef(opts.cli ?? {});

  // merge order: defaults < file < env < cli
  const merged: LatheConfig = {
    ...DEFAULTS,
    ...fileCfg,
    ...envCfg,
    ...cliCfg,
    safety: { ...DEFAULTS.safety, ...fileCfg.safety, ...cliCfg.safety },
  };

  return { config: await normalizeConfig(merged), configPath };
}

export async function normalizeConfig(merged: LatheConfig): Promise<LatheConfig> {
  const cfg: LatheConfig = { ...merged };
  cfg.endpoint = String(cfg.endpoint || DEFAULTS.endpoint).replace(/\/+$/, '');

  // A stale dir from config.json shouldn't stop the agent from starting.
  const resolvedDir = path.resolve(String(cfg.dir || process.cwd()));
  try {
    const st = await fs.stat(resolvedDir);
    cfg.dir = st.isDirectory() ? resolvedDir : process.cwd();
  } catch {
    console.warn(`[warn] configured dir "${resolvedDir}" does not exist, using cwd "${process.cwd()}"`);
    cfg.dir = process.cwd();
  }

  cfg.max_rounds = clampInt(cfg.max_rounds, 1);
  cfg.max_tokens = clampInt(cfg.max_tokens, 1);
  cfg.context_window = clampInt(cfg.context_window, 1024);
  cfg.max_timeout = clampInt(cfg.max_timeout, 1);
  cfg.tool_timeout = clampInt(cfg.tool_timeout, 1, cfg.max_timeout);
  cfg.response_timeout = clampInt(cfg.response_timeout, 1);
  cfg.connection_timeout = clampInt(cfg.connection_timeout, 1);
  cfg.max_output_bytes = clampInt(cfg.max_output_bytes, 256);
  cfg.max_result_chars = clampInt(cfg.max_result_chars, 256);
  cfg.chunk_lines = clampInt(cfg.chunk_lines, 1);
  cfg.chunk_overlap = clampInt(cfg.chunk_overlap, 0, cfg.chunk_lines - 1);
  cfg.web_max_chars = clampInt(cfg.web_max_chars, 100);
  cfg.index_dir = cfg.index_dir ? path.resolve(cfg.dir, cfg.index_dir) : path.join(stateDir(), 'index');
  cfg.log_file = cfg.log_file ? path.resolve(cfg.log_file) : '';

  return cfg;
}
