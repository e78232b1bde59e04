import { fetch, type RequestInit, type Response } from 'undici';

import { isRecord } from '../utils.js';
import { argInt, argOptInt, argOptStr, argStr } from './args.js';
import type { ToolContext, ToolDef, ToolDescriptor, ToolHandler } from './registry.js';
import { int, obj, str } from './schema.js';
import { htmlToText, truncateChars } from './text-utils.js';
import { ToolError } from './tool-error.js';

export type WebFetch = (url: string, init: RequestInit) => Promise<Response>;

const USER_AGENT = 'lathe (+fetch_url)';

function parseHttpUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ToolError('invalid_args', `fetch_url: not a valid URL: ${raw}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ToolError('blocked', `fetch_url: only http and https URLs are allowed (got ${url.protocol})`);
  }
  return url;
}

/**
 * GET `url` under the tool timeout and the call's cancel signal, reading the
 * whole body. Failures are reported by `tool` and `host` only, never the URL,
 * which may carry a key.
 */
async function getText(
  fetchImpl: WebFetch,
  tool: string,
  url: URL,
  accept: string,
  ctx: ToolContext
): Promise<{ res: Response; body: string }> {
  const ac = new AbortController();
  const onAbort = () => ac.abort();
  ctx.signal?.addEventListener('abort', onAbort, { once: true });
  const timer = setTimeout(() => ac.abort(), ctx.config.tool_timeout * 1000);
  try {
    const res = await fetchImpl(url.toString(), {
      method: 'GET',
      headers: { 'User-Agent': USER_AGENT, Accept: accept },
      redirect: 'follow',
      signal: ac.signal,
    });
    return { res, body: await res.text() };
  } catch (e: unknown) {
    if (ctx.signal?.aborted) throw new ToolError('cancelled', `${tool} was cancelled`);
    if (ac.signal.aborted) {
      throw new ToolError('timeout', `${tool}: ${url.host} timed out after ${ctx.config.tool_timeout}s`, true);
    }
    throw new ToolError('transient', `${tool}: ${e instanceof Error ? e.message : String(e)}`, true);
  } finally {
    clearTimeout(timer);
    ctx.signal?.removeEventListener('abort', onAbort);
  }
}

function fetchUrl(fetchImpl: WebFetch): ToolDef {
  const descriptor: ToolDescriptor = {
    name: 'fetch_url',
    description: 'Fetch a web page (http/https) and return its text. HTML is reduced to readable text.',
    readOnly: true,
    parameters: obj(
      {
        url: str('Absolute http(s) URL'),
        max_chars: int('Maximum characters of body text to return', { min: 100 }),
      },
      ['url']
    ),
  };

  const handler: ToolHandler = async (args, ctx) => {
    const url = parseHttpUrl(argStr(args, 'url'));
    const cap = Math.min(argOptInt(args, 'max_chars') ?? ctx.config.web_max_chars, ctx.config.web_max_chars);

    const { res, body } = await getText(
      fetchImpl,
      'fetch_url',
      url,
      'text/html,text/plain,application/json;q=0.9,*/*;q=0.5',
      ctx
    );
    const contentType = res.headers.get('content-type') ?? '';
    const text = /html/i.test(contentType) || /^\s*<(!doctype|html)/i.test(body) ? htmlToText(body) : body.trim();
    if (!res.ok) {
      throw new ToolError('exit_status', `fetch_url: HTTP ${res.status} ${res.statusText}\n${truncateChars(text, 500)}`, res.status >= 500);
    }
    return `URL: ${url.toString()}\nStatus: ${res.status}\n\n${truncateChars(text, cap)}`;
  };

  return { descriptor, handler };
}

export type SearchHit = { title: string; link: string; snippet: string };

const MAX_HITS = 10;
const TITLE_CHARS = 120;
const SNIPPET_CHARS = 300;

/** Pull organic results out of a SerpAPI-style response; malformed entries are skipped. */
export function parseSearchResults(data: unknown, limit: number): SearchHit[] {
  if (!isRecord(data) || !Array.isArray(data.organic_results)) return [];
  const hits: SearchHit[] = [];
  for (const item of data.organic_results) {
    if (hits.length >= limit) break;
    if (!isRecord(item) || typeof item.link !== 'string') continue;
    const title = typeof item.title === 'string' ? item.title : item.link;
    const snippet = typeof item.snippet === 'string' ? item.snippet : '';
    hits.push({
      title: title.slice(0, TITLE_CHARS),
      link: item.link,
      snippet: snippet.slice(0, SNIPPET_CHARS),
    });
  }
  return hits;
}

function webSearch(fetchImpl: WebFetch): ToolDef {
  const descriptor: ToolDescriptor = {
    name: 'web_search',
    description: 'Search the web. Returns numbered results with title, link and snippet; read one with fetch_url.',
    readOnly: true,
    parameters: obj(
      {
        query: str('Search query', { minLength: 1 }),
        num: int('Number of results', { min: 1, max: MAX_HITS, default: 5 }),
        site: str('Only return results from this domain, e.g. nodejs.org'),
      },
      ['query']
    ),
  };

  const handler: ToolHandler = async (args, ctx) => {
    if (!ctx.config.search_api_key) {
      throw new ToolError(
        'blocked',
        'web_search: no search API key configured',
        false,
        'set search_api_key in config.json or LATHE_SEARCH_API_KEY'
      );
    }
    const site = argOptStr(args, 'site');
    const q = site ? `site:${site} ${argStr(args, 'query')}` : argStr(args, 'query');
    const num = Math.min(Math.max(argInt(args, 'num', 5), 1), MAX_HITS);

    let url: URL;
    try {
      url = new URL(ctx.config.search_endpoint);
    } catch {
      throw new ToolError('invalid_args', `web_search: search_endpoint is not a valid URL: ${ctx.config.search_endpoint}`);
    }
    url.searchParams.set('engine', 'google');
    url.searchParams.set('q', q);
    url.searchParams.set('num', String(num));
    url.searchParams.set('api_key', ctx.config.search_api_key);

    const { res, body } = await getText(fetchImpl, 'web_search', url, 'application/json', ctx);
    if (!res.ok) {
      throw new ToolError('exit_status', `web_search: HTTP ${res.status} ${res.statusText}`, res.status >= 500 || res.status === 429);
    }
    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      throw new ToolError('transient', 'web_search: response was not JSON', true);
    }

    const hits = parseSearchResults(data, num);
    ctx.log.debug(`web_search: ${hits.length} results for ${JSON.stringify(q)}`);
    if (!hits.length) return `No results for: ${q}`;
    const lines = [`Results for: ${q}`];
    hits.forEach((h, i) => {
      lines.push(`${i + 1}. ${h.title}`, `   ${h.link}`);
      if (h.snippet) lines.push(`   ${h.snippet}`);
    });
    return lines.join('\n');
  };

  return { descriptor, handler };
}

/** fetch_url and web_search bound to a fetch implementation; tests pass a stand-in. */
export function webTools(fetchImpl: WebFetch = fetch): ToolDef[] {
  return [fetchUrl(fetchImpl), webSearch(fetchImpl)];
}
