import fs from 'node:fs/promises';
import path from 'node:path';

import { Conversation } from './conversation.js';
import { ToolError } from './tools/tool-error.js';
import { errorCode, stateDir, timestampedId } from './utils.js';

export type TranscriptInfo = { name: string; file: string; modified: Date; bytes: number };

export function transcriptsDir(base = stateDir()): string {
  return path.join(base, 'transcripts');
}

/** Bare names live in the transcripts dir; anything with a separator or .jsonl is a path. */
function transcriptPath(nameOrPath: string, base?: string): string {
  if (nameOrPath.includes('/') || nameOrPath.endsWith('.jsonl')) return path.resolve(nameOrPath);
  const safe = nameOrPath.replace(/[^A-Za-z0-9._-]+/g, '-');
  if (!safe || safe.startsWith('.')) throw new Error(`invalid transcript name: ${nameOrPath}`);
  return path.join(transcriptsDir(base), `${safe}.jsonl`);
}

/** Write the conversation as JSONL; returns the file written. */
export async function saveTranscript(conv: Conversation, name?: string, base?: string): Promise<string> {
  const file = transcriptPath(name || `chat-${timestampedId()}`, base);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, conv.toJSONL(), 'utf8');
  return file;
}

/** Result recorded for calls a transcript left open, e.g. one saved while a question was pending. */
export const INTERRUPTED_RESULT = new ToolError('cancelled', 'interrupted: the session ended before this call returned').toToolResult();

/**
 * Read and validate a transcript. Throws ConversationError on a bad line or
 * broken pairing. Trailing calls without results are closed with
 * INTERRUPTED_RESULT so the next turn can append.
 */
export async function loadTranscript(nameOrPath: string, base?: string): Promise<Conversation> {
  const text = await fs.readFile(transcriptPath(nameOrPath, base), 'utf8');
  const conv = Conversation.fromJSONL(text);
  conv.closeOpenCalls(INTERRUPTED_RESULT);
  return conv;
}

/** Saved transcripts, newest first. */
export async function listTranscripts(base?: string): Promise<TranscriptInfo[]> {
  const dir = transcriptsDir(base);
  const entries = await fs.readdir(dir).catch((e: unknown) => {
    if (errorCode(e) === 'ENOENT') return [];
    throw e;
  });
  const out: TranscriptInfo[] = [];
  for (const f of entries) {
    if (!f.endsWith('.jsonl')) continue;
    const file = path.join(dir, f);
    const st = await fs.stat(file);
    out.push({ name: f.slice(0, -'.jsonl'.length), file, modified: st.mtime, bytes: st.size });
  }
  return out.sort((a, b) => b.modified.getTime() - a.modified.getTime());
}
