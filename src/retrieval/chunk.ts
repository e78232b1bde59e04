export type LineChunk = {
  /** 1-based, inclusive. */
  startLine: number;
  endLine: number;
  text: string;
};

/**
 * Split text into windows of `size` lines, each overlapping the previous one
 * by `overlap` lines. Whitespace-only windows are dropped.
 */
export function chunkLines(text: string, size: number, overlap: number): LineChunk[] {
  const lines = text.split(/\r?\n/);
  if (lines.length && lines[lines.length - 1] === '') lines.pop();
  const win = Math.max(1, Math.floor(size));
  const step = Math.max(1, win - Math.max(0, Math.floor(overlap)));

  const out: LineChunk[] = [];
  for (let start = 0; start < lines.length; start += step) {
    const end = Math.min(start + win, lines.length);
    const body = lines.slice(start, end).join('\n');
    if (body.trim()) out.push({ startLine: start + 1, endLine: end, text: body });
    if (end >= lines.length) break;
  }
  return out;
}
