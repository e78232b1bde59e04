/**
 * Text helpers for tool output: byte-capped truncation, ANSI and HTML stripping.
 */

export function stripAnsi(s: string): string {
  // CSI sequences and OSC sequences
  return s.replace(/\x1b\[[0-9;?]*[ -/]*[@-~]/g, '').replace(/\x1b\][^\x07]*(\x07|\x1b\\)/g, '');
}

/**
 * Cut `s` to at most `maxBytes` UTF-8 bytes and append a marker naming the
 * full size. A multi-byte character split by the cut is dropped.
 */
export function truncateBytes(
  s: string,
  maxBytes: number,
  totalBytesHint?: number
): { text: string; truncated: boolean } {
  const b = Buffer.from(s, 'utf8');
  const total =
    typeof totalBytesHint === 'number' && Number.isFinite(totalBytesHint) ? totalBytesHint : b.length;
  if (b.length <= maxBytes && total <= b.length) return { text: s, truncated: false };
  const cut = b.subarray(0, Math.min(maxBytes, b.length)).toString('utf8').replace(/\uFFFD+$/, '');
  return { text: cut + `\n...[output truncated, ${total} bytes total]`, truncated: true };
}

/** Character-based cap for tool results handed back to the model. */
export function truncateChars(s: string, maxChars: number): string {
  if (s.length <= maxChars) return s;
  return s.slice(0, maxChars) + `\n...[truncated, ${s.length} chars total]`;
}

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/**
 * Reduce an HTML document to readable text: drop script/style/noscript
 * bodies and comments, turn block boundaries into newlines, strip the
 * remaining tags, decode common entities and squeeze blank runs.
 */
export function htmlToText(html: string): string {
  return html
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<(script|style|noscript|template)\b[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|h[1-6]|li|tr|section|article|header|footer|pre|blockquote)>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (m, ent: string) => {
      if (ent[0] === '#') {
        const code = ent[1] === 'x' || ent[1] === 'X' ? parseInt(ent.slice(2), 16) : parseInt(ent.slice(1), 10);
        return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : m;
      }
      return ENTITIES[ent.toLowerCase()] ?? m;
    })
    .replace(/[ \t\f\v]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
