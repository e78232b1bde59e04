import type { RetrievalIndex } from '../retrieval/index.js';

import { argInt, argStr, argStrList } from './args.js';
import type { ToolDef } from './registry.js';
import { arr, int, obj, str } from './schema.js';

export function indexTools(index: RetrievalIndex): ToolDef[] {
  const search: ToolDef = {
    descriptor: {
      name: 'search_index',
      description: 'Semantic search over the workspace index. Returns the closest code/text chunks with their line ranges.',
      readOnly: true,
      parameters: obj(
        {
          query: str('What to look for, in natural language or code terms', { minLength: 1 }),
          k: int('Number of results', { min: 1, max: 50, default: 5 }),
        },
        ['query']
      ),
    },
    async handler(args, ctx) {
      const hits = await index.query(argStr(args, 'query'), argInt(args, 'k', 5), ctx.signal);
      if (!hits.length) return '[no matches]';
      return hits
        .map((h) => `${h.score.toFixed(3)}  ${h.chunkId}\n${h.snippet}`)
        .join('\n\n');
    },
  };

  const build: ToolDef = {
    descriptor: {
      name: 'build_index',
      description: 'Rebuild the semantic index from workspace files (respects .gitignore).',
      parameters: obj({ paths: arr(str(), 'Files or directories to index', ['.']) }),
    },
    async handler(args, ctx) {
      const paths = argStrList(args, 'paths');
      const s = await index.build(paths.length ? paths : ['.'], { signal: ctx.signal });
      return `indexed ${s.chunks} chunks from ${s.files} files (${s.skipped} skipped, dim ${s.dim})`;
    },
  };

  return [search, build];
}
