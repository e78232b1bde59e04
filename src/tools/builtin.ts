import type { RetrievalIndex } from '../retrieval/index.js';

import { fileTools } from './file-tools.js';
import { gitTools } from './git-tools.js';
import { indexTools } from './index-tools.js';
import type { ToolRegistry } from './registry.js';
import { obj, str } from './schema.js';
import { shellTools } from './shell-tools.js';
import { webTools, type WebFetch } from './web-tools.js';

export const ASK_USER = 'ask_user';

export type BuiltinOptions = {
  /** Registers search_index/build_index over this index when given. */
  index?: RetrievalIndex;
  fetchImpl?: WebFetch;
};

/** Registers the stock tool set. Order here is the order the model sees. */
export function registerBuiltinTools(registry: ToolRegistry, opts: BuiltinOptions = {}): ToolRegistry {
  const defs = [
    ...fileTools,
    ...shellTools,
    ...gitTools,
    ...webTools(opts.fetchImpl),
    ...(opts.index ? indexTools(opts.index) : []),
  ];
  for (const d of defs) registry.register(d.descriptor, d.handler);

  registry.registerUserInput({
    name: ASK_USER,
    description:
      'Ask the user a question and wait for the answer. Use when the request is ambiguous or you need a decision only the user can make.',
    parameters: obj({ question: str('The question to put to the user', { minLength: 1 }) }, ['question']),
  });
  return registry;
}
