/**
 * /tools: the catalogue the model sees.
 */

import type { ToolRegistry } from '../../tools/registry.js';
import type { Styler } from '../../term.js';
import type { SlashCommand } from '../command-registry.js';

export function formatToolList(registry: ToolRegistry, S: Styler): string[] {
  return registry.names().map((name) => {
    const b = registry.lookup(name);
    if (!b) return name;
    const tags = [
      b.kind === 'user_input' ? 'asks user' : '',
      b.descriptor.readOnly ? 'read-only' : '',
      b.descriptor.destructive ? 'may need confirm' : '',
    ].filter(Boolean);
    const summary = b.descriptor.description.split(/(?<=\.)\s/)[0];
    return `  ${S.bold(name)}${tags.length ? S.dim(` [${tags.join(', ')}]`) : ''}  ${summary}`;
  });
}

export const toolCommands: SlashCommand[] = [
  {
    name: '/tools',
    description: 'List the available tools',
    async execute(ctx) {
      for (const line of formatToolList(ctx.runtime.registry, ctx.S)) ctx.print(line);
    },
  },
];
