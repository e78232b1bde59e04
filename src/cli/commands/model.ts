/**
 * Model and config commands: /model, /config.
 */

import type { LatheConfig } from '../../types.js';
import type { SlashCommand } from '../command-registry.js';

/** Config as printed to the terminal; API keys never are. */
export function redactConfig(config: LatheConfig): Record<string, unknown> {
  return {
    ...config,
    api_key: config.api_key ? '***' : '',
    search_api_key: config.search_api_key ? '***' : '',
  };
}

export const modelCommands: SlashCommand[] = [
  {
    name: '/model',
    usage: '[name]',
    description: 'Show or switch the chat model',
    async execute(ctx, args) {
      if (!args) {
        ctx.print(`model: ${ctx.config.model} @ ${ctx.config.endpoint}`);
        return;
      }
      ctx.config.model = args;
      ctx.print(ctx.S.dim(`model set to ${args}`));
    },
  },
  {
    name: '/config',
    description: 'Show the effective configuration',
    async execute(ctx) {
      ctx.print(JSON.stringify(redactConfig(ctx.config), null, 2));
    },
  },
];
