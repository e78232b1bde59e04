/**
 * Session commands: /help, /history, /clear, /save, /load, /transcripts,
 * /system, /exit.
 */

import { listTranscripts, loadTranscript, saveTranscript } from '../../transcripts.js';
import type { ChatMessage } from '../../types.js';
import { allCommands, type SlashCommand } from '../command-registry.js';

const PREVIEW_CHARS = 160;

function preview(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > PREVIEW_CHARS ? flat.slice(0, PREVIEW_CHARS - 3) + '...' : flat;
}

export function describeMessage(m: ChatMessage): string {
  switch (m.role) {
    case 'assistant':
      if (m.tool_calls?.length) {
        const calls = m.tool_calls.map((c) => `${c.function.name}(${preview(c.function.arguments)})`).join(', ');
        return `assistant → ${calls}`;
      }
      return `assistant: ${preview(m.content ?? '')}`;
    case 'tool':
      return `tool[${m.tool_call_id}]: ${preview(m.content)}`;
    default:
      return `${m.role}: ${preview(m.content)}`;
  }
}

export const sessionCommands: SlashCommand[] = [
  {
    name: '/exit',
    aliases: ['/quit'],
    description: 'Leave the session',
    async execute(ctx) {
      ctx.requestExit();
    },
  },
  {
    name: '/help',
    description: 'Show available commands',
    async execute(ctx) {
      for (const c of allCommands()) {
        const names = [c.name, ...(c.aliases ?? [])].join(', ');
        const usage = c.usage ? ` ${c.usage}` : '';
        ctx.print(`  ${ctx.S.bold(names + usage)}  ${ctx.S.dim(c.description)}`);
      }
      ctx.print(ctx.S.dim('Anything else is sent to the model. Ctrl-C cancels a running turn.'));
    },
  },
  {
    name: '/history',
    usage: '[n]',
    description: 'Show the last n messages (default 10)',
    async execute(ctx, args) {
      const n = Number.parseInt(args, 10);
      const count = Number.isFinite(n) && n > 0 ? n : 10;
      const messages = ctx.session.conversation.snapshot().filter((m) => m.role !== 'system');
      if (!messages.length) {
        ctx.print(ctx.S.dim('(no messages yet)'));
        return;
      }
      for (const m of messages.slice(-count)) ctx.print(describeMessage(m));
    },
  },
  {
    name: '/clear',
    description: 'Start over with an empty conversation',
    async execute(ctx) {
      ctx.session.reset();
      ctx.print(ctx.S.dim('conversation cleared'));
    },
  },
  {
    name: '/save',
    usage: '[name]',
    description: 'Save the conversation as a JSONL transcript',
    async execute(ctx, args) {
      const file = await saveTranscript(ctx.session.conversation, args || undefined, ctx.stateBase);
      ctx.print(`saved ${file}`);
    },
  },
  {
    name: '/load',
    usage: '<name|path>',
    description: 'Replace the conversation with a saved transcript',
    async execute(ctx, args) {
      if (!args) {
        ctx.print('usage: /load <name|path>');
        return;
      }
      const loaded = await loadTranscript(args, ctx.stateBase);
      ctx.session.cancel();
      ctx.session.conversation.replace(loaded);
      if (ctx.session.conversation.system === undefined) ctx.session.setSystemPrompt('');
      ctx.print(`loaded ${args} (${loaded.length} messages)`);
    },
  },
  {
    name: '/transcripts',
    description: 'List saved transcripts, newest first',
    async execute(ctx) {
      const list = await listTranscripts(ctx.stateBase);
      if (!list.length) {
        ctx.print(ctx.S.dim('(no saved transcripts)'));
        return;
      }
      for (const t of list) {
        ctx.print(`  ${t.name}  ${ctx.S.dim(`${t.modified.toISOString()}  ${t.bytes} bytes`)}`);
      }
    },
  },
  {
    name: '/system',
    usage: '[text]',
    description: 'Show the system prompt, or replace it',
    async execute(ctx, args) {
      if (!args) {
        ctx.print(ctx.session.conversation.system ?? '(none)');
        return;
      }
      ctx.session.setSystemPrompt(args);
      ctx.print(ctx.S.dim('system prompt updated'));
    },
  },
];
