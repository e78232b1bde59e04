/**
 * System prompt, built from sections so a config override can replace the
 * whole thing while tests and `/system` can inspect the parts.
 */

import type { ConfirmationPolicy } from '../types.js';

export interface PromptContext {
  /** Workspace root every tool is confined to. */
  root: string;
  confirmation: ConfirmationPolicy;
  toolNames: string[];
}

export interface PromptSection {
  name: string;
  /** Return an empty string to skip the section. */
  build(ctx: PromptContext): string;
}

const identity: PromptSection = {
  name: 'identity',
  build: () =>
    "You are a terminal assistant with file, shell, git, web and search tools. Carry out the user's request with the tools, then answer briefly.",
};

const workspace: PromptSection = {
  name: 'workspace',
  build: (ctx) => `Workspace root: ${ctx.root}
- Use paths relative to the workspace root. Anything outside it is refused.
- Read a file before changing it. Check command output before reporting success.
- If a tool returns ERROR, read the msg and hint, fix the arguments, and try a different approach instead of repeating the same call.`,
};

const confirmation: PromptSection = {
  name: 'confirmation',
  build: (ctx) => {
    const base =
      'Destructive actions (overwriting or deleting files, risky shell commands, force-push) must carry "confirm": true, and only after the user has agreed to that specific action.';
    return ctx.confirmation === 'user'
      ? `${base} The user will also be asked to approve each one before it runs.`
      : base;
  },
};

const askUser: PromptSection = {
  name: 'ask_user',
  build: (ctx) =>
    ctx.toolNames.includes('ask_user')
      ? 'When the request is ambiguous or you need permission, call ask_user with one clear question and wait for the answer. Do not guess.'
      : '',
};

export const DEFAULT_SECTIONS: PromptSection[] = [identity, workspace, confirmation, askUser];

export function buildSystemPrompt(ctx: PromptContext, sections: PromptSection[] = DEFAULT_SECTIONS): string {
  return sections
    .map((s) => s.build(ctx).trim())
    .filter(Boolean)
    .join('\n\n');
}
