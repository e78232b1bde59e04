import type { ReplContext } from './repl-context.js';

export interface SlashCommand {
  name: string;
  aliases?: string[];
  usage?: string;
  description: string;
  execute(ctx: ReplContext, args: string): Promise<void>;
}

const registry = new Map<string, SlashCommand>();

export function registerCommand(cmd: SlashCommand): void {
  registry.set(cmd.name.toLowerCase(), cmd);
  for (const a of cmd.aliases ?? []) registry.set(a.toLowerCase(), cmd);
}

export function registerAll(cmds: SlashCommand[]): void {
  for (const c of cmds) registerCommand(c);
}

export function findCommand(line: string): SlashCommand | null {
  const head = (line.trim().split(/\s+/)[0] || '').toLowerCase();
  if (!head.startsWith('/')) return null;
  return registry.get(head) ?? null;
}

/** Distinct commands, sorted by name. */
export function allCommands(): SlashCommand[] {
  return [...new Set(registry.values())].sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Run a slash command line. Returns false when the line is not a slash
 * command at all, so the caller can treat it as an instruction.
 */
export async function dispatchSlash(ctx: ReplContext, line: string): Promise<boolean> {
  const trimmed = line.trim();
  if (!trimmed.startsWith('/')) return false;
  const cmd = findCommand(trimmed);
  if (!cmd) {
    ctx.print(ctx.S.yellow(`unknown command: ${trimmed.split(/\s+/)[0]} (try /help)`));
    return true;
  }
  const args = trimmed.slice(trimmed.split(/\s+/)[0].length).trim();
  await cmd.execute(ctx, args);
  return true;
}
