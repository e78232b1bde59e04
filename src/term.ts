import pc from 'picocolors';

import type { ColorMode } from './types.js';

export function resolveColorMode(mode: ColorMode, stream: { isTTY?: boolean } = process.stdout): { enabled: boolean } {
  const env = process.env;

  // Standard opt-out
  if ('NO_COLOR' in env) return { enabled: false };

  // Explicit force/disable
  if (env.FORCE_COLOR === '0') return { enabled: false };
  if (env.FORCE_COLOR && env.FORCE_COLOR !== '0') return { enabled: true };

  if (mode === 'always') return { enabled: true };
  if (mode === 'never') return { enabled: false };

  // auto
  return { enabled: !!stream.isTTY };
}

export type Styler = {
  enabled: boolean;
  dim: (s: string) => string;
  bold: (s: string) => string;
  red: (s: string) => string;
  yellow: (s: string) => string;
  green: (s: string) => string;
  cyan: (s: string) => string;
  magenta: (s: string) => string;
};

export function makeStyler(enabled: boolean): Styler {
  const wrap = (fn: (s: string) => string) => (s: string) => (enabled ? fn(s) : s);
  return {
    enabled,
    dim: wrap(pc.dim),
    bold: wrap(pc.bold),
    red: wrap(pc.red),
    yellow: wrap(pc.yellow),
    green: wrap(pc.green),
    cyan: wrap(pc.cyan),
    magenta: wrap(pc.magenta),
  };
}

export function banner(title: string, s: Styler): string {
  return s.cyan(s.bold(title));
}

export function warn(msg: string, s: Styler): string {
  return s.yellow('WARN') + s.dim(': ') + msg;
}

export function err(msg: string, s: Styler): string {
  return s.red('ERROR') + s.dim(': ') + msg;
}

/** One-line summary of a tool result for the REPL: `✓ read_file` / `✗ run_shell: timed out`. */
export function toolLine(name: string, ok: boolean, detail: string, s: Styler): string {
  const mark = ok ? s.green('✓') : s.red('✗');
  const firstLine = detail.split('\n').find((l) => l.trim()) ?? '';
  const clipped = firstLine.length > 120 ? firstLine.slice(0, 117) + '...' : firstLine;
  return `${mark} ${s.bold(name)}${clipped ? s.dim(': ' + clipped) : ''}`;
}
