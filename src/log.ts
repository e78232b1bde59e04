/**
 * Tagged stderr logging: `[tag] message`, colour on the tag only.
 * Debug lines print only when verbose; when a log file is configured every
 * line (debug included) is appended there with an ISO timestamp.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import path from 'node:path';

import { makeStyler, resolveColorMode, type Styler } from './term.js';
import type { ColorMode } from './types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = {
  readonly tag: string;
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  child: (tag: string) => Logger;
};

export type LoggerOptions = {
  verbose?: boolean;
  logFile?: string;
  color?: ColorMode;
  /** Defaults to process.stderr.write. */
  sink?: (line: string) => void;
};

const fileReady = new Set<string>();

function appendToFile(file: string, line: string) {
  try {
    if (!fileReady.has(file)) {
      mkdirSync(path.dirname(file), { recursive: true });
      fileReady.add(file);
    }
    appendFileSync(file, line + '\n');
  } catch (e: unknown) {
    fileReady.delete(file);
    process.stderr.write(`[log] cannot write ${file}: ${e instanceof Error ? e.message : String(e)}\n`);
  }
}

function paintTag(level: LogLevel, tag: string, s: Styler): string {
  const t = `[${tag}]`;
  switch (level) {
    case 'debug':
      return s.dim(t);
    case 'warn':
      return s.yellow(t);
    case 'error':
      return s.red(t);
    default:
      return s.cyan(t);
  }
}

export function createLogger(tag: string, opts: LoggerOptions = {}): Logger {
  const styler = makeStyler(resolveColorMode(opts.color ?? 'auto', process.stderr).enabled);
  const sink = opts.sink ?? ((line: string) => process.stderr.write(line + '\n'));

  const emit = (level: LogLevel, msg: string) => {
    if (opts.logFile) {
      appendToFile(opts.logFile, `${new Date().toISOString()} ${level.toUpperCase()} [${tag}] ${msg}`);
    }
    if (level === 'debug' && !opts.verbose) return;
    sink(`${paintTag(level, tag, styler)} ${msg}`);
  };

  return {
    tag,
    debug: (msg) => emit('debug', msg),
    info: (msg) => emit('info', msg),
    warn: (msg) => emit('warn', msg),
    error: (msg) => emit('error', msg),
    child: (sub) => createLogger(sub, opts),
  };
}

/** Logger that drops everything; handy default for library callers and tests. */
export const silentLogger: Logger = (() => {
  const noop = () => {};
  const logger: Logger = {
    tag: 'silent',
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
})();
