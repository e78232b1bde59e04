/**
 * Option coercions shared by the commander program and a one-line error
 * formatter for everything that reaches the terminal.
 */

import { InvalidArgumentError } from 'commander';

import { TurnBudgetExceeded } from '../agent/errors.js';
import { TransportError, isAbortError, isConnRefused } from '../client/errors.js';
import { parseNum } from '../config.js';
import type { ColorMode, ConfirmationPolicy, LatheConfig } from '../types.js';

/** Convert raw errors into user-friendly messages (no stack traces). */
export function friendlyError(e: unknown): string {
  const msg = e instanceof Error ? e.message : String(e);
  if (e instanceof TurnBudgetExceeded) {
    return `Stopped: ${msg}. The task needed more tool rounds than allowed; try --max-rounds <N>.`;
  }
  if (msg.includes('Is the model server running?')) {
    return `Connection failed: ${msg}`;
  }
  if (isConnRefused(e) || /connection timeout/i.test(msg)) {
    return `Connection failed: ${msg}. Is your model server running?`;
  }
  if (e instanceof TransportError && e.status === 503) {
    return `Model is loading, try again in a few seconds. (${msg})`;
  }
  if (isAbortError(e)) return 'Aborted.';
  return msg;
}

export function parsePositiveInt(value: string): number {
  const n = parseNum(value);
  if (n === undefined || !Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return n;
}

export function parseConfirmation(value: string): ConfirmationPolicy {
  if (value === 'model' || value === 'user') return value;
  throw new InvalidArgumentError('expected "model" or "user"');
}

/** Global options as commander hands them over. */
export type GlobalOpts = {
  endpoint?: string;
  model?: string;
  dir?: string;
  apiKey?: string;
  maxRounds?: number;
  stream?: boolean;
  confirmation?: ConfirmationPolicy;
  verbose?: boolean;
  config?: string;
  color?: boolean;
};

/**
 * CLI overrides for loadConfig. Negatable flags come through as `true` when
 * not given, so only an explicit `--no-x` (false) overrides.
 */
export function cliOverrides(o: GlobalOpts): Partial<LatheConfig> {
  const color: ColorMode | undefined = o.color === false ? 'never' : undefined;
  return {
    endpoint: o.endpoint,
    model: o.model,
    dir: o.dir,
    api_key: o.apiKey,
    max_rounds: o.maxRounds,
    stream: o.stream === false ? false : undefined,
    confirmation: o.confirmation,
    verbose: o.verbose ? true : undefined,
    color,
  };
}
