/**
 * Typed readers over validated tool arguments. The executor has already
 * checked the schema, so a mismatch here means the handler and its schema
 * disagree; that surfaces as invalid_args rather than a crash.
 */

import { ValidationError } from './tool-error.js';

export type ToolArgs = Record<string, unknown>;

function mismatch(field: string, expected: string, value: unknown): never {
  throw new ValidationError([{ field, message: `must be ${expected}`, value }]);
}

export function argStr(args: ToolArgs, field: string): string {
  const v = args[field];
  if (typeof v !== 'string') return mismatch(field, 'a string', v);
  return v;
}

export function argOptStr(args: ToolArgs, field: string): string | undefined {
  const v = args[field];
  if (v === undefined) return undefined;
  if (typeof v !== 'string') return mismatch(field, 'a string', v);
  return v;
}

export function argOptInt(args: ToolArgs, field: string): number | undefined {
  const v = args[field];
  if (v === undefined) return undefined;
  if (typeof v !== 'number' || !Number.isInteger(v)) return mismatch(field, 'an integer', v);
  return v;
}

export function argInt(args: ToolArgs, field: string, fallback: number): number {
  return argOptInt(args, field) ?? fallback;
}

export function argBool(args: ToolArgs, field: string): boolean {
  const v = args[field];
  if (v === undefined) return false;
  if (typeof v !== 'boolean') return mismatch(field, 'a boolean', v);
  return v;
}

export function argStrList(args: ToolArgs, field: string): string[] {
  const v = args[field];
  if (v === undefined) return [];
  if (!Array.isArray(v)) return mismatch(field, 'an array of strings', v);
  return v.map((item, i) => (typeof item === 'string' ? item : mismatch(`${field}[${i}]`, 'a string', item)));
}

/** True only for an explicit boolean `confirm: true`. */
export function isConfirmed(args: ToolArgs): boolean {
  return args.confirm === true;
}
