import type {
  ArraySchema,
  BooleanSchema,
  JsonSchema,
  NumberSchema,
  ObjectSchema,
  StringSchema,
} from '../types.js';
import { isRecord } from '../utils.js';

import type { FieldIssue } from './tool-error.js';

// ── Schema builders ──────────────────────────────────────────────────────

export const obj = (
  properties: Record<string, JsonSchema>,
  required: string[] = [],
  description?: string
): ObjectSchema => ({
  type: 'object',
  additionalProperties: false,
  properties,
  required,
  ...(description !== undefined && { description }),
});

export const str = (description?: string, extra: Omit<StringSchema, 'type' | 'description'> = {}): StringSchema => ({
  type: 'string',
  ...(description !== undefined && { description }),
  ...extra,
});

export const oneOf = (values: string[], description?: string, def?: string): StringSchema => ({
  type: 'string',
  enum: values,
  ...(description !== undefined && { description }),
  ...(def !== undefined && { default: def }),
});

export const bool = (description?: string, def?: boolean): BooleanSchema => ({
  type: 'boolean',
  ...(description !== undefined && { description }),
  ...(def !== undefined && { default: def }),
});

export const int = (
  description?: string,
  opts: { min?: number; max?: number; default?: number } = {}
): NumberSchema => ({
  type: 'integer',
  ...(description !== undefined && { description }),
  ...(opts.min !== undefined && { minimum: opts.min }),
  ...(opts.max !== undefined && { maximum: opts.max }),
  ...(opts.default !== undefined && { default: opts.default }),
});

export const arr = (items: JsonSchema, description?: string, def?: ArraySchema['default']): ArraySchema => ({
  type: 'array',
  items,
  ...(description !== undefined && { description }),
  ...(def !== undefined && { default: def }),
});

/** The flag destructive tools carry; see the executor's confirmation gate. */
export const confirmFlag = () =>
  bool('Set to true only after the user has explicitly agreed to this destructive action.');

// ── Payload parsing ──────────────────────────────────────────────────────

export function stripMarkdownFences(s: string): string {
  const trimmed = s.trim();
  // Match ```json\n...\n``` or ```\n...\n```
  const m = /^```(?:json)?\s*\n?([\s\S]*?)\n?```\s*$/.exec(trimmed);
  return m ? m[1] : s;
}

/**
 * Parse a raw argument payload into a record. Empty payloads mean "no
 * arguments"; anything that isn't a JSON object is an issue on `arguments`.
 */
export function parseArgsPayload(raw: string): { args: Record<string, unknown> } | { issue: FieldIssue } {
  const text = stripMarkdownFences(raw ?? '').trim();
  if (!text) return { args: {} };

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e: unknown) {
    const detail = e instanceof Error ? e.message : String(e);
    return { issue: { field: 'arguments', message: `not valid JSON (${detail})`, value: raw.slice(0, 200) } };
  }
  if (!isRecord(parsed)) {
    return { issue: { field: 'arguments', message: 'must be a JSON object', value: parsed } };
  }
  return { args: parsed };
}

// ── Validation ───────────────────────────────────────────────────────────

function typeName(v: unknown): string {
  if (v === null) return 'null';
  if (Array.isArray(v)) return 'array';
  return typeof v;
}

function checkValue(field: string, schema: JsonSchema, value: unknown, issues: FieldIssue[]): unknown {
  switch (schema.type) {
    case 'string':
      if (typeof value !== 'string') {
        issues.push({ field, message: `must be a string (got ${typeName(value)})`, value });
        return value;
      }
      if (schema.enum && !schema.enum.includes(value)) {
        issues.push({ field, message: `must be one of: ${schema.enum.join(', ')}`, value });
      }
      if (schema.minLength !== undefined && value.length < schema.minLength) {
        issues.push({ field, message: `must be at least ${schema.minLength} characters`, value });
      }
      return value;

    case 'integer':
    case 'number': {
      // Lenient on numeric strings; small models often quote numbers.
      const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
      if (typeof n !== 'number' || !Number.isFinite(n)) {
        issues.push({ field, message: `must be ${schema.type === 'integer' ? 'an integer' : 'a number'}`, value });
        return value;
      }
      if (schema.type === 'integer' && !Number.isInteger(n)) {
        issues.push({ field, message: 'must be an integer', value });
        return value;
      }
      if (schema.minimum !== undefined && n < schema.minimum) {
        issues.push({ field, message: `must be >= ${schema.minimum}`, value });
      }
      if (schema.maximum !== undefined && n > schema.maximum) {
        issues.push({ field, message: `must be <= ${schema.maximum}`, value });
      }
      return n;
    }

    case 'boolean':
      if (typeof value === 'boolean') return value;
      if (value === 'true') return true;
      if (value === 'false') return false;
      issues.push({ field, message: `must be a boolean (got ${typeName(value)})`, value });
      return value;

    case 'array':
      if (!Array.isArray(value)) {
        issues.push({ field, message: `must be an array (got ${typeName(value)})`, value });
        return value;
      }
      return value.map((item, i) => checkValue(`${field}[${i}]`, schema.items, item, issues));

    case 'object':
      if (!isRecord(value)) {
        issues.push({ field, message: `must be an object (got ${typeName(value)})`, value });
        return value;
      }
      return checkObject(schema, value, issues, `${field}.`);
  }
}

function checkObject(
  schema: ObjectSchema,
  args: Record<string, unknown>,
  issues: FieldIssue[],
  prefix = ''
): Record<string, unknown> {
  const out: Record<string, unknown> = {};

  if (schema.additionalProperties === false) {
    for (const k of Object.keys(args)) {
      if (!(k in schema.properties)) {
        issues.push({ field: `${prefix}${k}`, message: 'unknown property', value: args[k] });
      }
    }
  }

  for (const k of schema.required ?? []) {
    if (args[k] === undefined || args[k] === null) {
      issues.push({ field: `${prefix}${k}`, message: 'missing required field' });
    }
  }

  for (const [k, propSchema] of Object.entries(schema.properties)) {
    const v = args[k];
    if (v === undefined || v === null) {
      if ('default' in propSchema && propSchema.default !== undefined) out[k] = propSchema.default;
      continue;
    }
    out[k] = checkValue(`${prefix}${k}`, propSchema, v, issues);
  }

  return out;
}

/**
 * Validate `args` against a tool's parameter schema. Returns the cleaned
 * arguments (defaults applied, numeric strings coerced, unknown keys dropped)
 * and every issue found; callers must not run the tool when issues is non-empty.
 */
export function validateArgs(
  schema: ObjectSchema,
  args: Record<string, unknown>
): { args: Record<string, unknown>; issues: FieldIssue[] } {
  const issues: FieldIssue[] = [];
  const cleaned = checkObject(schema, args, issues);
  return { args: cleaned, issues };
}
