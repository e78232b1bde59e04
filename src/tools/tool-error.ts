/**
 * Structured tool error taxonomy. Every failure a handler raises ends up as
 * one of these, rendered into the tool message the model sees.
 */

import type { ToolErrorCode } from '../types.js';
import { errorCode } from '../utils.js';

export type { ToolErrorCode };

export type FieldIssue = {
  field: string;
  message: string;
  value?: unknown;
};

export class ToolError extends Error {
  constructor(
    public readonly code: ToolErrorCode,
    message: string,
    public readonly retryable: boolean = false,
    public readonly hint?: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ToolError';
  }

  /**
   * Format as a concise tool result content string
   */
  toToolResult(): string {
    const lines = [`ERROR: code=${this.code} retryable=${this.retryable}`, `msg=${this.message}`];

    if (this.hint) {
      lines.push(`hint=${this.hint}`);
    }

    if (this.details && Object.keys(this.details).length > 0) {
      const detailsStr = Object.entries(this.details)
        .map(([k, v]) => `${k}=${(JSON.stringify(v) ?? 'undefined').slice(0, 200)}`)
        .join(' ');
      lines.push(`details=${detailsStr}`);
    }

    return lines.join('\n');
  }

  /**
   * Create from a generic error, inferring the code from errno or the message.
   */
  static fromError(err: unknown, defaultCode: ToolErrorCode = 'internal'): ToolError {
    if (err instanceof ToolError) return err;

    const message = err instanceof Error ? err.message : String(err);
    const errno = errorCode(err);

    if (err instanceof Error && err.name === 'AbortError') {
      return new ToolError('cancelled', 'cancelled: the turn was interrupted');
    }
    if (errno === 'ENOENT' || message.includes('not found')) {
      return new ToolError('not_found', message);
    }
    if (errno === 'EACCES' || errno === 'EPERM' || message.includes('permission denied')) {
      return new ToolError('permission', message);
    }
    if (errno === 'EEXIST' || message.includes('already exists')) {
      return new ToolError('conflict', message);
    }
    if (errno === 'ETIMEDOUT' || message.includes('timed out')) {
      return new ToolError('timeout', message, true);
    }
    if (errno === 'ECONNREFUSED' || errno === 'ECONNRESET' || message.includes('fetch failed')) {
      return new ToolError('transient', message, true);
    }
    if (errno === 'EISDIR' || errno === 'ENOTDIR' || errno === 'ENOTEMPTY') {
      return new ToolError('invalid_args', message);
    }

    return new ToolError(defaultCode, message);
  }
}

/**
 * Validation error with field-level details
 */
export class ValidationError extends ToolError {
  constructor(public readonly errors: FieldIssue[]) {
    super(
      'invalid_args',
      `Validation failed: ${errors.map((e) => `${e.field}: ${e.message}`).join('; ')}`,
      false,
      undefined,
      { fields: errors.map((e) => e.field) }
    );
    this.name = 'ValidationError';
  }

  toToolResult(): string {
    const lines = [`ERROR: code=invalid_args retryable=false`];
    for (const err of this.errors) {
      lines.push(`- ${err.field}: ${err.message}`);
    }
    lines.push('hint=fix the listed fields and call the tool again');
    return lines.join('\n');
  }
}
