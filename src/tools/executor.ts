import type { Logger } from '../log.js';
import type { Sandbox } from '../sandbox.js';
import type { LatheConfig, ToolCall, ToolResult } from '../types.js';

import { isConfirmed, type ToolArgs } from './args.js';
import type { ToolBinding, ToolContext, ToolRegistry } from './registry.js';
import { parseArgsPayload, validateArgs } from './schema.js';
import { truncateChars } from './text-utils.js';
import { ToolError, ValidationError } from './tool-error.js';

export type ExecuteOptions = {
  signal?: AbortSignal;
  /** Out-of-band approval already given by the user (confirmation: 'user'). */
  approved?: boolean;
};

type Prepared = {
  binding: ToolBinding;
  args: ToolArgs;
  ctx: ToolContext;
  destructive?: string;
};

/**
 * Turns model-issued tool calls into ToolResults. `execute` never rejects:
 * unknown names, malformed payloads, sandbox refusals and handler failures all
 * come back as ok=false results the model can read and correct.
 */
export class ToolExecutor {
  private readonly registry: ToolRegistry;
  private readonly sandbox: Sandbox;
  private readonly config: LatheConfig;
  private readonly log: Logger;

  constructor(opts: { registry: ToolRegistry; sandbox: Sandbox; config: LatheConfig; log: Logger }) {
    this.registry = opts.registry;
    this.sandbox = opts.sandbox;
    this.config = opts.config;
    this.log = opts.log;
  }

  private async prepare(call: ToolCall, signal?: AbortSignal): Promise<Prepared> {
    const binding = this.registry.lookup(call.name);
    if (!binding) {
      const available = this.registry.names().slice(0, 24).join(', ');
      throw new ToolError('unknown_tool', `unknown tool: ${call.name}`, false, `available tools: ${available}`);
    }

    const parsed = parseArgsPayload(call.arguments);
    if ('issue' in parsed) throw new ValidationError([parsed.issue]);

    const { args, issues } = validateArgs(binding.descriptor.parameters, parsed.args);
    if (issues.length) throw new ValidationError(issues);

    const ctx: ToolContext = {
      sandbox: this.sandbox,
      config: this.config,
      log: this.log,
      toolCallId: call.id,
      signal,
    };
    const destructive = binding.descriptor.destructive ? await binding.descriptor.destructive(args, ctx) : undefined;
    return { binding, args, ctx, destructive };
  }

  /** Read-only handler tools may share a concurrent group. Calls the user answers never do. */
  private joinsGroup(name: string): boolean {
    const binding = this.registry.lookup(name);
    return binding?.kind === 'handler' && binding.descriptor.readOnly === true;
  }

  /**
   * Under `confirmation: 'user'`, the question to put to the user before
   * this call may run; undefined when no approval is needed (including calls
   * that will fail anyway and report why when executed).
   */
  async approvalQuestion(call: ToolCall): Promise<string | undefined> {
    if (this.config.confirmation !== 'user') return undefined;
    let prepared: Prepared;
    try {
      prepared = await this.prepare(call);
    } catch (e: unknown) {
      this.log.debug(`approval check skipped for ${call.name}: ${e instanceof Error ? e.message : String(e)}`);
      return undefined;
    }
    if (!prepared.destructive || !isConfirmed(prepared.args)) return undefined;
    return `Approve ${call.name}: ${prepared.destructive}? (y/n)`;
  }

  async execute(call: ToolCall, opts: ExecuteOptions = {}): Promise<ToolResult> {
    const started = Date.now();
    try {
      if (opts.signal?.aborted) throw new ToolError('cancelled', 'cancelled before start');

      const { binding, args, ctx, destructive } = await this.prepare(call, opts.signal);

      if (binding.kind === 'user_input') {
        throw new ToolError('invalid_args', `${call.name} is answered by the user and cannot be executed directly`);
      }

      if (destructive) {
        if (!isConfirmed(args)) {
          throw new ToolError(
            'confirmation_required',
            `${call.name} is destructive (${destructive}) and was called without confirm=true`,
            false,
            'ask the user first; if they agree, repeat the call with "confirm": true'
          );
        }
        if (this.config.confirmation === 'user' && !opts.approved) {
          throw new ToolError('confirmation_required', `${call.name} needs the user's approval (${destructive})`);
        }
      }

      this.log.debug(`→ ${call.name} ${call.arguments.slice(0, 200)}`);
      const output = await binding.handler(args, ctx);
      this.log.debug(`✓ ${call.name} (${Date.now() - started}ms)`);
      return {
        toolCallId: call.id,
        name: call.name,
        output: truncateChars(output, this.config.max_result_chars),
        ok: true,
      };
    } catch (e: unknown) {
      const te = ToolError.fromError(e);
      this.log.debug(`✗ ${call.name} [${te.code}] ${te.message.split('\n')[0]}`);
      return {
        toolCallId: call.id,
        name: call.name,
        output: truncateChars(te.toToolResult(), this.config.max_result_chars),
        ok: false,
        code: te.code,
      };
    }
  }

  /**
   * The calls from `start` on that run as one concurrent group: a run of
   * read-only calls when parallel_read_tools is on, otherwise calls[start] alone.
   */
  nextGroup(calls: ToolCall[], start: number): ToolCall[] {
    let n = 1;
    if (this.config.parallel_read_tools) {
      n = 0;
      while (start + n < calls.length && this.joinsGroup(calls[start + n].name)) n++;
    }
    return calls.slice(start, start + Math.max(1, n));
  }

  /** Run one group from nextGroup. Calls may overlap in time; results keep issue order. */
  executeGroup(group: ToolCall[], opts: ExecuteOptions = {}): Promise<ToolResult[]> {
    return Promise.all(group.map((c) => this.execute(c, opts)));
  }
}
