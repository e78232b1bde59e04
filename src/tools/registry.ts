import type { Logger } from '../log.js';
import type { Sandbox } from '../sandbox.js';
import type { LatheConfig, ObjectSchema, ToolSchema } from '../types.js';

import type { ToolArgs } from './args.js';

export type ToolContext = {
  sandbox: Sandbox;
  config: LatheConfig;
  log: Logger;
  toolCallId: string;
  signal?: AbortSignal;
};

export type ToolHandler = (args: ToolArgs, ctx: ToolContext) => Promise<string>;

export type ToolDescriptor = {
  name: string;
  description: string;
  parameters: ObjectSchema;
  /** No side effects; eligible for concurrent execution. */
  readOnly?: boolean;
  /**
   * Returns why this particular invocation is destructive, or undefined when
   * it isn't. Destructive calls must carry `confirm: true`.
   */
  destructive?: (args: ToolArgs, ctx: ToolContext) => string | undefined | Promise<string | undefined>;
};

/**
 * A registered tool. `user_input` bindings are answered by the person at the
 * terminal through the loop's suspension, never executed by a handler.
 */
export type ToolBinding =
  | { kind: 'handler'; descriptor: ToolDescriptor; handler: ToolHandler }
  | { kind: 'user_input'; descriptor: ToolDescriptor };

/** A descriptor with its handler, as the built-in tool modules export them. */
export type ToolDef = { descriptor: ToolDescriptor; handler: ToolHandler };

const NAME_RE = /^[a-zA-Z0-9_-]{1,64}$/;

export class ToolRegistry {
  private readonly bindings = new Map<string, ToolBinding>();

  register(descriptor: ToolDescriptor, handler: ToolHandler): this {
    return this.add({ kind: 'handler', descriptor, handler });
  }

  registerUserInput(descriptor: ToolDescriptor): this {
    return this.add({ kind: 'user_input', descriptor });
  }

  private add(binding: ToolBinding): this {
    const name = binding.descriptor.name;
    if (!NAME_RE.test(name)) throw new Error(`invalid tool name: ${JSON.stringify(name)}`);
    if (this.bindings.has(name)) throw new Error(`tool already registered: ${name}`);
    this.bindings.set(name, Object.freeze(binding));
    return this;
  }

  lookup(name: string): ToolBinding | undefined {
    return this.bindings.get(name);
  }

  names(): string[] {
    return [...this.bindings.keys()];
  }

  descriptors(): ToolDescriptor[] {
    return [...this.bindings.values()].map((b) => b.descriptor);
  }

  /** The `tools` array sent with every request, in registration order. */
  schemaCatalogue(): ToolSchema[] {
    return this.descriptors().map((d) => ({
      type: 'function',
      function: { name: d.name, description: d.description, parameters: d.parameters },
    }));
  }
}
