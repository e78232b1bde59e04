export type Role = 'system' | 'user' | 'assistant' | 'tool';

/** Tool call as it travels on the chat-completions wire. */
export type ChatToolCall = {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string; // JSON string
  };
};

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: ChatToolCall[] }
  | { role: 'tool'; content: string; tool_call_id: string };

export type AssistantMessage = Extract<ChatMessage, { role: 'assistant' }>;
export type ToolMessage = Extract<ChatMessage, { role: 'tool' }>;

// ── JSON schema subset understood by the argument validator ──────────────

export type StringSchema = {
  type: 'string';
  description?: string;
  enum?: string[];
  default?: string;
  minLength?: number;
};

export type NumberSchema = {
  type: 'integer' | 'number';
  description?: string;
  minimum?: number;
  maximum?: number;
  default?: number;
};

export type BooleanSchema = { type: 'boolean'; description?: string; default?: boolean };

export type ArraySchema = {
  type: 'array';
  description?: string;
  items: JsonSchema;
  default?: Array<string | number | boolean>;
};

export type ObjectSchema = {
  type: 'object';
  description?: string;
  properties: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
};

export type JsonSchema = StringSchema | NumberSchema | BooleanSchema | ArraySchema | ObjectSchema;

export type ToolSchema = {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: ObjectSchema;
  };
};

// ── Endpoint responses ───────────────────────────────────────────────────

export type ChatCompletionResponse = {
  id?: string;
  model?: string;
  choices: Array<{
    index: number;
    message: {
      role: 'assistant';
      content: string | null;
      tool_calls?: Array<{ id?: string; name: string; arguments: string }>;
    };
    finish_reason?: string | null;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
};

export type ModelsResponse = {
  data: Array<{ id: string; owned_by?: string }>;
};

// ── Tool calls and results ───────────────────────────────────────────────

/** A model-issued request to run one named tool. `arguments` stays raw until execution. */
export type ToolCall = {
  id: string;
  name: string;
  arguments: string;
};

export type ToolErrorCode =
  | 'invalid_args' // wrong types, missing params, unknown keys
  | 'unknown_tool' // name not in the registry
  | 'not_found' // file/directory/binary doesn't exist
  | 'conflict' // already exists
  | 'blocked' // sandbox refused the path or command
  | 'confirmation_required' // destructive call without confirm=true
  | 'permission' // EACCES / EPERM
  | 'timeout'
  | 'exit_status' // subprocess exited non-zero
  | 'cancelled'
  | 'transient' // network hiccup
  | 'internal';

export type ToolResult = {
  toolCallId: string;
  name: string;
  output: string;
  ok: boolean;
  code?: ToolErrorCode;
};

export type ProcessResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  cancelled: boolean;
  truncated: boolean;
  durationMs: number;
  /** Effective timeout after capping. */
  timeoutSec: number;
};

// ── Model decisions and turn outcomes ────────────────────────────────────

export type Decision =
  | { kind: 'final'; text: string }
  | { kind: 'tool_calls'; calls: ToolCall[]; text: string }
  | { kind: 'needs_input'; calls: ToolCall[]; text: string; question: string; askIndex: number };

export type LoopState =
  | 'idle'
  | 'awaiting_model'
  | 'executing_tools'
  | 'streaming'
  | 'suspended'
  | 'done'
  | 'failed'
  | 'cancelled';

// ── Configuration ────────────────────────────────────────────────────────

export type ConfirmationPolicy = 'model' | 'user';

export type ColorMode = 'auto' | 'always' | 'never';

export type SafetyConfig = {
  /** Extra regexes that are always blocked. */
  blocked_patterns?: string[];
  /** Extra regexes that need confirm=true. */
  confirm_patterns?: string[];
  /** Regexes that waive the confirm tier for known-safe commands. */
  allow_patterns?: string[];
};

export type LatheConfig = {
  endpoint: string;
  api_key: string;
  model: string;
  embed_model: string;
  /** Workspace root every tool is confined to. */
  dir: string;
  max_tokens: number;
  temperature: number;
  context_window: number;
  max_rounds: number;
  stream: boolean;
  response_timeout: number;
  connection_timeout: number;
  tool_timeout: number;
  max_timeout: number;
  max_output_bytes: number;
  max_result_chars: number;
  parallel_read_tools: boolean;
  confirmation: ConfirmationPolicy;
  index_dir: string;
  chunk_lines: number;
  chunk_overlap: number;
  web_max_chars: number;
  /** SerpAPI-compatible JSON search endpoint used by web_search. */
  search_endpoint: string;
  /** Key for search_endpoint; web_search is refused without one. */
  search_api_key: string;
  verbose: boolean;
  log_file: string;
  color: ColorMode;
  system_prompt: string;
  safety: SafetyConfig;
};
