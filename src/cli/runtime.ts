import { createSession, type AgentSession } from '../agent.js';
import { OpenAIClient, type FetchLike } from '../client.js';
import { createLogger, type Logger } from '../log.js';
import { OpenAIModelClient, type ModelClient } from '../model.js';
import { ClientEmbedder, RetrievalIndex, type Embedder } from '../retrieval/index.js';
import { CommandPolicy, loadSafetyConfig, mergeSafetyConfig } from '../safety.js';
import { Sandbox } from '../sandbox.js';
import { registerBuiltinTools } from '../tools/builtin.js';
import { ToolExecutor } from '../tools/executor.js';
import { ToolRegistry } from '../tools/registry.js';
import type { LatheConfig } from '../types.js';

/** Everything a CLI command needs, wired from one config record. */
export type Runtime = {
  config: LatheConfig;
  log: Logger;
  client: OpenAIClient;
  sandbox: Sandbox;
  registry: ToolRegistry;
  executor: ToolExecutor;
  index: RetrievalIndex;
  createSession: () => AgentSession;
};

export type RuntimeOverrides = {
  /** Stand-ins for the HTTP layer; tests pass these. */
  fetchImpl?: FetchLike;
  model?: ModelClient;
  embedder?: Embedder;
  log?: Logger;
  /** Path to safety.json; defaults to the config dir. */
  safetyPath?: string;
};

export async function buildRuntime(config: LatheConfig, o: RuntimeOverrides = {}): Promise<Runtime> {
  const log = o.log ?? createLogger('lathe', { verbose: config.verbose, logFile: config.log_file || undefined, color: config.color });

  const safety = mergeSafetyConfig(config.safety, await loadSafetyConfig(o.safetyPath, log.child('safety')));
  const sandbox = Sandbox.fromConfig(config, log.child('sandbox'), new CommandPolicy(safety, log.child('safety')));

  const client = new OpenAIClient({
    endpoint: config.endpoint,
    apiKey: config.api_key,
    responseTimeoutSec: config.response_timeout,
    connectionTimeoutSec: config.connection_timeout,
    log: log.child('client'),
    fetchImpl: o.fetchImpl,
  });
  const model = o.model ?? new OpenAIModelClient(client, config, log.child('client'));
  const embedder = o.embedder ?? new ClientEmbedder(client, config.embed_model);
  const index = RetrievalIndex.fromConfig(config, sandbox, embedder, log.child('index'));

  const registry = registerBuiltinTools(new ToolRegistry(), { index, fetchImpl: o.fetchImpl });
  const executor = new ToolExecutor({ registry, sandbox, config, log: log.child('tool') });

  return {
    config,
    log,
    client,
    sandbox,
    registry,
    executor,
    index,
    createSession: () => createSession({ config, model, registry, executor, log: log.child('agent') }),
  };
}
