import type { AgentSession } from '../agent.js';
import type { Styler } from '../term.js';
import type { LatheConfig } from '../types.js';

import type { Runtime } from './runtime.js';

export interface ReplContext {
  runtime: Runtime;
  session: AgentSession;
  config: LatheConfig;
  S: Styler;
  print(line: string): void;
  /** Where transcripts live; undefined means the state dir. */
  stateBase?: string;
  requestExit(): void;
}
