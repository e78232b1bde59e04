/** Errors that should break the outer agent loop, not be caught by per-tool handlers. */
export class AgentLoopBreak extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AgentLoopBreak';
  }
}

export class TurnBudgetExceeded extends AgentLoopBreak {
  constructor(
    public readonly maxRounds: number,
    public readonly rounds: number
  ) {
    super(`turn budget exceeded: ${rounds} tool rounds used, max_rounds is ${maxRounds}`);
    this.name = 'TurnBudgetExceeded';
  }
}

/** An append or load would break the message-sequence invariants. */
export class ConversationError extends AgentLoopBreak {
  constructor(message: string) {
    super(message);
    this.name = 'ConversationError';
  }
}

/** `ask` while a turn is running or input is pending, or a stale resume token. */
export class SessionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionStateError';
  }
}
