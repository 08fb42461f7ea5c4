// Lightweight state machine for a single intercepted call

/**
 * Call state constants - use these instead of string literals
 * to prevent typos and get better editor autocomplete.
 */
export const CallStates = {
  INIT: "init",
  BEFORE: "before",
  PROCEEDING: "proceeding",
  TRANSFORMING: "transforming",
  AFTER: "after",
  EXCEPTION: "exception",
  SUCCEEDED: "succeeded",
  FAILED: "failed",
  CANCELLED: "cancelled",
} as const;

export type CallState = (typeof CallStates)[keyof typeof CallStates];

// Terminal states have no outgoing edges.
const TRANSITIONS: Readonly<Record<CallState, readonly CallState[]>> = {
  init: ["before", "proceeding", "exception"],
  before: ["proceeding", "exception"],
  proceeding: ["transforming", "exception"],
  transforming: ["after", "exception"],
  after: ["succeeded"],
  exception: ["failed", "cancelled"],
  succeeded: [],
  failed: [],
  cancelled: [],
};

/**
 * Tracks the phase a call is in. Unlike a plain state holder it rejects
 * transitions the chain never makes, so a context cannot end up both
 * succeeded and failed.
 */
export class CallStateMachine {
  private state: CallState = CallStates.INIT;
  private history: Array<{
    from: CallState;
    to: CallState;
    timestamp: number;
  }> = [];

  /**
   * Move to `next`. Returns false (and stays put) for an illegal transition.
   */
  transition(next: CallState): boolean {
    if (this.state === next) return true;
    if (!TRANSITIONS[this.state].includes(next)) return false;

    this.history.push({
      from: this.state,
      to: next,
      timestamp: Date.now(),
    });
    this.state = next;
    return true;
  }

  get(): CallState {
    return this.state;
  }

  /**
   * Check if current state matches any of the provided states
   */
  is(...states: CallState[]): boolean {
    return states.includes(this.state);
  }

  isTerminal(): boolean {
    return TRANSITIONS[this.state].length === 0;
  }

  /**
   * Get state history (for debugging)
   */
  getHistory(): ReadonlyArray<{
    from: CallState;
    to: CallState;
    timestamp: number;
  }> {
    return this.history;
  }
}
