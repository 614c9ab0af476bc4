import type { ContextBudget, LogSink, Turn } from './types.js';

import { makeLogEntry } from './utils.js';

export const DEFAULT_CONTEXT_BUDGET: ContextBudget = {
  charsPerToken: 4,
  maxInputTokens: 100_000,
  pruneTargetTokens: 80_000,
  minKeepPairs: 2,
};

export interface RequestContext {
  snapshot: string;
  catalog: string;
}

export type EnrichRequest = (context: RequestContext, request: string) => string;

export const defaultEnrichRequest: EnrichRequest = (context, request) =>
  `Current session state:\n${context.snapshot}\n\n${context.catalog}\nUser request: ${request}`;

/**
 * Ordered conversation history with a character-based token budget.
 *
 * Context injected at send time (state snapshot, capability catalog) is counted
 * against the budget but never stored.
 */
export class ConversationStore {
  private history: Turn[] = [];
  private readonly budget: ContextBudget;
  private readonly onLog?: LogSink;

  constructor(budget: ContextBudget = DEFAULT_CONTEXT_BUDGET, onLog?: LogSink) {
    this.budget = budget;
    this.onLog = onLog;
  }

  get size(): number {
    return this.history.length;
  }

  append(turn: Turn): void {
    this.history.push({ role: turn.role, content: turn.content });
  }

  turns(): Turn[] {
    return this.history.map((turn) => ({ ...turn }));
  }

  clear(): void {
    this.history = [];
  }

  estimateText(text: string): number {
    return Math.ceil(text.length / this.budget.charsPerToken);
  }

  /** Token estimate of the stored turns plus every context string that will accompany them. */
  estimateTokens(contextStrings: readonly string[]): number {
    const contextTokens = contextStrings.reduce((acc, text) => acc + this.estimateText(text), 0);
    return this.history.reduce(
      (acc, turn) => acc + this.estimateText(turn.role) + this.estimateText(turn.content),
      contextTokens
    );
  }

  /**
   * Drops the oldest turns once the estimate exceeds the maximum, down to the prune
   * target or the minimum kept pairs. The remaining history always starts with a user turn.
   * Returns how many turns were dropped.
   */
  prune(contextStrings: readonly string[]): number {
    const before = this.history.length;
    const estimate = this.estimateTokens(contextStrings);
    if (estimate > this.budget.maxInputTokens) {
      const minKeep = this.budget.minKeepPairs * 2;
      // eslint-disable-next-line functional/no-loop-statements
      while (this.history.length > minKeep && this.estimateTokens(contextStrings) > this.budget.pruneTargetTokens) {
        this.history.shift();
      }
    }
    // eslint-disable-next-line functional/no-loop-statements
    while (this.history.length > 0 && this.history[0].role !== 'user') {
      this.history.shift();
    }
    const dropped = before - this.history.length;
    if (dropped > 0 && this.onLog !== undefined) {
      this.onLog(makeLogEntry({
        severity: 'VRB',
        type: 'workflow',
        direction: 'request',
        remoteIdentifier: 'conversation',
        message: `pruned ${String(dropped)} turn(s), ~${String(this.estimateTokens(contextStrings))} tokens remain`,
        details: { dropped, estimate_before: estimate },
      }));
    }
    return dropped;
  }

  /**
   * Turns to send: a copy of the history where the last user turn carries the
   * injected context. Stored turns are left untouched.
   */
  buildRequestTurns(context: RequestContext, enrich: EnrichRequest = defaultEnrichRequest): Turn[] {
    const turns = this.turns();
    const lastUser = turns.map((turn) => turn.role).lastIndexOf('user');
    if (lastUser === -1) return turns;
    turns[lastUser] = { role: 'user', content: enrich(context, turns[lastUser].content) };
    return turns;
  }
}
