import type { RequestContext } from './conversation-store.js';
import type { SessionHost } from './host/types.js';
import type {
  ContextBudget,
  ExecutionResult,
  LogEntry,
  LogSink,
  RequestCallbacks,
  Turn,
  WorkflowLimits,
  WorkflowOutcome,
  WorkflowPhase,
  WorkflowState,
} from './types.js';

import { CommandExecutor } from './command-executor.js';
import { ConversationStore, DEFAULT_CONTEXT_BUDGET } from './conversation-store.js';
import { ConcurrencyError, ConfigError, WorkflowAbort, type CopilotError } from './errors.js';
import { operatorHintFor } from './llm-providers/llm-error-mapping.js';
import { buildContinuationTurn, buildRetryTurn, buildSystemPrompt, enrichRequest } from './prompts/loader.js';
import { parseAgentReply } from './response-parser.js';
import { UndoLedger } from './undo-ledger.js';
import { errorMessage, makeLogEntry, previewText } from './utils.js';

/** The part of the transport the session depends on; `LLMClient` implements it. */
export interface CopilotTransport {
  readonly busy: boolean;
  send: (systemPrompt: string, turns: readonly Turn[], callbacks: RequestCallbacks) => boolean;
  cancel: () => void;
  hasCredentials: () => boolean;
}

export type NoticeKind = 'system' | 'error' | 'hint' | 'command' | 'output';

export interface CopilotSessionEvents {
  onAgentText?: (text: string) => void;
  onStreamDelta?: (text: string) => void;
  onNotice?: (text: string, kind: NoticeKind) => void;
  onStatus?: (phase: WorkflowPhase, detail: string) => void;
  onFinish?: (outcome: WorkflowOutcome, reason: string, error?: CopilotError) => void;
}

export interface CopilotSessionOptions {
  transport: CopilotTransport;
  host?: SessionHost;
  executor?: CommandExecutor;
  workflow?: Partial<WorkflowLimits>;
  context?: ContextBudget;
  streaming?: boolean;
  systemPrompt?: string;
  events?: CopilotSessionEvents;
  onLog?: LogSink;
}

export type StartResult = { ok: true } | { ok: false; error: CopilotError };

export type SubmitResult = { action: 'undo'; ok: boolean } | ({ action: 'start' } & StartResult);

export const DEFAULT_WORKFLOW_LIMITS: WorkflowLimits = { maxSteps: 10, retryLimit: 1 };

const UNDO_PHRASES = new Set([
  'undo',
  'undo that',
  'undo this',
  'revert',
  'revert that',
  'take that back',
  'undo last',
  'undo last action',
]);

export const isUndoPhrase = (text: string): boolean => UNDO_PHRASES.has(text.trim().toLowerCase());

export const FINISH_REASONS = {
  completed: 'All steps completed.',
  answered: 'Done.',
  executionFailed: 'Workflow aborted due to execution error.',
  requestFailed: 'Workflow aborted due to error.',
  cancelled: 'Cancelled by user.',
} as const;

const PHASE_BY_OUTCOME: Record<WorkflowOutcome, WorkflowPhase> = {
  completed: 'idle',
  step_limit: 'idle',
  aborted: 'aborted',
  cancelled: 'cancelled',
};

/**
 * Drives one conversation against one host: sends the request, interprets each
 * reply, executes its command, and decides whether to continue, retry or stop.
 *
 * All entry points run on the owning run loop; transport callbacks arrive there too.
 */
export class CopilotSession {
  private readonly transport: CopilotTransport;
  private readonly executor: CommandExecutor;
  private readonly store: ConversationStore;
  private readonly undoLedger: UndoLedger;
  private readonly limits: WorkflowLimits;
  private readonly streaming: boolean;
  private readonly systemPrompt: string;
  private readonly events: CopilotSessionEvents;
  private readonly onLog?: LogSink;
  private host?: SessionHost;
  private detachHistory?: () => void;
  private currentPhase: WorkflowPhase = 'idle';
  private workflow: WorkflowState;
  private requestToken = 0;
  private streamedThisTurn = false;

  constructor(options: CopilotSessionOptions) {
    this.transport = options.transport;
    this.onLog = options.onLog;
    this.executor = options.executor ?? new CommandExecutor({ onLog: options.onLog });
    this.store = new ConversationStore(options.context ?? DEFAULT_CONTEXT_BUDGET, options.onLog);
    this.undoLedger = new UndoLedger(options.onLog);
    this.limits = { ...DEFAULT_WORKFLOW_LIMITS, ...options.workflow };
    this.streaming = options.streaming ?? true;
    this.systemPrompt = options.systemPrompt ?? buildSystemPrompt({ maxSteps: this.limits.maxSteps });
    this.events = options.events ?? {};
    this.workflow = this.idleWorkflow();
    if (options.host !== undefined) this.attachHost(options.host);
  }

  get phase(): WorkflowPhase {
    return this.currentPhase;
  }

  get state(): WorkflowState {
    return { ...this.workflow };
  }

  get busy(): boolean {
    return this.workflow.active;
  }

  get canUndo(): boolean {
    return this.undoLedger.valid;
  }

  get ledger(): UndoLedger {
    return this.undoLedger;
  }

  conversation(): Turn[] {
    return this.store.turns();
  }

  attachHost(host: SessionHost): void {
    if (this.host === host) return;
    this.detachHost();
    this.host = host;
    this.detachHistory = host.history.onChanged((depth) => {
      this.undoLedger.reconcile(depth);
    });
    this.log('VRB', `attached to session '${host.name}'`);
  }

  /** Drops the host along with everything that refers to it. */
  detachHost(): void {
    if (this.host === undefined) return;
    if (this.workflow.active) this.cancel();
    this.detachHistory?.();
    this.detachHistory = undefined;
    this.store.clear();
    this.undoLedger.clear();
    this.log('VRB', `detached from session '${this.host.name}'`);
    this.host = undefined;
  }

  /** Operator input: undo phrases revert the last workflow, anything else starts one. */
  submit(text: string): SubmitResult {
    if (isUndoPhrase(text)) {
      return { action: 'undo', ok: this.undo() };
    }
    return { action: 'start', ...this.start(text) };
  }

  start(userText: string): StartResult {
    const request = userText.trim();
    if (this.workflow.active || this.transport.busy) {
      return this.reject(new ConcurrencyError());
    }
    const host = this.host;
    if (host === undefined) {
      return this.reject(new ConfigError('No session loaded'));
    }
    if (request.length === 0) {
      return this.reject(new ConfigError('Nothing to send'));
    }
    if (!this.transport.hasCredentials()) {
      return this.reject(new ConfigError('No API key configured. Set ANTHROPIC_API_KEY or add a key file.'));
    }

    this.undoLedger.snapshot(host, request);
    this.store.append({ role: 'user', content: request });
    this.store.prune(this.contextStrings(host));
    this.workflow = {
      step: 1,
      maxSteps: this.limits.maxSteps,
      retryCount: 0,
      retryLimit: this.limits.retryLimit,
      cancelled: false,
      active: true,
    };
    this.log('VRB', `workflow started: ${previewText(request)}`, { event: 'start' });
    this.think();
    return { ok: true };
  }

  onResponse(text: string): void {
    if (this.workflow.cancelled || !this.workflow.active) {
      this.log('VRB', 'discarding response for an inactive workflow');
      return;
    }
    this.store.append({ role: 'assistant', content: text });
    const reply = parseAgentReply(text);
    if (!this.streamedThisTurn && reply.explanation.length > 0) {
      this.events.onAgentText?.(reply.explanation);
    }

    if (reply.command.length === 0) {
      if (!this.streamedThisTurn && reply.explanation.length === 0) {
        this.events.onAgentText?.(text);
      }
      this.finish('completed', FINISH_REASONS.answered);
      return;
    }

    this.setPhase('executing', `Step ${String(this.workflow.step)}: Executing...`);
    this.notice(`Step ${String(this.workflow.step)}: Executing command:`, 'system');
    this.notice(reply.command, 'command');
    const result = this.executor.execute(this.host, reply.command, (line) => {
      this.notice(`> ${line}`, 'output');
    });

    if (result.success) {
      this.afterSuccess(reply.complete, result);
      return;
    }
    this.afterFailure(result.error ?? 'Unknown error during command execution');
  }

  onError(error: CopilotError): void {
    if (this.workflow.cancelled || !this.workflow.active) {
      this.log('VRB', `discarding error for an inactive workflow: ${error.message}`);
      return;
    }
    this.notice(`Error: ${error.message}`, 'error');
    const hint = operatorHintFor(error);
    if (hint !== undefined) this.notice(hint, 'hint');
    this.finish('aborted', FINISH_REASONS.requestFailed, error);
  }

  cancel(): boolean {
    if (!this.workflow.active) return false;
    this.workflow.cancelled = true;
    this.transport.cancel();
    this.finish('cancelled', FINISH_REASONS.cancelled, new WorkflowAbort('cancelled', FINISH_REASONS.cancelled));
    return true;
  }

  /** Reverts the host to the snapshot taken before the last workflow. */
  undo(): boolean {
    if (this.workflow.active) {
      this.notice('Cannot undo while a workflow is running.', 'system');
      return false;
    }
    if (!this.undoLedger.valid) {
      this.notice('Nothing to undo.', 'system');
      return false;
    }
    const description = this.undoLedger.description;
    let restored = false;
    try {
      restored = this.undoLedger.restore(this.host);
    } catch (error) {
      this.log('ERR', `undo failed: ${errorMessage(error)}`, { event: 'undo' });
    }
    if (!restored) {
      this.notice('Undo failed.', 'error');
      return false;
    }
    this.notice(description.length > 0 ? `Undone: ${description}` : 'Undone.', 'system');
    this.log('VRB', 'last workflow undone', { event: 'undo' });
    return true;
  }

  private afterSuccess(complete: boolean, result: ExecutionResult): void {
    const host = this.host;
    if (host !== undefined) this.undoLedger.afterSuccessfulExecution(host);
    if (complete) {
      this.finish('completed', FINISH_REASONS.completed);
      return;
    }
    if (this.workflow.step >= this.workflow.maxSteps) {
      const reason = `Step limit (${String(this.workflow.maxSteps)}) reached. Partial work retained.`;
      this.finish('step_limit', reason, new WorkflowAbort('step_limit', reason));
      return;
    }
    this.workflow.step += 1;
    this.workflow.retryCount = 0;
    this.store.append({ role: 'user', content: buildContinuationTurn(result.output) });
    if (host !== undefined) this.store.prune(this.contextStrings(host));
    this.think();
  }

  private afterFailure(error: string): void {
    this.notice(`Execution error: ${error}`, 'error');
    if (this.workflow.retryCount < this.workflow.retryLimit) {
      this.workflow.retryCount += 1;
      this.store.append({ role: 'user', content: buildRetryTurn(error) });
      const host = this.host;
      if (host !== undefined) this.store.prune(this.contextStrings(host));
      this.think('Retrying...');
      return;
    }
    try {
      if (this.undoLedger.rollbackAfterFailure(this.host)) {
        this.notice('Changes from this workflow were rolled back.', 'system');
      }
    } catch (error) {
      this.log('ERR', `rollback failed: ${errorMessage(error)}`, { event: 'rollback' });
      this.notice('Rollback failed; the session may hold partial changes.', 'error');
    }
    this.finish(
      'aborted',
      FINISH_REASONS.executionFailed,
      new WorkflowAbort('retry_exhausted', FINISH_REASONS.executionFailed)
    );
  }

  private think(detail?: string): void {
    const host = this.host;
    if (host === undefined) {
      this.onError(new ConfigError('No session loaded'));
      return;
    }
    this.setPhase('thinking', detail ?? `Step ${String(this.workflow.step)}: Thinking...`);
    const context: RequestContext = { snapshot: host.describeState(), catalog: host.capabilityCatalog() };
    const turns = this.store.buildRequestTurns(context, enrichRequest);
    this.requestToken += 1;
    const token = this.requestToken;
    this.streamedThisTurn = false;
    const current = (): boolean => token === this.requestToken;
    const streamDelta = this.streaming
      ? (delta: string): void => {
          if (!current() || this.workflow.cancelled) return;
          this.streamedThisTurn = true;
          this.events.onStreamDelta?.(delta);
        }
      : undefined;
    this.transport.send(this.systemPrompt, turns, {
      onComplete: (text) => {
        if (current()) this.onResponse(text);
      },
      onError: (error) => {
        if (current()) this.onError(error);
      },
      ...(streamDelta !== undefined ? { onStreamDelta: streamDelta } : {}),
    });
  }

  private finish(outcome: WorkflowOutcome, reason: string, error?: CopilotError): void {
    const step = this.workflow.step;
    this.workflow = this.idleWorkflow();
    this.requestToken += 1;
    this.setPhase(PHASE_BY_OUTCOME[outcome], reason);
    this.onLog?.(makeLogEntry({
      severity: 'FIN',
      type: 'workflow',
      direction: 'response',
      remoteIdentifier: 'session',
      step,
      fatal: outcome === 'aborted',
      message: `${outcome}: ${reason}`,
      details: { event: 'finish', outcome },
    }));
    this.events.onFinish?.(outcome, reason, error);
  }

  private reject(error: CopilotError): StartResult {
    this.notice(error.message, 'error');
    this.log('WRN', `request rejected: ${error.message}`);
    return { ok: false, error };
  }

  private contextStrings(host: SessionHost): string[] {
    return [this.systemPrompt, host.describeState(), host.capabilityCatalog()];
  }

  private idleWorkflow(): WorkflowState {
    return {
      step: 0,
      maxSteps: this.limits.maxSteps,
      retryCount: 0,
      retryLimit: this.limits.retryLimit,
      cancelled: false,
      active: false,
    };
  }

  private setPhase(phase: WorkflowPhase, detail: string): void {
    this.currentPhase = phase;
    this.events.onStatus?.(phase, detail);
  }

  private notice(text: string, kind: NoticeKind): void {
    this.events.onNotice?.(text, kind);
  }

  private log(severity: LogEntry['severity'], message: string, details?: LogEntry['details']): void {
    if (this.onLog === undefined) return;
    this.onLog(makeLogEntry({
      severity,
      type: 'workflow',
      direction: 'request',
      remoteIdentifier: 'session',
      step: this.workflow.step,
      retry: this.workflow.retryCount,
      message,
      details,
    }));
  }
}
