import type { CopilotError } from './errors.js';

// Conversation primitives
export type TurnRole = 'user' | 'assistant';

export interface Turn {
  role: TurnRole;
  content: string;
}

// Structured logging interface
export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: 'VRB' | 'WRN' | 'ERR' | 'TRC' | 'FIN'; // FIN for end-of-workflow summary
  step: number;                         // Workflow step (0 outside a workflow)
  retry: number;                        // Retry ordinal within the step
  direction: 'request' | 'response';
  type: 'llm' | 'command' | 'ledger' | 'workflow';
  remoteIdentifier: string;             // 'provider:model', 'executor', 'ledger', 'session'
  fatal: boolean;                       // True if this ended the workflow
  message: string;
  details?: Record<string, string | number | boolean>;
  stack?: string;
}

export type LogSink = (entry: LogEntry) => void;

// Transport callbacks; every one of them runs on the owning run loop
export interface RequestCallbacks {
  onComplete: (text: string) => void;
  onError: (error: CopilotError) => void;
  onStreamDelta?: (text: string) => void;
}

export interface PendingRequest extends RequestCallbacks {
  systemPrompt: string;
  turns: Turn[];
}

export interface ProviderSettings {
  baseUrl: string;
  model: string;
  maxTokens: number;
  anthropicVersion: string;
  stream: boolean;
}

export interface TransportTimeouts {
  connectMs: number;
  requestMs: number;
  lowSpeedWindowMs: number;
  lowSpeedBytes: number;
}

export interface ContextBudget {
  charsPerToken: number;
  maxInputTokens: number;
  pruneTargetTokens: number;
  minKeepPairs: number;
}

export interface WorkflowLimits {
  maxSteps: number;
  retryLimit: number;
}

export type LogFormatName = 'logfmt' | 'json' | 'console';

export interface Configuration {
  provider: ProviderSettings & { apiKey?: string };
  timeouts: TransportTimeouts;
  workflow: WorkflowLimits;
  context: ContextBudget;
  executor: { timeoutMs: number };
  logging: { format?: LogFormatName; verbose: boolean };
}

export type WorkflowPhase = 'idle' | 'thinking' | 'executing' | 'cancelled' | 'aborted';

export type WorkflowOutcome = 'completed' | 'step_limit' | 'aborted' | 'cancelled';

export interface WorkflowState {
  step: number;
  maxSteps: number;
  retryCount: number;
  retryLimit: number;
  cancelled: boolean;
  active: boolean;
}

export interface ExecutionResult {
  success: boolean;
  error?: string;
  output: string[];
}
