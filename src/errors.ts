export type ErrorCategory =
  | 'config'
  | 'concurrency'
  | 'transport'
  | 'protocol'
  | 'parse'
  | 'execution'
  | 'workflow_abort';

export interface ErrorCategoryMeaning {
  retryable: boolean;
  summary: string;
}

export const ERROR_CATEGORY_MEANINGS: Record<ErrorCategory, ErrorCategoryMeaning> = {
  config: {
    retryable: false,
    summary: 'Missing credentials or no host session to act on.',
  },
  concurrency: {
    retryable: false,
    summary: 'A provider request is already in flight.',
  },
  transport: {
    retryable: false,
    summary: 'Connection failure, timeout or cancellation before a response arrived.',
  },
  protocol: {
    retryable: false,
    summary: 'Provider answered with a non-2xx status.',
  },
  parse: {
    retryable: false,
    summary: 'Provider answered successfully but no text could be extracted.',
  },
  execution: {
    retryable: true,
    summary: 'Generated command faulted inside the interpreter or the host.',
  },
  workflow_abort: {
    retryable: false,
    summary: 'Workflow stopped by retry exhaustion, step cap or the operator.',
  },
};

export abstract class CopilotError extends Error {
  abstract readonly category: ErrorCategory;
}

export class ConfigError extends CopilotError {
  readonly category = 'config' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ConcurrencyError extends CopilotError {
  readonly category = 'concurrency' as const;

  constructor(message = 'A request is already in progress') {
    super(message);
    this.name = 'ConcurrencyError';
  }
}

export type TransportErrorKind = 'network' | 'timeout' | 'cancelled';

export class TransportError extends CopilotError {
  readonly category = 'transport' as const;
  readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string) {
    super(message);
    this.name = 'TransportError';
    this.kind = kind;
  }

  static cancelled(): TransportError {
    return new TransportError('cancelled', 'Request cancelled');
  }
}

export class ProtocolError extends CopilotError {
  readonly category = 'protocol' as const;
  readonly status: number;
  readonly providerMessage?: string;

  constructor(status: number, providerMessage?: string) {
    const suffix = providerMessage !== undefined && providerMessage.length > 0 ? `: ${providerMessage}` : '';
    super(`API error (HTTP ${String(status)})${suffix}`);
    this.name = 'ProtocolError';
    this.status = status;
    if (providerMessage !== undefined && providerMessage.length > 0) {
      this.providerMessage = providerMessage;
    }
  }
}

export class ParseError extends CopilotError {
  readonly category = 'parse' as const;

  constructor(message = 'Failed to parse API response') {
    super(message);
    this.name = 'ParseError';
  }
}

export class ExecutionError extends CopilotError {
  readonly category = 'execution' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ExecutionError';
  }
}

export type WorkflowAbortReason = 'retry_exhausted' | 'step_limit' | 'cancelled';

export class WorkflowAbort extends CopilotError {
  readonly category = 'workflow_abort' as const;
  readonly reason: WorkflowAbortReason;

  constructor(reason: WorkflowAbortReason, message: string) {
    super(message);
    this.name = 'WorkflowAbort';
    this.reason = reason;
  }
}

export const isCopilotError = (value: unknown): value is CopilotError =>
  value instanceof CopilotError;

export const isCancellation = (value: unknown): boolean =>
  value instanceof TransportError && value.kind === 'cancelled';
