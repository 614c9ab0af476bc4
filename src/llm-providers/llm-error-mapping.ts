import { ProtocolError, TransportError, type CopilotError } from '../errors.js';

export type LlmErrorKind =
  | 'rate_limit'
  | 'auth_error'
  | 'quota_exceeded'
  | 'model_error'
  | 'timeout'
  | 'network_error'
  | 'cancelled';

export const LLM_ERROR_KIND_MEANINGS: Record<LlmErrorKind, { summary: string; hint?: string }> = {
  rate_limit: {
    summary: 'Too many requests; the provider asked us to slow down.',
    hint: 'Rate limited. Please wait a moment and try again.',
  },
  auth_error: {
    summary: 'Authentication or authorization failure; do not retry.',
    hint: 'Your API key may be invalid. Please check your configuration.',
  },
  quota_exceeded: {
    summary: 'Quota/billing limit reached; do not retry.',
    hint: 'Your account has reached its usage limit.',
  },
  model_error: { summary: 'Request rejected by provider/model.' },
  timeout: { summary: 'Request timed out before the provider answered.' },
  network_error: { summary: 'Network/transport failure, or the provider is unavailable.' },
  cancelled: {
    summary: 'Request was cancelled by the operator.',
    hint: 'Request was cancelled.',
  },
};

const MESSAGE_KIND_PATTERNS: Record<Exclude<LlmErrorKind, 'cancelled'>, string[]> = {
  rate_limit: [
    'rate limit',
    'ratelimit',
    'rate_limit',
    'too many requests',
    'overload',
  ],
  auth_error: [
    'authentication',
    'unauthorized',
    'invalid api key',
    'invalid x-api-key',
    'access denied',
    'forbidden',
  ],
  quota_exceeded: [
    'quota',
    'billing',
    'credit balance',
    'payment required',
  ],
  model_error: [
    'model not found',
    'unknown model',
    'invalid model',
    'not_found_error',
    'invalid_request_error',
  ],
  timeout: [
    'timeout',
    'timed out',
    'etimedout',
  ],
  network_error: [
    'network',
    'connection',
    'socket hang up',
    'econnrefused',
    'econnreset',
    'enotfound',
    'eai_again',
  ],
};

const STATUS_KIND_MAP = new Map<number, LlmErrorKind>([
  [429, 'rate_limit'],
  [529, 'rate_limit'],
  [401, 'auth_error'],
  [403, 'auth_error'],
  [402, 'quota_exceeded'],
  [400, 'model_error'],
  [404, 'model_error'],
  [408, 'timeout'],
]);

const normalize = (value: string | undefined): string | undefined =>
  typeof value === 'string' ? value.trim().toLowerCase() : undefined;

const MESSAGE_KIND_ORDER: Exclude<LlmErrorKind, 'cancelled'>[] = [
  'rate_limit',
  'auth_error',
  'quota_exceeded',
  'model_error',
  'timeout',
  'network_error',
];

export const classifyLlmErrorKindFromMessage = (message: string | undefined): LlmErrorKind | undefined => {
  const normalized = normalize(message);
  if (normalized === undefined || normalized.length === 0) return undefined;
  return MESSAGE_KIND_ORDER.find((kind) =>
    MESSAGE_KIND_PATTERNS[kind].some((pattern) => normalized.includes(pattern)));
};

/**
 * Maps a transport or protocol failure to a kind. Status codes win over message
 * text; server-side 5xx without a better match count as network errors.
 */
export const classifyLlmError = (error: CopilotError): LlmErrorKind | undefined => {
  if (error instanceof TransportError) {
    if (error.kind === 'cancelled') return 'cancelled';
    if (error.kind === 'timeout') return 'timeout';
    return classifyLlmErrorKindFromMessage(error.message) ?? 'network_error';
  }
  if (error instanceof ProtocolError) {
    const statusKind = STATUS_KIND_MAP.get(error.status);
    if (statusKind !== undefined) return statusKind;
    const messageKind = classifyLlmErrorKindFromMessage(error.message);
    if (messageKind !== undefined) return messageKind;
    if (error.status >= 500) return 'network_error';
    return undefined;
  }
  return undefined;
};

export const operatorHintFor = (error: CopilotError): string | undefined => {
  const kind = classifyLlmError(error);
  return kind !== undefined ? LLM_ERROR_KIND_MEANINGS[kind].hint : undefined;
};
