import { describe, expect, it } from 'vitest';

import { ParseError, ProtocolError, TransportError } from '../../errors.js';
import { classifyLlmError, classifyLlmErrorKindFromMessage, operatorHintFor } from '../../llm-providers/llm-error-mapping.js';

describe('classifyLlmError', () => {
  it('classifies by status code first', () => {
    expect(classifyLlmError(new ProtocolError(401, 'rate limit'))).toBe('auth_error');
    expect(classifyLlmError(new ProtocolError(429))).toBe('rate_limit');
    expect(classifyLlmError(new ProtocolError(529))).toBe('rate_limit');
    expect(classifyLlmError(new ProtocolError(402))).toBe('quota_exceeded');
    expect(classifyLlmError(new ProtocolError(404))).toBe('model_error');
  });

  it('falls back to the message, then to network errors for 5xx', () => {
    expect(classifyLlmError(new ProtocolError(503, 'Overloaded'))).toBe('rate_limit');
    expect(classifyLlmError(new ProtocolError(500))).toBe('network_error');
    expect(classifyLlmError(new ProtocolError(418))).toBeUndefined();
  });

  it('classifies transport failures', () => {
    expect(classifyLlmError(TransportError.cancelled())).toBe('cancelled');
    expect(classifyLlmError(new TransportError('timeout', 'Request timed out: slow'))).toBe('timeout');
    expect(classifyLlmError(new TransportError('network', 'Network error: connect ECONNREFUSED'))).toBe('network_error');
  });

  it('leaves other errors unclassified', () => {
    expect(classifyLlmError(new ParseError())).toBeUndefined();
  });
});

describe('classifyLlmErrorKindFromMessage', () => {
  it('matches case-insensitively', () => {
    expect(classifyLlmErrorKindFromMessage('Your credit balance is too low')).toBe('quota_exceeded');
    expect(classifyLlmErrorKindFromMessage('')).toBeUndefined();
    expect(classifyLlmErrorKindFromMessage(undefined)).toBeUndefined();
  });
});

describe('operatorHintFor', () => {
  it('gives hints for auth, rate limits, quota and cancellation only', () => {
    expect(operatorHintFor(new ProtocolError(401))).toBe('Your API key may be invalid. Please check your configuration.');
    expect(operatorHintFor(new ProtocolError(429))).toBe('Rate limited. Please wait a moment and try again.');
    expect(operatorHintFor(new ProtocolError(402))).toBe('Your account has reached its usage limit.');
    expect(operatorHintFor(TransportError.cancelled())).toBe('Request was cancelled.');
    expect(operatorHintFor(new ProtocolError(500))).toBeUndefined();
  });
});
