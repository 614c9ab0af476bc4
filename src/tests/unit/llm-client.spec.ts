import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import type { CopilotError } from '../../errors.js';
import type { LogEntry, ProviderSettings, TransportTimeouts } from '../../types.js';

import { ConcurrencyError, ConfigError, ParseError, ProtocolError, TransportError } from '../../errors.js';
import { LLMClient } from '../../llm-client.js';
import { ManualRunLoop } from '../../run-loop.js';

const ORIGIN = 'https://api.test';

const PROVIDER: ProviderSettings = {
  baseUrl: ORIGIN,
  model: 'test-model',
  maxTokens: 256,
  anthropicVersion: '2023-06-01',
  stream: false,
};

const TIMEOUTS: TransportTimeouts = {
  connectMs: 1_000,
  requestMs: 5_000,
  lowSpeedWindowMs: 5_000,
  lowSpeedBytes: 1,
};

const TURNS = [{ role: 'user' as const, content: 'Mute the drums' }];

const SSE_BODY = [
  'event: message_start',
  'data: {"type":"message_start","message":{"id":"msg_1"}}',
  '',
  'data: {"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"Hel"}}',
  '',
  'data: {"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"lo"}}',
  '',
  'data: {"type":"message_stop"}',
  '',
].join('\n');

interface Recorder {
  onComplete: Mock<(text: string) => void>;
  onError: Mock<(error: CopilotError) => void>;
  onStreamDelta: Mock<(text: string) => void>;
}

const recorder = (): Recorder => ({
  onComplete: vi.fn<(text: string) => void>(),
  onError: vi.fn<(error: CopilotError) => void>(),
  onStreamDelta: vi.fn<(text: string) => void>(),
});

const firstError = (rec: Recorder): CopilotError | undefined => rec.onError.mock.calls[0]?.[0];

describe('LLMClient', () => {
  let agent: MockAgent;
  let loop: ManualRunLoop;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    loop = new ManualRunLoop();
  });

  afterEach(async () => {
    await agent.close();
  });

  const makeClient = (
    overrides: Partial<ProviderSettings> = {},
    extra: { apiKey?: string; onLog?: (entry: LogEntry) => void; traceLLM?: boolean; timeouts?: Partial<TransportTimeouts> } = {}
  ): LLMClient =>
    new LLMClient({
      provider: { ...PROVIDER, ...overrides },
      timeouts: { ...TIMEOUTS, ...extra.timeouts },
      apiKey: 'apiKey' in extra ? extra.apiKey : 'test-secret',
      dispatcher: agent,
      runLoop: loop,
      onLog: extra.onLog,
      traceLLM: extra.traceLLM,
    });

  it('sends the request with credentials and delivers the reply on the run loop', async () => {
    agent.get(ORIGIN)
      .intercept({
        path: '/v1/messages',
        method: 'POST',
        headers: { 'x-api-key': 'test-secret', 'anthropic-version': '2023-06-01' },
        body: (body) => body === '{"model":"test-model","max_tokens":256,"system":"sys","messages":[{"role":"user","content":"Mute the drums"}]}',
      })
      .reply(200, '{"content":[{"type":"text","text":"Hello"}]}');
    const client = makeClient();
    const rec = recorder();

    expect(client.send('sys', TURNS, { onComplete: rec.onComplete, onError: rec.onError })).toBe(true);
    expect(client.busy).toBe(true);
    await client.idle();

    expect(client.busy).toBe(false);
    expect(rec.onComplete).not.toHaveBeenCalled();
    expect(loop.pendingCount).toBe(1);

    loop.flush();
    expect(rec.onComplete).toHaveBeenCalledTimes(1);
    expect(rec.onComplete).toHaveBeenCalledWith('Hello');
    expect(rec.onError).not.toHaveBeenCalled();
  });

  it('maps a non-2xx answer to a protocol error with the provider message', async () => {
    agent.get(ORIGIN)
      .intercept({ path: '/v1/messages', method: 'POST' })
      .reply(401, '{"type":"error","error":{"type":"authentication_error","message":"invalid x-api-key"}}');
    const client = makeClient();
    const rec = recorder();

    client.send('sys', TURNS, rec);
    await client.idle();
    loop.flush();

    const error = firstError(rec);
    expect(error).toBeInstanceOf(ProtocolError);
    expect(error?.message).toBe('API error (HTTP 401): invalid x-api-key');
    expect(error instanceof ProtocolError ? error.status : undefined).toBe(401);
    expect(rec.onComplete).not.toHaveBeenCalled();
  });

  it('reports a parse error when a successful answer carries no text', async () => {
    agent.get(ORIGIN).intercept({ path: '/v1/messages', method: 'POST' }).reply(200, '{"content":[]}');
    const client = makeClient();
    const rec = recorder();

    client.send('sys', TURNS, { onComplete: rec.onComplete, onError: rec.onError });
    await client.idle();
    loop.flush();

    expect(firstError(rec)).toBeInstanceOf(ParseError);
    expect(firstError(rec)?.message).toBe('Failed to parse API response');
  });

  it('maps a connection failure to a network transport error', async () => {
    agent.get(ORIGIN)
      .intercept({ path: '/v1/messages', method: 'POST' })
      .replyWithError(new Error('socket hang up'));
    const client = makeClient();
    const rec = recorder();

    client.send('sys', TURNS, rec);
    await client.idle();
    loop.flush();

    const error = firstError(rec);
    expect(error).toBeInstanceOf(TransportError);
    expect(error instanceof TransportError ? error.kind : undefined).toBe('network');
    expect(error?.message).toBe('Network error: socket hang up');
  });

  it('streams deltas when streaming is configured and a delta callback is given', async () => {
    agent.get(ORIGIN)
      .intercept({ path: '/v1/messages', method: 'POST', body: (body) => body.includes('"max_tokens":256,"stream":true,') })
      .reply(200, SSE_BODY, { headers: { 'content-type': 'text/event-stream' } });
    const client = makeClient({ stream: true });
    const rec = recorder();

    client.send('sys', TURNS, rec);
    expect(loop.periodicCount).toBe(0);
    await client.idle();
    expect(loop.periodicCount).toBe(0);
    loop.flush();

    expect(rec.onStreamDelta.mock.calls.map((call) => call[0]).join('')).toBe('Hello');
    expect(rec.onComplete).toHaveBeenCalledWith('Hello');
    expect(rec.onError).not.toHaveBeenCalled();
  });

  it('falls back to a plain request when no delta callback is given', async () => {
    agent.get(ORIGIN)
      .intercept({ path: '/v1/messages', method: 'POST', body: (body) => !body.includes('"stream"') })
      .reply(200, '{"content":[{"type":"text","text":"plain"}]}');
    const client = makeClient({ stream: true });
    const rec = recorder();

    client.send('sys', TURNS, { onComplete: rec.onComplete, onError: rec.onError });
    await client.idle();
    loop.flush();

    expect(rec.onComplete).toHaveBeenCalledWith('plain');
  });

  it('turns an error event inside the stream into a protocol error', async () => {
    const body = [
      'data: {"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"par"}}',
      '',
      'event: error',
      'data: {"type":"error","error":{"type":"overloaded_error","message":"Overloaded"}}',
      '',
    ].join('\n');
    agent.get(ORIGIN).intercept({ path: '/v1/messages', method: 'POST' }).reply(200, body);
    const client = makeClient({ stream: true });
    const rec = recorder();

    client.send('sys', TURNS, rec);
    await client.idle();
    loop.flush();

    expect(firstError(rec)?.message).toBe('API error (HTTP 200): Overloaded');
    expect(rec.onComplete).not.toHaveBeenCalled();
  });

  it('rejects a second request while one is in flight', async () => {
    agent.get(ORIGIN)
      .intercept({ path: '/v1/messages', method: 'POST' })
      .reply(200, '{"content":[{"type":"text","text":"first"}]}');
    const client = makeClient();
    const first = recorder();
    const second = recorder();

    expect(client.send('sys', TURNS, first)).toBe(true);
    expect(client.send('sys', TURNS, second)).toBe(false);
    await client.idle();
    loop.flush();

    expect(first.onComplete).toHaveBeenCalledWith('first');
    expect(firstError(second)).toBeInstanceOf(ConcurrencyError);
    expect(second.onComplete).not.toHaveBeenCalled();
  });

  it('refuses to send without an API key', () => {
    const client = makeClient({}, { apiKey: undefined });
    const rec = recorder();

    expect(client.hasCredentials()).toBe(false);
    expect(client.send('sys', TURNS, rec)).toBe(false);
    expect(client.busy).toBe(false);
    loop.flush();

    expect(firstError(rec)).toBeInstanceOf(ConfigError);
    expect(firstError(rec)?.message).toBe('No API key configured. Set ANTHROPIC_API_KEY or add a key file.');
  });

  it('reads the key lazily from a provider function', () => {
    let key: string | undefined;
    const client = new LLMClient({ provider: PROVIDER, timeouts: TIMEOUTS, apiKey: () => key, dispatcher: agent, runLoop: loop });
    expect(client.hasCredentials()).toBe(false);
    key = 'test-secret';
    expect(client.hasCredentials()).toBe(true);
  });

  it('delivers exactly one cancellation when cancelled before the request starts', async () => {
    const client = makeClient();
    const rec = recorder();

    client.send('sys', TURNS, rec);
    client.cancel();
    await client.idle();
    loop.flush();

    expect(rec.onError).toHaveBeenCalledTimes(1);
    const error = firstError(rec);
    expect(error instanceof TransportError ? error.kind : undefined).toBe('cancelled');
    expect(rec.onComplete).not.toHaveBeenCalled();
    expect(client.busy).toBe(false);
  });

  it('reports a cancellation when cancelled after completion but before delivery', async () => {
    agent.get(ORIGIN)
      .intercept({ path: '/v1/messages', method: 'POST' })
      .reply(200, '{"content":[{"type":"text","text":"late"}]}');
    const client = makeClient();
    const rec = recorder();

    client.send('sys', TURNS, rec);
    await client.idle();
    client.cancel();
    loop.flush();

    expect(rec.onComplete).not.toHaveBeenCalled();
    expect(rec.onError).toHaveBeenCalledTimes(1);
    expect(firstError(rec)?.message).toBe('Request cancelled');
  });

  it('delivers exactly one cancellation when cancelled while the stream is in flight', async () => {
    agent.get(ORIGIN)
      .intercept({ path: '/v1/messages', method: 'POST' })
      .reply(200, SSE_BODY, { headers: { 'content-type': 'text/event-stream' } })
      .delay(200);
    const entries: LogEntry[] = [];
    const client = makeClient({ stream: true }, { onLog: (entry) => { entries.push(entry); } });
    const rec = recorder();

    client.send('sys', TURNS, rec);
    await vi.waitFor(() => {
      expect(entries.some((entry) => entry.message.startsWith('POST '))).toBe(true);
    });
    client.cancel();
    client.cancel();
    await client.idle();
    loop.flush();
    loop.flush();

    expect(rec.onError).toHaveBeenCalledTimes(1);
    const error = firstError(rec);
    expect(error instanceof TransportError ? error.kind : undefined).toBe('cancelled');
    expect(rec.onComplete).not.toHaveBeenCalled();
    expect(rec.onStreamDelta).not.toHaveBeenCalled();
    expect(client.busy).toBe(false);
  });

  it('times out a plain request that takes longer than the request limit', async () => {
    agent.get(ORIGIN)
      .intercept({ path: '/v1/messages', method: 'POST' })
      .reply(200, '{"content":[{"type":"text","text":"too late"}]}')
      .delay(300);
    const client = makeClient({}, { timeouts: { requestMs: 30 } });
    const rec = recorder();

    client.send('sys', TURNS, rec);
    await client.idle();
    loop.flush();

    const error = firstError(rec);
    expect(error instanceof TransportError ? error.kind : undefined).toBe('timeout');
    expect(error?.message).toMatch(/^Request timed out: /);
    expect(rec.onComplete).not.toHaveBeenCalled();
  });

  it('aborts a stream that receives nothing within the low-speed window', async () => {
    agent.get(ORIGIN)
      .intercept({ path: '/v1/messages', method: 'POST' })
      .reply(200, SSE_BODY, { headers: { 'content-type': 'text/event-stream' } })
      .delay(300);
    const client = makeClient({ stream: true }, { timeouts: { requestMs: 5_000, lowSpeedWindowMs: 30, lowSpeedBytes: 1 } });
    const rec = recorder();

    client.send('sys', TURNS, rec);
    await client.idle();
    loop.flush();

    expect(rec.onError).toHaveBeenCalledTimes(1);
    const error = firstError(rec);
    expect(error instanceof TransportError ? error.kind : undefined).toBe('timeout');
    expect(rec.onComplete).not.toHaveBeenCalled();
  });

  it('ignores cancel once the result has been delivered', async () => {
    agent.get(ORIGIN)
      .intercept({ path: '/v1/messages', method: 'POST' })
      .reply(200, '{"content":[{"type":"text","text":"done"}]}');
    const client = makeClient();
    const rec = recorder();

    client.send('sys', TURNS, rec);
    await client.idle();
    loop.flush();
    client.cancel();
    loop.flush();

    expect(rec.onComplete).toHaveBeenCalledTimes(1);
    expect(rec.onError).not.toHaveBeenCalled();
  });

  it('traces request headers with the key redacted', async () => {
    agent.get(ORIGIN)
      .intercept({ path: '/v1/messages', method: 'POST' })
      .reply(200, '{"content":[{"type":"text","text":"ok"}]}');
    const entries: LogEntry[] = [];
    const client = makeClient({}, { apiKey: 'test-secret', traceLLM: true, onLog: (entry) => { entries.push(entry); } });

    client.send('sys', TURNS, recorder());
    await client.idle();

    const trace = entries.find((entry) => entry.severity === 'TRC' && entry.direction === 'request');
    expect(trace?.message.split('\n')[0]).toBe(
      'headers: {"x-api-key":"[REDACTED]","anthropic-version":"2023-06-01","content-type":"application/json"}'
    );
    expect(trace?.remoteIdentifier).toBe('anthropic:test-model');
  });
});
