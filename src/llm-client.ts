import type { CopilotError } from './errors.js';
import type { RunLoop } from './run-loop.js';
import type { LogEntry, LogSink, ProviderSettings, RequestCallbacks, TransportTimeouts, Turn } from './types.js';

import { Mutex } from 'async-mutex';
import { request, type Dispatcher } from 'undici';

import { ConcurrencyError, ConfigError, ParseError, ProtocolError, TransportError } from './errors.js';
import { buildPayload, extractErrorMessage, extractResponseText } from './llm-providers/anthropic-wire.js';
import { SseStreamParser } from './llm-providers/sse-parser.js';
import { NodeRunLoop } from './run-loop.js';
import { errorMessage, makeLogEntry, warn } from './utils.js';

export type ApiKeySource = string | (() => string | undefined) | undefined;

export interface LLMClientOptions {
  provider: ProviderSettings;
  timeouts: TransportTimeouts;
  apiKey?: ApiKeySource;
  dispatcher?: Dispatcher;
  runLoop?: RunLoop;
  onLog?: LogSink;
  traceLLM?: boolean;
  drainIntervalMs?: number;
}

// One lifecycle per request; owned by the I/O task except for the pending buffer.
interface StreamState {
  id: number;
  controller: AbortController;
  accumulated: string;
  pending: string;
  rawChunks: Uint8Array[];
  bytesReceived: number;
  cancelled: boolean;
  timedOut: boolean;
  delivered: boolean;
}

type Outcome = { ok: true; text: string } | { ok: false; error: CopilotError };

const DEFAULT_DRAIN_INTERVAL_MS = 50;
const MESSAGES_PATH = '/v1/messages';

const toBytes = (chunk: unknown): Uint8Array => {
  if (chunk instanceof Uint8Array) return chunk;
  return Buffer.from(String(chunk), 'utf8');
};

const isConnectTimeout = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'UND_ERR_CONNECT_TIMEOUT';

/**
 * Cancellable client for the Anthropic Messages API.
 *
 * At most one request is in flight. The I/O task never calls back into the caller:
 * stream deltas and the single terminal callback are delivered through the run loop.
 */
export class LLMClient {
  private readonly provider: ProviderSettings;
  private readonly timeouts: TransportTimeouts;
  private readonly apiKeySource: ApiKeySource;
  private readonly dispatcher?: Dispatcher;
  private readonly runLoop: RunLoop;
  private readonly onLog?: LogSink;
  private readonly traceLLM: boolean;
  private readonly drainIntervalMs: number;
  private readonly pendingMutex = new Mutex();
  private ioTask: Promise<void> = Promise.resolve();
  private current?: StreamState;
  private nextId = 1;
  private busyFlag = false;

  constructor(options: LLMClientOptions) {
    this.provider = options.provider;
    this.timeouts = options.timeouts;
    this.apiKeySource = options.apiKey;
    this.dispatcher = options.dispatcher;
    this.runLoop = options.runLoop ?? new NodeRunLoop();
    this.onLog = options.onLog;
    this.traceLLM = options.traceLLM ?? false;
    this.drainIntervalMs = options.drainIntervalMs ?? DEFAULT_DRAIN_INTERVAL_MS;
  }

  get busy(): boolean {
    return this.busyFlag;
  }

  get remoteIdentifier(): string {
    return `anthropic:${this.provider.model}`;
  }

  hasCredentials(): boolean {
    const key = this.resolveApiKey();
    return key !== undefined && key.length > 0;
  }

  /**
   * Starts one request. Returns false when the request was rejected; the rejection
   * is still delivered through `onError` on the run loop.
   */
  send(systemPrompt: string, turns: readonly Turn[], callbacks: RequestCallbacks): boolean {
    if (this.busyFlag) {
      const error = new ConcurrencyError();
      this.log('WRN', 'request', error.message);
      this.runLoop.post(() => {
        callbacks.onError(error);
      });
      return false;
    }
    const apiKey = this.resolveApiKey();
    if (apiKey === undefined || apiKey.length === 0) {
      const error = new ConfigError('No API key configured. Set ANTHROPIC_API_KEY or add a key file.');
      this.log('ERR', 'request', error.message);
      this.runLoop.post(() => {
        callbacks.onError(error);
      });
      return false;
    }

    const state: StreamState = {
      id: this.nextId,
      controller: new AbortController(),
      accumulated: '',
      pending: '',
      rawChunks: [],
      bytesReceived: 0,
      cancelled: false,
      timedOut: false,
      delivered: false,
    };
    this.nextId += 1;
    this.current = state;
    this.busyFlag = true;

    const streaming = this.provider.stream && callbacks.onStreamDelta !== undefined;
    const payload = buildPayload(
      { model: this.provider.model, maxTokens: this.provider.maxTokens, stream: streaming },
      systemPrompt,
      turns
    );
    const previous = this.ioTask;
    this.ioTask = previous.then(async () => {
      await this.runRequest(state, payload, apiKey, streaming, callbacks);
    });
    return true;
  }

  /** Cooperative cancel of the current request; its terminal callback becomes a cancellation. */
  cancel(): void {
    const state = this.current;
    if (state === undefined || state.delivered || state.cancelled) return;
    state.cancelled = true;
    state.controller.abort();
    this.log('VRB', 'request', 'cancellation requested');
  }

  /** Resolves once the I/O task has finished and posted its terminal callback. */
  async idle(): Promise<void> {
    await this.ioTask;
  }

  private resolveApiKey(): string | undefined {
    const source = this.apiKeySource;
    if (typeof source === 'function') return source();
    return source;
  }

  private async runRequest(
    state: StreamState,
    payload: string,
    apiKey: string,
    streaming: boolean,
    callbacks: RequestCallbacks
  ): Promise<void> {
    const startedAt = Date.now();
    const stopDrain = streaming
      ? this.runLoop.every(this.drainIntervalMs, () => {
          this.drainPending(state, callbacks).catch((error: unknown) => {
            warn(`stream delta drain failed: ${errorMessage(error)}`);
          });
          return this.busyFlag && this.current === state;
        })
      : undefined;

    let outcome: Outcome;
    try {
      outcome = await this.perform(state, payload, apiKey, streaming);
    } catch (error) {
      outcome = { ok: false, error: this.mapFailure(state, error) };
    }

    stopDrain?.();
    const tail = await this.takePending(state);
    const elapsed = Date.now() - startedAt;
    if (outcome.ok) {
      this.log('VRB', 'response', `response received (${String(outcome.text.length)} chars)`, {
        latency_ms: elapsed,
        bytes: state.bytesReceived,
      });
    } else {
      this.log(outcome.error instanceof TransportError && outcome.error.kind === 'cancelled' ? 'VRB' : 'ERR', 'response', outcome.error.message, {
        latency_ms: elapsed,
        category: outcome.error.category,
      });
    }

    this.busyFlag = false;
    this.runLoop.post(() => {
      this.deliver(state, outcome, tail, callbacks);
    });
  }

  private deliver(state: StreamState, outcome: Outcome, tail: string, callbacks: RequestCallbacks): void {
    if (state.delivered) return;
    state.delivered = true;
    if (state.cancelled) {
      callbacks.onError(TransportError.cancelled());
      return;
    }
    if (tail.length > 0 && callbacks.onStreamDelta !== undefined) {
      callbacks.onStreamDelta(tail);
    }
    if (outcome.ok) {
      callbacks.onComplete(outcome.text);
    } else {
      callbacks.onError(outcome.error);
    }
  }

  private async perform(state: StreamState, payload: string, apiKey: string, streaming: boolean): Promise<Outcome> {
    if (state.cancelled) return { ok: false, error: TransportError.cancelled() };

    const url = `${this.provider.baseUrl.replace(/\/+$/, '')}${MESSAGES_PATH}`;
    const headers: Record<string, string> = {
      'x-api-key': apiKey,
      'anthropic-version': this.provider.anthropicVersion,
      'content-type': 'application/json',
    };
    this.log('VRB', 'request', `POST ${url} (${String(payload.length)} bytes${streaming ? ', streaming' : ''})`);
    if (this.traceLLM) {
      this.log('TRC', 'request', `headers: ${JSON.stringify({ ...headers, 'x-api-key': '[REDACTED]' })}\n${payload}`);
    }

    const watchdog = streaming ? this.startLowSpeedWatchdog(state) : this.startTotalTimeout(state);
    try {
      const response = await request(url, {
        method: 'POST',
        headers,
        body: payload,
        signal: state.controller.signal,
        ...(this.dispatcher !== undefined ? { dispatcher: this.dispatcher } : {}),
      });
      const ok = response.statusCode >= 200 && response.statusCode < 300;
      const parser = streaming && ok ? new SseStreamParser() : undefined;

      // eslint-disable-next-line functional/no-loop-statements
      for await (const rawChunk of response.body) {
        if (state.cancelled) break;
        const chunk = toBytes(rawChunk);
        state.bytesReceived += chunk.byteLength;
        if (parser === undefined) {
          state.rawChunks.push(chunk);
          continue;
        }
        await this.appendDeltas(state, parser.push(chunk));
      }

      if (state.cancelled) return { ok: false, error: TransportError.cancelled() };
      const raw = Buffer.concat(state.rawChunks).toString('utf8');
      if (this.traceLLM && raw.length > 0) {
        this.log('TRC', 'response', `HTTP ${String(response.statusCode)}\n${raw}`);
      }
      if (!ok) {
        return { ok: false, error: new ProtocolError(response.statusCode, extractErrorMessage(raw)) };
      }
      if (parser !== undefined) {
        await this.appendDeltas(state, parser.finish());
        if (parser.sawError) {
          return { ok: false, error: new ProtocolError(response.statusCode, parser.errorMessage) };
        }
        if (state.accumulated.length === 0) return { ok: false, error: new ParseError() };
        return { ok: true, text: state.accumulated };
      }
      const text = extractResponseText(raw);
      if (text === undefined || text.length === 0) return { ok: false, error: new ParseError() };
      return { ok: true, text };
    } finally {
      watchdog();
    }
  }

  private mapFailure(state: StreamState, error: unknown): CopilotError {
    if (state.cancelled) return TransportError.cancelled();
    if (state.timedOut) return new TransportError('timeout', `Request timed out: ${errorMessage(error)}`);
    if (isConnectTimeout(error)) return new TransportError('timeout', `Request timed out: ${errorMessage(error)}`);
    return new TransportError('network', `Network error: ${errorMessage(error)}`);
  }

  private startTotalTimeout(state: StreamState): () => void {
    const timer = setTimeout(() => {
      state.timedOut = true;
      state.controller.abort();
    }, this.timeouts.requestMs);
    return () => {
      clearTimeout(timer);
    };
  }

  // Streaming has no wall-clock limit; it aborts when the byte rate stalls.
  private startLowSpeedWatchdog(state: StreamState): () => void {
    let lastCount = 0;
    const timer = setInterval(() => {
      if (state.bytesReceived - lastCount < this.timeouts.lowSpeedBytes) {
        state.timedOut = true;
        state.controller.abort();
        return;
      }
      lastCount = state.bytesReceived;
    }, this.timeouts.lowSpeedWindowMs);
    return () => {
      clearInterval(timer);
    };
  }

  private async appendDeltas(state: StreamState, deltas: string[]): Promise<void> {
    if (deltas.length === 0) return;
    const text = deltas.join('');
    state.accumulated += text;
    await this.pendingMutex.runExclusive(() => {
      state.pending += text;
    });
  }

  private async takePending(state: StreamState): Promise<string> {
    return await this.pendingMutex.runExclusive(() => {
      const text = state.pending;
      state.pending = '';
      return text;
    });
  }

  private async drainPending(state: StreamState, callbacks: RequestCallbacks): Promise<void> {
    await this.pendingMutex.runExclusive(() => {
      if (state.pending.length === 0 || state.cancelled || state.delivered) return;
      const text = state.pending;
      state.pending = '';
      callbacks.onStreamDelta?.(text);
    });
  }

  private log(
    severity: LogEntry['severity'],
    direction: LogEntry['direction'],
    message: string,
    details?: LogEntry['details']
  ): void {
    if (this.onLog === undefined) return;
    this.onLog(makeLogEntry({
      severity,
      direction,
      type: 'llm',
      remoteIdentifier: this.remoteIdentifier,
      message,
      details,
    }));
  }
}
