import { describe, expect, it } from 'vitest';

import type { LogEntry } from '../../types.js';

import { makeTTYLogSink } from '../../log-sink-tty.js';
import { formatConsole } from '../../logging/console-format.js';
import { formatLogfmt } from '../../logging/logfmt.js';
import { getRegisteredMessageIds } from '../../logging/message-ids.js';
import { buildStructuredLogEvent } from '../../logging/structured-log-event.js';
import { makeLogEntry } from '../../utils.js';

const finishEntry = (): LogEntry => makeLogEntry({
  timestamp: 0,
  severity: 'FIN',
  type: 'workflow',
  direction: 'response',
  remoteIdentifier: 'session',
  step: 2,
  message: 'completed: All steps completed.',
  details: { event: 'finish', outcome: 'completed' },
});

const llmEntry = (severity: LogEntry['severity']): LogEntry => makeLogEntry({
  timestamp: 0,
  severity,
  type: 'llm',
  direction: 'response',
  remoteIdentifier: 'anthropic:test-model',
  step: 1,
  message: 'API error (HTTP 401)',
});

describe('structured log events', () => {
  it('splits the provider and model of transport entries', () => {
    const event = buildStructuredLogEvent(llmEntry('ERR'));
    expect(event.provider).toBe('anthropic');
    expect(event.model).toBe('test-model');
    expect(event.priority).toBe(3);
  });

  it('attaches registered message ids by component and event', () => {
    const event = buildStructuredLogEvent(finishEntry());
    expect(event.messageId).toBe(getRegisteredMessageIds()['session:finish']);
    expect(event.labels).toEqual({ event: 'finish', outcome: 'completed' });
  });

  it('formats logfmt lines', () => {
    const line = formatLogfmt(buildStructuredLogEvent(finishEntry()));
    expect(line).toBe(
      'ts=1970-01-01T00:00:00.000Z level=fin priority=5 type=workflow direction=response step=2 retry=0 ' +
      'message_id=9c4e2d17-8b3a-4f05-a6d1-7e5b3c2a1f94 remote=session event=finish outcome=completed ' +
      'message="completed: All steps completed."'
    );
  });

  it('formats console lines', () => {
    expect(formatConsole(buildStructuredLogEvent(llmEntry('ERR')))).toBe(
      '[ERR] ← [1.0] LLM anthropic:test-model: API error (HTTP 401)'
    );
    expect(formatConsole(buildStructuredLogEvent(finishEntry()), { verbose: true })).toBe(
      '[FIN] ← [2.0] WFL session: completed: All steps completed. (event=finish, outcome=completed)'
    );
  });
});

describe('makeTTYLogSink', () => {
  const collect = (opts: Parameters<typeof makeTTYLogSink>[0]): { sink: ReturnType<typeof makeTTYLogSink>; lines: string[] } => {
    const lines: string[] = [];
    const sink = makeTTYLogSink({ isTTY: false, ...opts }, (text) => { lines.push(text); });
    return { sink, lines };
  };

  it('drops verbose entries unless asked for', () => {
    const quiet = collect({});
    quiet.sink(llmEntry('VRB'));
    quiet.sink(llmEntry('WRN'));
    expect(quiet.lines).toHaveLength(1);

    const verbose = collect({ verbose: true });
    verbose.sink(llmEntry('VRB'));
    expect(verbose.lines).toHaveLength(1);
  });

  it('passes traces only for transport entries with tracing on', () => {
    const { sink, lines } = collect({ traceLlm: true });
    sink(llmEntry('TRC'));
    sink({ ...finishEntry(), severity: 'TRC' });
    expect(lines).toHaveLength(1);
  });

  it('writes one JSON object per line in json format', () => {
    const { sink, lines } = collect({ explicitFormat: 'json' });
    sink(llmEntry('ERR'));
    expect(lines[0].endsWith('\n')).toBe(true);
    const payload: unknown = JSON.parse(lines[0]);
    expect(payload).toMatchObject({ severity: 'ERR', provider: 'anthropic', model: 'test-model', message: 'API error (HTTP 401)' });
  });
});
