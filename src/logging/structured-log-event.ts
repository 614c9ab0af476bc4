import type { LogEntry } from '../types.js';

import { resolveMessageId } from './message-ids.js';

export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  message: string;
  messageId?: string;
  type: LogEntry['type'];
  direction: LogEntry['direction'];
  step: number;
  retry: number;
  remoteIdentifier?: string;
  provider?: string;
  model?: string;
  fatal: boolean;
  labels: Record<string, string>;
  stack?: string;
}

const PRIORITY_BY_SEVERITY: Partial<Record<LogEntry['severity'], number>> = {
  ERR: 3,
  WRN: 4,
  FIN: 5,
  VRB: 6,
  TRC: 7,
};

const DEFAULT_PRIORITY = 6;

const RESERVED_LABEL_KEYS = new Set([
  'severity',
  'type',
  'direction',
  'step',
  'retry',
  'remote',
  'provider',
  'model',
]);

export interface BuildStructuredEventOptions {
  labels?: Record<string, string>;
}

export function buildStructuredLogEvent(
  entry: LogEntry,
  options: BuildStructuredEventOptions = {}
): StructuredLogEvent {
  const priority = PRIORITY_BY_SEVERITY[entry.severity] ?? DEFAULT_PRIORITY;
  const isoTimestamp = new Date(entry.timestamp).toISOString();
  const messageId = resolveMessageId(entry);

  const labels: Record<string, string> = {};
  let provider: string | undefined;
  let model: string | undefined;
  if (entry.type === 'llm' && entry.remoteIdentifier.length > 0) {
    const idx = entry.remoteIdentifier.indexOf(':');
    if (idx !== -1) {
      provider = entry.remoteIdentifier.slice(0, idx);
      model = entry.remoteIdentifier.slice(idx + 1);
    } else {
      provider = entry.remoteIdentifier;
    }
  }
  Object.entries(options.labels ?? {}).forEach(([key, value]) => {
    if (value.length > 0) labels[key] = value;
  });
  if (entry.details !== undefined) {
    Object.entries(entry.details).forEach(([key, value]) => {
      if (Object.prototype.hasOwnProperty.call(labels, key)) return;
      if (typeof value === 'string') {
        if (value.length > 0) labels[key] = value;
        return;
      }
      if (typeof value === 'number') {
        if (Number.isFinite(value)) labels[key] = String(value);
        return;
      }
      labels[key] = value ? 'true' : 'false';
    });
  }

  const filteredLabels = Object.entries(labels).reduce<Record<string, string>>((acc, [key, value]) => {
    if (RESERVED_LABEL_KEYS.has(key)) return acc;
    acc[key] = value;
    return acc;
  }, {});

  return {
    timestamp: entry.timestamp,
    isoTimestamp,
    severity: entry.severity,
    priority,
    message: entry.message,
    messageId,
    type: entry.type,
    direction: entry.direction,
    step: entry.step,
    retry: entry.retry,
    remoteIdentifier: entry.remoteIdentifier.length > 0 ? entry.remoteIdentifier : undefined,
    provider,
    model,
    fatal: entry.fatal,
    labels: filteredLabels,
    stack: entry.stack,
  };
}
