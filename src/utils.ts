import type { LogEntry } from './types.js';

let warningSink: ((message: string) => void) | undefined;

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

// Consistent warning logger routed through injectable sink to keep core silent
export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) {
    return;
  }
  try {
    sink(message);
  } catch {
    /* ignore sink failures to keep core resilient */
  }
}

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

export const errorMessage = (error: unknown): string => (
  error instanceof Error ? error.message : String(error)
);

/**
 * Single-line preview of a possibly multi-line text, capped at `maxChars`.
 */
export function previewText(text: string, maxChars = 120): string {
  const collapsed = text.replace(/[\r\n]+/g, ' ').trim();
  if (collapsed.length <= maxChars) return collapsed;
  return `${collapsed.slice(0, Math.max(0, maxChars - 3))}...`;
}

export function makeLogEntry(
  partial: Pick<LogEntry, 'severity' | 'type' | 'direction' | 'remoteIdentifier' | 'message'> & Partial<LogEntry>
): LogEntry {
  return {
    timestamp: Date.now(),
    step: 0,
    retry: 0,
    fatal: false,
    ...partial,
  };
}
