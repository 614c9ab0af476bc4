import type { LogEntry, LogFormatName, LogSink } from './types.js';

import { createStructuredLogger, type LogFormat } from './logging/structured-logger.js';

export function makeTTYLogSink(
  opts: {
    color?: boolean;
    verbose?: boolean;
    traceLlm?: boolean;
    explicitFormat?: LogFormatName;
    isTTY?: boolean;
  },
  write?: (s: string) => void
): LogSink {
  const writer = typeof write === 'function'
    ? write
    : (s: string) => {
        try {
          process.stderr.write(s);
        } catch (e) {
          try { process.stderr.write(`[warn] tty write failed: ${e instanceof Error ? e.message : String(e)}\n`); } catch { /* ignore */ }
        }
      };

  const isTTY = opts.isTTY ?? process.stderr.isTTY;

  // Determine format based on context
  let formats: LogFormat[];
  if (opts.explicitFormat !== undefined) {
    formats = [opts.explicitFormat];
  } else if (isTTY) {
    // Interactive console mode - use simplified format
    formats = ['console'];
  } else {
    formats = ['logfmt'];
  }

  const logger = createStructuredLogger({
    formats,
    color: opts.color ?? isTTY,
    verbose: opts.verbose === true,
    logfmtWriter: writer,
    jsonWriter: writer,
    consoleWriter: writer,
  });

  return (entry: LogEntry) => {
    if (entry.severity === 'VRB' && opts.verbose !== true) return;
    if (entry.severity === 'TRC') {
      if (entry.type !== 'llm' || opts.traceLlm !== true) return;
    }
    logger.emit(entry);
  };
}
