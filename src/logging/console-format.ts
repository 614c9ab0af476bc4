import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  color?: boolean;
  verbose?: boolean;
}

const ANSI_RESET = '\u001B[0m';
const ANSI_RED = '\u001B[31m';
const ANSI_YELLOW = '\u001B[33m';
const ANSI_GREEN = '\u001B[32m';
const ANSI_GRAY = '\u001B[90m';

const KIND_CODES: Record<StructuredLogEvent['type'], string> = {
  llm: 'LLM',
  command: 'CMD',
  ledger: 'UND',
  workflow: 'WFL',
};

function colorFor(event: StructuredLogEvent): string | undefined {
  if (event.severity === 'ERR') return ANSI_RED;
  if (event.severity === 'WRN') return ANSI_YELLOW;
  if (event.severity === 'FIN') return ANSI_GREEN;
  if (event.severity === 'VRB' || event.severity === 'TRC') return ANSI_GRAY;
  return undefined;
}

/**
 * Compact human-oriented line: `[SEV] → [step.retry] KIND remote: message`.
 * Labels are appended only in verbose mode.
 */
export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const arrow = event.direction === 'request' ? '→' : '←';
  const remote = event.remoteIdentifier !== undefined ? ` ${event.remoteIdentifier}` : '';
  let line = `[${event.severity}] ${arrow} [${String(event.step)}.${String(event.retry)}] ${KIND_CODES[event.type]}${remote}: ${event.message}`;
  if (options.verbose === true) {
    const labels = Object.entries(event.labels).map(([key, value]) => `${key}=${value}`);
    if (labels.length > 0) line += ` (${labels.join(', ')})`;
  }
  if (event.fatal) line += ' (fatal=true)';

  if (options.color === true) {
    const ansi = colorFor(event);
    if (ansi !== undefined) line = `${ansi}${line}${ANSI_RESET}`;
  }

  if (event.severity === 'ERR' && typeof event.stack === 'string' && event.stack.length > 0) {
    const stackLines = event.stack.split('\n').map((stackLine) => `    ${stackLine}`).join('\n');
    line += `\n${stackLines}`;
  }

  return line;
}
