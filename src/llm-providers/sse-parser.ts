import { TextDecoder } from 'node:util';

import { findJsonString } from './anthropic-wire.js';

const DONE_SENTINEL = '[DONE]';

/**
 * Incremental reader for the provider's server-sent event stream.
 *
 * Chunks may split lines and multibyte characters at any byte; the output is the
 * same for any chunking of the same bytes.
 */
export class SseStreamParser {
  private readonly decoder = new TextDecoder('utf-8');
  private lineBuffer = '';
  private providerError?: string;
  private errored = false;

  /** Feeds raw bytes and returns the text deltas completed by them. */
  push(chunk: Uint8Array): string[] {
    this.lineBuffer += this.decoder.decode(chunk, { stream: true });
    return this.drainLines();
  }

  /** Flushes the decoder and a final unterminated line. */
  finish(): string[] {
    this.lineBuffer += this.decoder.decode();
    const deltas = this.drainLines();
    if (this.lineBuffer.length > 0) {
      const last = this.lineBuffer;
      this.lineBuffer = '';
      const delta = this.handleLine(last);
      if (delta !== undefined) deltas.push(delta);
    }
    return deltas;
  }

  get sawError(): boolean {
    return this.errored;
  }

  get errorMessage(): string | undefined {
    return this.providerError;
  }

  private drainLines(): string[] {
    const deltas: string[] = [];
    let newline = this.lineBuffer.indexOf('\n');
    // eslint-disable-next-line functional/no-loop-statements
    while (newline !== -1) {
      const line = this.lineBuffer.slice(0, newline);
      this.lineBuffer = this.lineBuffer.slice(newline + 1);
      const delta = this.handleLine(line);
      if (delta !== undefined) deltas.push(delta);
      newline = this.lineBuffer.indexOf('\n');
    }
    return deltas;
  }

  private handleLine(rawLine: string): string | undefined {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (!line.startsWith('data:')) return undefined;
    const fragment = line.startsWith('data: ') ? line.slice(6) : line.slice(5);
    if (fragment === DONE_SENTINEL) return undefined;

    const type = findJsonString(fragment, 'type');
    if (type === 'content_block_delta') {
      const text = findJsonString(fragment, 'text');
      return text !== undefined && text.length > 0 ? text : undefined;
    }
    if (type === 'error') {
      this.errored = true;
      this.providerError ??= findJsonString(fragment, 'message');
    }
    return undefined;
  }
}
