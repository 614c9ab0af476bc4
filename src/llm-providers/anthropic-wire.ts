/**
 * Hand-built wire encoding for the Anthropic Messages API.
 *
 * The request and response shapes this client exchanges are fixed and small, so
 * payloads are serialized directly and responses are read with a literal
 * `"key":"value"` scanner instead of a JSON parser. The scanner only understands
 * string values; it is not meant for anything else.
 */
import type { Turn } from '../types.js';

export interface PayloadOptions {
  model: string;
  maxTokens: number;
  stream?: boolean;
}

const HEX = '0123456789abcdef';

export function escapeJson(value: string): string {
  let out = '';
  // eslint-disable-next-line functional/no-loop-statements
  for (let i = 0; i < value.length; i += 1) {
    const ch = value[i];
    const code = value.charCodeAt(i);
    switch (ch) {
      case '"': out += '\\"'; break;
      case '\\': out += '\\\\'; break;
      case '\n': out += '\\n'; break;
      case '\r': out += '\\r'; break;
      case '\t': out += '\\t'; break;
      case '\b': out += '\\b'; break;
      case '\f': out += '\\f'; break;
      default:
        if (code < 0x20) {
          out += `\\u00${HEX[code >> 4]}${HEX[code & 0xf]}`;
        } else {
          out += ch;
        }
    }
  }
  return out;
}

export function buildPayload(options: PayloadOptions, systemPrompt: string, turns: readonly Turn[]): string {
  const parts: string[] = [];
  parts.push(`"model":"${escapeJson(options.model)}"`);
  parts.push(`"max_tokens":${String(Math.trunc(options.maxTokens))}`);
  if (options.stream === true) {
    parts.push('"stream":true');
  }
  parts.push(`"system":"${escapeJson(systemPrompt)}"`);
  const messages = turns
    .map((turn) => `{"role":"${escapeJson(turn.role)}","content":"${escapeJson(turn.content)}"}`)
    .join(',');
  parts.push(`"messages":[${messages}]`);
  return `{${parts.join(',')}}`;
}

interface StringMatch {
  value: string;
  end: number;
}

const isJsonWhitespace = (ch: string | undefined): boolean =>
  ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';

const skipWhitespace = (json: string, from: number): number => {
  let p = from;
  // eslint-disable-next-line functional/no-loop-statements
  while (p < json.length && isJsonWhitespace(json[p])) p += 1;
  return p;
};

// Reads a string body starting right after its opening quote.
// Returns undefined when the input ends before the closing quote.
function readStringBody(json: string, start: number): StringMatch | undefined {
  let value = '';
  let p = start;
  // eslint-disable-next-line functional/no-loop-statements
  while (p < json.length) {
    const ch = json[p];
    if (ch === '"') {
      return { value, end: p + 1 };
    }
    if (ch !== '\\') {
      value += ch;
      p += 1;
      continue;
    }
    if (p + 1 >= json.length) return undefined;
    const esc = json[p + 1];
    switch (esc) {
      case '"': value += '"'; break;
      case '\\': value += '\\'; break;
      case '/': value += '/'; break;
      case 'n': value += '\n'; break;
      case 'r': value += '\r'; break;
      case 't': value += '\t'; break;
      case 'b': value += '\b'; break;
      case 'f': value += '\f'; break;
      case 'u': {
        const hex = json.slice(p + 2, p + 6);
        if (hex.length < 4) return undefined;
        if (/^[0-9a-fA-F]{4}$/.test(hex)) {
          value += String.fromCharCode(Number.parseInt(hex, 16));
          p += 6;
          continue;
        }
        value += '\\u';
        break;
      }
      default:
        value += `\\${esc}`;
    }
    p += 2;
  }
  return undefined;
}

function scanFrom(json: string, key: string, from: number): StringMatch | undefined {
  const needle = `"${key}"`;
  let pos = from;
  // eslint-disable-next-line functional/no-loop-statements
  while (pos < json.length) {
    const found = json.indexOf(needle, pos);
    if (found === -1) return undefined;
    let p = skipWhitespace(json, found + needle.length);
    if (json[p] !== ':') {
      pos = found + 1;
      continue;
    }
    p = skipWhitespace(json, p + 1);
    if (json[p] !== '"') {
      pos = found + 1;
      continue;
    }
    return readStringBody(json, p + 1);
  }
  return undefined;
}

/**
 * First string value stored under `key`, or undefined when there is none or the
 * input is truncated inside that value. Occurrences of the key whose value is not
 * a string (objects, arrays, numbers) are skipped.
 */
export function findJsonString(json: string, key: string): string | undefined {
  return scanFrom(json, key, 0)?.value;
}

/**
 * Every string value stored under `key`, in document order.
 */
export function findJsonStrings(json: string, key: string): string[] {
  const values: string[] = [];
  let pos = 0;
  // eslint-disable-next-line functional/no-loop-statements
  while (pos < json.length) {
    const match = scanFrom(json, key, pos);
    if (match === undefined) break;
    values.push(match.value);
    pos = match.end;
  }
  return values;
}

// Messages API success body: { "content": [ { "type": "text", "text": "..." } ] }
export function extractResponseText(body: string): string | undefined {
  return findJsonString(body, 'text');
}

// Error body: { "type": "error", "error": { "type": "...", "message": "..." } }
export function extractErrorMessage(body: string): string | undefined {
  return findJsonString(body, 'message');
}
