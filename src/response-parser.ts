/**
 * Splits an agent reply into prose and an executable command.
 *
 * A fence is three backticks; the rest of the opening line is the tag and the body
 * runs to the next fence. A block left open at the end of the reply runs to the end.
 */

export const COMPLETION_MARKER = '[DONE]';

const FENCE = '```';
const COMMAND_TAGS = new Set(['js', 'javascript']);

export interface FencedBlock {
  tag: string;
  body: string;
  closed: boolean;
  start: number;
  end: number;
}

export interface AgentReply {
  explanation: string;
  command: string;
  complete: boolean;
}

export function scanFencedBlocks(text: string): FencedBlock[] {
  const blocks: FencedBlock[] = [];
  let pos = 0;
  // eslint-disable-next-line functional/no-loop-statements
  while (pos < text.length) {
    const open = text.indexOf(FENCE, pos);
    if (open === -1) break;
    const lineEnd = text.indexOf('\n', open + FENCE.length);
    if (lineEnd === -1) {
      blocks.push({ tag: normalizeTag(text.slice(open + FENCE.length)), body: '', closed: false, start: open, end: text.length });
      break;
    }
    const tag = normalizeTag(text.slice(open + FENCE.length, lineEnd));
    const bodyStart = lineEnd + 1;
    const close = text.indexOf(FENCE, bodyStart);
    if (close === -1) {
      blocks.push({ tag, body: text.slice(bodyStart), closed: false, start: open, end: text.length });
      break;
    }
    blocks.push({ tag, body: text.slice(bodyStart, close), closed: true, start: open, end: close + FENCE.length });
    pos = close + FENCE.length;
  }
  return blocks;
}

function normalizeTag(openerLine: string): string {
  const first = openerLine.trim().split(/\s+/)[0] ?? '';
  return first.toLowerCase();
}

/**
 * Command text of a reply. Blocks tagged js/javascript win; untagged blocks count only
 * when no tagged block exists. Blocks with any other tag are never commands.
 */
export function extractCommand(text: string): string {
  const blocks = scanFencedBlocks(text);
  const tagged = blocks.filter((block) => COMMAND_TAGS.has(block.tag));
  const chosen = tagged.length > 0 ? tagged : blocks.filter((block) => block.tag === '');
  return chosen
    .map((block) => block.body.trimEnd())
    .filter((body) => body.length > 0)
    .join('\n\n');
}

export function extractExplanation(text: string): string {
  const blocks = scanFencedBlocks(text);
  let outside = '';
  let pos = 0;
  blocks.forEach((block) => {
    outside += text.slice(pos, block.start);
    pos = block.end;
  });
  if (pos < text.length) outside += text.slice(pos);
  return outside.replace(/^[\r\n]+/, '').trimEnd();
}

export const hasCompletionMarker = (text: string): boolean => text.includes(COMPLETION_MARKER);

export const stripCompletionMarker = (text: string): string =>
  text.split(COMPLETION_MARKER).join('').trimEnd();

export function parseAgentReply(text: string): AgentReply {
  return {
    explanation: stripCompletionMarker(extractExplanation(text)),
    command: extractCommand(text),
    complete: hasCompletionMarker(text),
  };
}
