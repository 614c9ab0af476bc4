import readline from 'node:readline';

import type { CopilotSession, CopilotSessionEvents, NoticeKind } from './copilot-session.js';

const HELP_TEXT = [
  'Type a request to change the session.',
  '  undo      revert the last request',
  '  /state    show the session state',
  '  /cancel   stop the running request',
  '  /quit     leave',
].join('\n');

const PROMPT = '> ';

const NOTICE_PREFIX: Record<NoticeKind, string> = {
  system: '* ',
  error: '! ',
  hint: '? ',
  command: '',
  output: '  ',
};

/**
 * Line-oriented rendering of session events. Streamed text is written as it
 * arrives; any other line starts on a fresh line.
 */
export class ChatRenderer {
  private readonly write: (text: string) => void;
  private midLine = false;
  private finishListeners: (() => void)[] = [];

  constructor(write: (text: string) => void) {
    this.write = write;
  }

  line(text: string): void {
    this.breakLine();
    this.write(`${text}\n`);
  }

  showPrompt(): void {
    this.breakLine();
    this.write(PROMPT);
  }

  onceFinished(listener: () => void): void {
    this.finishListeners.push(listener);
  }

  events(): CopilotSessionEvents {
    return {
      onStreamDelta: (text) => {
        this.write(text);
        this.midLine = !text.endsWith('\n');
      },
      onAgentText: (text) => {
        this.line(text);
      },
      onNotice: (text, kind) => {
        if (kind === 'command') {
          this.line(text.split('\n').map((codeLine) => `    ${codeLine}`).join('\n'));
          return;
        }
        this.line(`${NOTICE_PREFIX[kind]}${text}`);
      },
      onFinish: (_outcome, reason) => {
        this.line(`* ${reason}`);
        const listeners = this.finishListeners;
        this.finishListeners = [];
        listeners.forEach((listener) => {
          listener();
        });
      },
    };
  }

  private breakLine(): void {
    if (!this.midLine) return;
    this.write('\n');
    this.midLine = false;
  }
}

export interface ChatLoopOptions {
  session: CopilotSession;
  renderer: ChatRenderer;
  input: NodeJS.ReadableStream;
  describeState?: () => string;
}

/**
 * Reads operator lines until `/quit` or end of input. Resolves once the input is
 * done and no workflow is running.
 */
export async function runChatLoop(options: ChatLoopOptions): Promise<void> {
  const { session, renderer, input } = options;
  const rl = readline.createInterface({ input, terminal: false });

  await new Promise<void>((resolve) => {
    let closed = false;
    const settle = (): void => {
      if (!closed || session.busy) return;
      resolve();
    };

    rl.on('line', (raw) => {
      const text = raw.trim();
      if (text.length === 0) return;
      if (text === '/quit' || text === '/exit') {
        session.cancel();
        rl.close();
        return;
      }
      if (text === '/cancel') {
        if (!session.cancel()) renderer.line('* Nothing is running.');
        return;
      }
      if (text === '/help') {
        renderer.line(HELP_TEXT);
        renderer.showPrompt();
        return;
      }
      if (text === '/state') {
        renderer.line(options.describeState?.() ?? 'No session loaded.');
        renderer.showPrompt();
        return;
      }
      if (session.busy) {
        renderer.line('* Still working; type /cancel to stop.');
        return;
      }
      const result = session.submit(text);
      if (result.action === 'start' && result.ok) {
        renderer.onceFinished(() => {
          if (closed) {
            settle();
            return;
          }
          renderer.showPrompt();
        });
        return;
      }
      renderer.showPrompt();
    });

    rl.on('close', () => {
      closed = true;
      if (session.busy) {
        renderer.onceFinished(settle);
        return;
      }
      settle();
    });

    renderer.showPrompt();
  });
}
