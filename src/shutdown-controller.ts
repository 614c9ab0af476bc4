import type { LogSink } from './types.js';

import { errorMessage, makeLogEntry } from './utils.js';

export type ShutdownTask = () => Promise<void> | void;

/**
 * Ordered process teardown. Tasks run in reverse registration order, once.
 */
export class ShutdownController {
  private readonly abortController = new AbortController();
  private readonly tasks = new Map<string, ShutdownTask>();
  private stopping = false;
  private shutdownPromise?: Promise<void>;

  public get signal(): AbortSignal {
    return this.abortController.signal;
  }

  public isStopping(): boolean {
    return this.stopping;
  }

  public register(name: string, task: ShutdownTask): () => void {
    this.tasks.set(name, task);
    return () => {
      this.tasks.delete(name);
    };
  }

  public async shutdown(opts: { logger?: LogSink } = {}): Promise<void> {
    if (this.shutdownPromise !== undefined) {
      await this.shutdownPromise;
      return;
    }
    this.shutdownPromise = this.performShutdown(opts);
    await this.shutdownPromise;
  }

  private async performShutdown(opts: { logger?: LogSink }): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    this.abortController.abort();
    const logger = opts.logger;
    const entries = Array.from(this.tasks.entries()).reverse();
    // eslint-disable-next-line functional/no-loop-statements -- ordered cleanup matters
    for (const [name, task] of entries) {
      try {
        await task();
      } catch (error) {
        logger?.(makeLogEntry({
          severity: 'WRN',
          direction: 'response',
          type: 'workflow',
          remoteIdentifier: 'shutdown',
          message: `shutdown task '${name}' failed: ${errorMessage(error)}`,
        }));
      }
    }
  }
}
