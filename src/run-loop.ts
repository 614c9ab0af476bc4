import { errorMessage, warn } from './utils.js';

export type RunLoopTask = () => void;

/**
 * The owning event loop of a session. Every callback that touches session state
 * is delivered through `post`; `every` runs a task periodically until it returns false.
 */
export interface RunLoop {
  post: (task: RunLoopTask) => void;
  every: (intervalMs: number, task: () => boolean) => () => void;
}

const runGuarded = (task: RunLoopTask): void => {
  try {
    task();
  } catch (error) {
    warn(`run loop task failed: ${errorMessage(error)}`);
  }
};

export class NodeRunLoop implements RunLoop {
  post(task: RunLoopTask): void {
    setImmediate(() => {
      runGuarded(task);
    });
  }

  every(intervalMs: number, task: () => boolean): () => void {
    const timer = setInterval(() => {
      let keep = false;
      try {
        keep = task();
      } catch (error) {
        warn(`periodic run loop task failed: ${errorMessage(error)}`);
      }
      if (!keep) clearInterval(timer);
    }, intervalMs);
    return () => {
      clearInterval(timer);
    };
  }
}

/**
 * Run loop driven explicitly by its owner. Nothing runs until `flush` or `tick`.
 */
export class ManualRunLoop implements RunLoop {
  private readonly queue: RunLoopTask[] = [];
  private readonly periodic = new Set<() => boolean>();

  post(task: RunLoopTask): void {
    this.queue.push(task);
  }

  every(_intervalMs: number, task: () => boolean): () => void {
    this.periodic.add(task);
    return () => {
      this.periodic.delete(task);
    };
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  get periodicCount(): number {
    return this.periodic.size;
  }

  /** Runs posted tasks, including ones they post, until the queue is empty. */
  flush(): number {
    let ran = 0;
    // eslint-disable-next-line functional/no-loop-statements
    while (this.queue.length > 0) {
      const task = this.queue.shift();
      if (task === undefined) break;
      runGuarded(task);
      ran += 1;
    }
    return ran;
  }

  /** Runs every periodic task once, then flushes. */
  tick(): number {
    Array.from(this.periodic).forEach((task) => {
      if (!task()) this.periodic.delete(task);
    });
    return this.flush();
  }
}
