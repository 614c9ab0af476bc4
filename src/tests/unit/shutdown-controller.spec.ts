import { describe, expect, it } from 'vitest';

import type { LogEntry } from '../../types.js';

import { createProviderDispatcher } from '../../setup-undici.js';
import { ShutdownController } from '../../shutdown-controller.js';

describe('ShutdownController', () => {
  it('runs tasks once, newest first, and logs failures', async () => {
    const controller = new ShutdownController();
    const order: string[] = [];
    const entries: LogEntry[] = [];
    controller.register('transport', () => { order.push('transport'); });
    controller.register('broken', () => { throw new Error('boom'); });
    controller.register('renderer', async () => {
      await Promise.resolve();
      order.push('renderer');
    });

    await controller.shutdown({ logger: (entry) => { entries.push(entry); } });
    await controller.shutdown();

    expect(order).toEqual(['renderer', 'transport']);
    expect(entries.map((entry) => entry.message)).toEqual(["shutdown task 'broken' failed: boom"]);
    expect(controller.isStopping()).toBe(true);
    expect(controller.signal.aborted).toBe(true);
  });

  it('skips tasks that were unregistered', async () => {
    const controller = new ShutdownController();
    let ran = false;
    const unregister = controller.register('gone', () => { ran = true; });
    unregister();
    await controller.shutdown();
    expect(ran).toBe(false);
  });

  it('closes the provider dispatcher as a shutdown task', async () => {
    const controller = new ShutdownController();
    const dispatcher = createProviderDispatcher({ connectMs: 1_000 });
    controller.register('dispatcher', async () => { await dispatcher.close(); });
    await controller.shutdown();
    expect(dispatcher.closed).toBe(true);
  });
});
