import { describe, expect, it, vi } from 'vitest';

import type { LogEntry } from '../../types.js';

import { CommandExecutor, describeFault } from '../../command-executor.js';
import { createDemoSession } from '../../host/memory-host.js';
import { HostError } from '../../host/types.js';

describe('CommandExecutor', () => {
  it('refuses to run without a host', () => {
    expect(new CommandExecutor().execute(undefined, 'print(1)')).toEqual({
      success: false,
      error: 'No session loaded',
      output: [],
    });
  });

  it('refuses an empty command', () => {
    expect(new CommandExecutor().execute(createDemoSession(), '  \n')).toEqual({
      success: false,
      error: 'No command to execute',
      output: [],
    });
  });

  it('runs a command against the session and collects printed lines', () => {
    const host = createDemoSession();
    const seen: string[] = [];
    const result = new CommandExecutor().execute(
      host,
      'print(session.track("Bass").gain());\nconsole.log("a\\nb");\nprint("tracks", session.tracks().length);',
      (line) => { seen.push(line); }
    );
    expect(result).toEqual({ success: true, output: ['0.8', 'a', 'b', 'tracks 4'] });
    expect(seen).toEqual(['0.8', 'a', 'b', 'tracks 4']);
  });

  it('reports runtime faults from the command as script errors', () => {
    const result = new CommandExecutor().execute(createDemoSession(), 'session.track("Nope").setGain(1);');
    expect(result.success).toBe(false);
    expect(result.error).toBe("Script error: TypeError: Cannot read properties of null (reading 'setGain')");
  });

  it('reports syntax errors as script errors', () => {
    const result = new CommandExecutor().execute(createDemoSession(), 'session.track(');
    expect(result.success).toBe(false);
    expect(result.error).toMatch(/^Script error: SyntaxError: /);
  });

  it('reports errors the command throws itself', () => {
    const result = new CommandExecutor().execute(createDemoSession(), 'throw new Error("boom");');
    expect(result.error).toBe('Script error: Error: boom');
  });

  it('reports host rejections as host errors', () => {
    const result = new CommandExecutor().execute(createDemoSession(), 'session.setTempo(1000);');
    expect(result.error).toBe('Host error: tempo must be between 20 and 300 BPM');
  });

  it('reports non-error throws as unknown', () => {
    const result = new CommandExecutor().execute(createDemoSession(), 'throw "nope";');
    expect(result.error).toBe('Unknown error during command execution');
  });

  it('stops a command that runs too long', () => {
    const result = new CommandExecutor({ timeoutMs: 50 }).execute(createDemoSession(), 'while (true) {}');
    expect(result.success).toBe(false);
    expect(result.error).toBe('Script error: Error: Script execution timed out after 50ms');
  });

  it('keeps output printed before a fault', () => {
    const result = new CommandExecutor().execute(createDemoSession(), 'print("before"); session.setTempo(5);');
    expect(result.output).toEqual(['before']);
  });

  it('commits a named change as one undo entry', () => {
    const host = createDemoSession();
    const result = new CommandExecutor().execute(
      host,
      'beginChange("tidy up"); session.setTempo(128); session.track("Drums").rename("Kit"); commitChange();'
    );
    expect(result.success).toBe(true);
    expect(host.undoNames()).toEqual(['tidy up']);
    expect(host.tempo).toBe(128);
  });

  it('aborts a transaction the command leaves open, keeping its changes', () => {
    const host = createDemoSession();
    const entries: LogEntry[] = [];
    const result = new CommandExecutor({ onLog: (entry) => { entries.push(entry); } }).execute(
      host,
      'beginChange("unfinished"); session.setTempo(130);'
    );
    expect(result.success).toBe(true);
    expect(host.transactions.isOpen()).toBe(false);
    expect(host.undoNames()).toEqual([]);
    expect(host.tempo).toBe(130);
    expect(entries.some((entry) => entry.severity === 'WRN' && entry.message === 'command left a transaction open; aborting it')).toBe(true);
  });

  it('aborts a transaction left open before the run', () => {
    const host = createDemoSession();
    host.transactions.begin('stale');
    const result = new CommandExecutor().execute(host, 'beginChange("fresh"); session.setTempo(90); commitChange();');
    expect(result.success).toBe(true);
    expect(host.undoNames()).toEqual(['fresh']);
  });

  it('gives each run a fresh context', () => {
    const host = createDemoSession();
    const executor = new CommandExecutor();
    expect(executor.execute(host, 'var leftover = 1;').success).toBe(true);
    expect(executor.execute(host, 'print(typeof leftover);').output).toEqual(['undefined']);
  });

  it('fails a command that returns a rejected promise without leaving the rejection unhandled', () => {
    const result = new CommandExecutor().execute(createDemoSession(), "(async () => { throw new Error('boom'); })()");
    expect(result).toEqual({
      success: false,
      error: 'Script error: asynchronous commands are not supported',
      output: [],
    });
  });

  it('runs promise callbacks before the run returns', () => {
    const host = createDemoSession();
    const result = new CommandExecutor().execute(host, 'Promise.resolve().then(() => session.track("Drums").rename("Kit"))');
    expect(result.error).toBe('Script error: asynchronous commands are not supported');
    expect(host.trackNames()).toEqual(['Kit', 'Bass', 'Guitar', 'Vocals']);
    expect(host.undoNames()).toEqual(['rename Drums']);
  });

  it('accepts a command that queues work without returning the promise', () => {
    const host = createDemoSession();
    const result = new CommandExecutor().execute(host, 'Promise.resolve().then(() => session.setTempo(99));\nprint("queued");');
    expect(result).toEqual({ success: true, output: ['queued'] });
    expect(host.tempo).toBe(99);
  });

  it('reports a host that cannot provide its script globals', () => {
    const host = createDemoSession();
    vi.spyOn(host, 'scriptGlobals').mockImplementation(() => {
      throw new HostError('session closed');
    });
    expect(new CommandExecutor().execute(host, 'print(1);')).toEqual({
      success: false,
      error: 'Host error: session closed',
      output: [],
    });
  });

  it('reports a host that refuses to abort a stale transaction', () => {
    const host = createDemoSession();
    host.transactions.begin('stale');
    vi.spyOn(host.transactions, 'abort').mockImplementation(() => {
      throw new HostError('abort refused');
    });
    expect(new CommandExecutor().execute(host, 'session.setTempo(90);')).toEqual({
      success: false,
      error: 'Host error: abort refused',
      output: [],
    });
    expect(host.tempo).toBe(120);
  });

  it('reports a host that refuses to abort a transaction the command left open', () => {
    const host = createDemoSession();
    vi.spyOn(host.transactions, 'abort').mockImplementation(() => {
      throw new HostError('abort refused');
    });
    const result = new CommandExecutor().execute(host, 'beginChange("unfinished"); print("set");');
    expect(result).toEqual({ success: false, error: 'Host error: abort refused', output: ['set'] });
  });

  it('logs faults with the fault event', () => {
    const entries: LogEntry[] = [];
    new CommandExecutor({ onLog: (entry) => { entries.push(entry); } }).execute(createDemoSession(), 'session.setTempo(1);');
    const fault = entries.find((entry) => entry.severity === 'ERR');
    expect(fault?.details).toEqual({ event: 'fault' });
    expect(fault?.remoteIdentifier).toBe('executor');
  });
});

describe('describeFault', () => {
  it('distinguishes host, local and unknown failures', () => {
    expect(describeFault(new HostError('gone')).message).toBe('Host error: gone');
    expect(describeFault(new RangeError('bad')).message).toBe('Error: bad');
    expect(describeFault(42).message).toBe('Unknown error during command execution');
  });
});
