import vm from 'node:vm';
import { format, types } from 'node:util';

import type { SessionHost } from './host/types.js';
import type { ExecutionResult, LogEntry, LogSink } from './types.js';

import { ConfigError, ExecutionError } from './errors.js';
import { HostError } from './host/types.js';
import { makeLogEntry } from './utils.js';

export type OutputLineHandler = (line: string) => void;

export interface CommandExecutorOptions {
  timeoutMs?: number;
  onLog?: LogSink;
}

const DEFAULT_TIMEOUT_MS = 5_000;
const DEFAULT_CHANGE_NAME = 'copilot change';
const SCRIPT_FILENAME = 'copilot-command.js';

const isScriptTimeout = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT';

/**
 * Maps whatever a command threw to the message reported back to the agent.
 * Errors raised inside the command's own context come from another realm, so
 * they are recognised with `isNativeError` rather than `instanceof`.
 */
export function describeFault(error: unknown, compileFault = false): ExecutionError {
  if (error instanceof HostError) {
    return new ExecutionError(`Host error: ${error.message}`);
  }
  if (types.isNativeError(error)) {
    const fromScript = compileFault || isScriptTimeout(error) || !(error instanceof Error);
    if (fromScript) return new ExecutionError(`Script error: ${error.name}: ${error.message}`);
    return new ExecutionError(`Error: ${error.message}`);
  }
  return new ExecutionError('Unknown error during command execution');
}

/**
 * Runs generated commands against a host, one fresh interpreter context per run.
 */
export class CommandExecutor {
  private readonly timeoutMs: number;
  private readonly onLog?: LogSink;

  constructor(options: CommandExecutorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.onLog = options.onLog;
  }

  execute(host: SessionHost | undefined, command: string, onOutputLine?: OutputLineHandler): ExecutionResult {
    const output: string[] = [];
    if (host === undefined) {
      const error = new ConfigError('No session loaded');
      this.log('ERR', 'response', error.message);
      return { success: false, error: error.message, output };
    }
    if (command.trim().length === 0) {
      return { success: false, error: 'No command to execute', output };
    }

    const emit = (...args: unknown[]): void => {
      format(...args).split('\n').forEach((line) => {
        output.push(line);
        onOutputLine?.(line);
      });
    };
    let context: vm.Context;
    try {
      context = vm.createContext(this.sandbox(host, emit), { name: 'copilot-command', microtaskMode: 'afterEvaluate' });
      if (host.transactions.isOpen()) {
        this.log('WRN', 'request', 'aborting a transaction left open by a previous run');
        host.transactions.abort();
      }
    } catch (error) {
      return this.fail(describeFault(error), output);
    }
    this.log('VRB', 'request', `executing command (${String(command.split('\n').length)} lines)`);

    let script: vm.Script;
    try {
      script = new vm.Script(command, { filename: SCRIPT_FILENAME });
    } catch (error) {
      return this.fail(describeFault(error, true), output);
    }

    let completion: unknown;
    try {
      completion = script.runInContext(context, { timeout: this.timeoutMs, displayErrors: false });
    } catch (error) {
      return this.fail(describeFault(error), output);
    }

    // Queued callbacks have run by now; a promise result would settle outside the transaction.
    if (types.isPromise(completion)) {
      void completion.catch((reason: unknown) => {
        this.log('VRB', 'response', `asynchronous command settled after its run: ${describeFault(reason).message}`);
      });
      return this.fail(new ExecutionError('Script error: asynchronous commands are not supported'), output);
    }

    try {
      if (host.transactions.isOpen()) {
        this.log('WRN', 'response', 'command left a transaction open; aborting it');
        host.transactions.abort();
      }
    } catch (error) {
      return this.fail(describeFault(error), output);
    }
    this.log('VRB', 'response', `command succeeded (${String(output.length)} output line(s))`);
    return { success: true, output };
  }

  private sandbox(host: SessionHost, emit: (...args: unknown[]) => void): Record<string, unknown> {
    return {
      ...host.scriptGlobals(),
      print: emit,
      console: Object.freeze({ log: emit, info: emit, warn: emit, error: emit }),
      beginChange: (name?: unknown) => {
        if (host.transactions.isOpen()) host.transactions.abort();
        host.transactions.begin(typeof name === 'string' && name.length > 0 ? name : DEFAULT_CHANGE_NAME);
      },
      commitChange: () => {
        host.transactions.commit();
      },
    };
  }

  private fail(error: ExecutionError, output: string[]): ExecutionResult {
    this.log('ERR', 'response', error.message, { event: 'fault' });
    return { success: false, error: error.message, output };
  }

  private log(
    severity: LogEntry['severity'],
    direction: LogEntry['direction'],
    message: string,
    details?: LogEntry['details']
  ): void {
    if (this.onLog === undefined) return;
    this.onLog(makeLogEntry({ severity, direction, type: 'command', remoteIdentifier: 'executor', message, details }));
  }
}
