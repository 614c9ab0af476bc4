import type { SessionHost } from './host/types.js';
import type { LogEntry, LogSink } from './types.js';

import { makeLogEntry } from './utils.js';

/**
 * Snapshot of the host taken before a workflow, and the means to return to it.
 *
 * Three kinds of change are reverted: entries the host recorded in its own undo
 * history, control values (which the host does not record), and entities created
 * since the snapshot. The record is invalidated exactly once by `restore`.
 */
export class UndoLedger {
  private watchedValues = new Map<string, number>();
  private existingEntityIds = new Set<string>();
  private depthBeforeValue = 0;
  private nativeCount = 0;
  private descriptionText = '';
  private isValid = false;
  private restoring = false;
  private readonly onLog?: LogSink;

  constructor(onLog?: LogSink) {
    this.onLog = onLog;
  }

  get valid(): boolean {
    return this.isValid;
  }

  get description(): string {
    return this.descriptionText;
  }

  get nativeUndoCount(): number {
    return this.nativeCount;
  }

  get depthBefore(): number {
    return this.depthBeforeValue;
  }

  get watchedCount(): number {
    return this.watchedValues.size;
  }

  snapshot(host: SessionHost, description: string): void {
    this.clear();
    host.controls.list().forEach((control) => {
      if (control.hidden) return;
      this.watchedValues.set(control.id, control.getValue());
    });
    host.entities.ids().forEach((id) => {
      this.existingEntityIds.add(id);
    });
    this.depthBeforeValue = host.history.depth();
    this.descriptionText = description;
    this.isValid = true;
    this.log('VRB', `snapshot taken: ${String(this.watchedValues.size)} control(s), ${String(this.existingEntityIds.size)} entities, undo depth ${String(this.depthBeforeValue)}`);
  }

  afterSuccessfulExecution(host: SessionHost): void {
    if (!this.isValid) return;
    this.nativeCount = Math.max(0, host.history.depth() - this.depthBeforeValue);
  }

  /**
   * Brings the host back to the snapshot. Returns false when there is nothing to
   * restore or no host to restore it on.
   */
  restore(host: SessionHost | undefined): boolean {
    if (!this.isValid || host === undefined) return false;
    this.restoring = true;
    try {
      const undone = this.undoNativeEntries(host);
      let restoredControls = 0;
      this.watchedValues.forEach((value, id) => {
        const control = host.controls.byId(id);
        if (control === undefined) return;
        if (control.getValue() !== value) {
          control.setValue(value, 'no-group');
          restoredControls += 1;
        }
      });
      const added = host.entities.ids().filter((id) => !this.existingEntityIds.has(id));
      if (added.length > 0) host.entities.remove(added);
      this.log('VRB', `restored: ${String(undone)} undo step(s), ${String(restoredControls)} control(s), ${String(added.length)} entities removed`, {
        undone,
        controls: restoredControls,
        removed: added.length,
      });
    } finally {
      this.restoring = false;
      this.clear();
    }
    return true;
  }

  /** Accounts for host undo steps taken outside the copilot since the last execution. */
  reconcile(currentDepth: number): void {
    if (this.restoring || !this.isValid) return;
    const expected = this.depthBeforeValue + this.nativeCount;
    if (currentDepth >= expected) return;
    const alreadyUndone = Math.min(expected - currentDepth, this.nativeCount);
    this.nativeCount -= alreadyUndone;
  }

  rollbackAfterFailure(host: SessionHost | undefined): boolean {
    if (host === undefined) {
      this.clear();
      return false;
    }
    if (host.transactions.isOpen()) host.transactions.abort();
    if (this.isValid) this.nativeCount = Math.max(0, host.history.depth() - this.depthBeforeValue);
    const restored = this.restore(host);
    this.log(restored ? 'WRN' : 'ERR', restored ? 'rolled back after failed execution' : 'rollback found nothing to restore', {
      event: 'rollback',
    });
    return restored;
  }

  clear(): void {
    this.watchedValues = new Map();
    this.existingEntityIds = new Set();
    this.depthBeforeValue = 0;
    this.nativeCount = 0;
    this.descriptionText = '';
    this.isValid = false;
  }

  private undoNativeEntries(host: SessionHost): number {
    let undone = 0;
    // eslint-disable-next-line functional/no-loop-statements
    for (let i = 0; i < this.nativeCount; i += 1) {
      if (host.history.depth() <= 0) break;
      host.history.undo(1);
      undone += 1;
    }
    return undone;
  }

  private log(severity: LogEntry['severity'], message: string, details?: LogEntry['details']): void {
    if (this.onLog === undefined) return;
    this.onLog(makeLogEntry({ severity, type: 'ledger', direction: 'response', remoteIdentifier: 'ledger', message, details }));
  }
}
