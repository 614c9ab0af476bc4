/**
 * Contract between the copilot and the application it drives.
 *
 * The copilot only ever touches the host through this surface: it hands
 * `scriptGlobals()` to generated commands, brackets them with transactions, and
 * reads controls, entities and the undo history to snapshot and roll back.
 */

// 'use-group' lets a change propagate to the control's group peers; 'no-group' touches only this control.
export type GroupDisposition = 'use-group' | 'no-group';

export interface HostControl {
  readonly id: string;
  readonly hidden: boolean;
  getValue: () => number;
  setValue: (value: number, disposition: GroupDisposition) => void;
}

export interface HostTransactions {
  begin: (name: string) => void;
  commit: () => void;
  abort: () => void;
  isOpen: () => boolean;
}

export interface HostControls {
  list: () => HostControl[];
  byId: (id: string) => HostControl | undefined;
}

export interface HostEntities {
  ids: () => string[];
  remove: (ids: readonly string[]) => void;
}

export type HistoryListener = (depth: number) => void;

export interface HostHistory {
  depth: () => number;
  undo: (steps: number) => void;
  onChanged: (listener: HistoryListener) => () => void;
}

export interface SessionHost {
  readonly name: string;
  scriptGlobals: () => Record<string, unknown>;
  readonly transactions: HostTransactions;
  readonly controls: HostControls;
  readonly entities: HostEntities;
  readonly history: HostHistory;
  describeState: () => string;
  capabilityCatalog: () => string;
}

export class HostError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HostError';
  }
}
