import type {
  GroupDisposition,
  HistoryListener,
  HostControl,
  HostControls,
  HostEntities,
  HostHistory,
  HostTransactions,
  SessionHost,
} from './types.js';

import { HostError } from './types.js';

export type ControlKind = 'gain' | 'mute' | 'solo' | 'pan' | 'monitor' | 'amount';

interface ControlRecord {
  id: string;
  kind: ControlKind;
  ownerId: string;
  hidden: boolean;
  value: number;
  min: number;
  max: number;
}

interface TrackRecord {
  id: string;
  name: string;
  group?: string;
  controls: Partial<Record<ControlKind, string>>;
  plugins: string[];
}

interface PluginRecord {
  id: string;
  trackId: string;
  name: string;
  amountId: string;
}

interface UndoEntry {
  name: string;
  revert: () => void;
}

interface OpenTransaction {
  name: string;
  reverts: (() => void)[];
}

export interface TrackSeed {
  name: string;
  group?: string;
  gain?: number;
  mute?: boolean;
  solo?: boolean;
  pan?: number;
}

export interface MemorySessionOptions {
  name?: string;
  tempo?: number;
  tracks?: TrackSeed[];
  availablePlugins?: string[];
}

export interface PluginHandle {
  id: () => string;
  name: () => string;
  amount: () => number;
  setAmount: (value: number) => void;
}

export interface TrackHandle {
  id: () => string;
  name: () => string;
  rename: (name: string) => void;
  group: () => string | null;
  gain: () => number;
  setGain: (value: number) => void;
  mute: () => boolean;
  setMute: (on: boolean) => void;
  solo: () => boolean;
  setSolo: (on: boolean) => void;
  pan: () => number;
  setPan: (value: number) => void;
  plugins: () => PluginHandle[];
  addPlugin: (name: string) => PluginHandle;
}

export interface SessionScriptApi {
  name: () => string;
  tempo: () => number;
  setTempo: (bpm: number) => void;
  tracks: () => TrackHandle[];
  track: (name: string) => TrackHandle | null;
  addTrack: (name: string) => TrackHandle;
  availablePlugins: () => string[];
}

const DEFAULT_PLUGINS = ['Compressor', 'Delay', 'Equalizer', 'Reverb'];
const MIN_TEMPO = 20;
const MAX_TEMPO = 300;

const CONTROL_RANGES: Record<ControlKind, { min: number; max: number; hidden: boolean }> = {
  gain: { min: 0, max: 2, hidden: false },
  mute: { min: 0, max: 1, hidden: false },
  solo: { min: 0, max: 1, hidden: false },
  pan: { min: -1, max: 1, hidden: false },
  monitor: { min: 0, max: 1, hidden: true },
  amount: { min: 0, max: 1, hidden: false },
};

const GROUP_SHARED_KINDS = new Set<ControlKind>(['gain', 'mute', 'solo']);

const onOff = (value: number): string => (value >= 0.5 ? 'on' : 'off');

/**
 * In-process mixing session: tracks with gain/mute/solo/pan controls, route groups,
 * plugins, a tempo and a linear undo history.
 *
 * Control changes and new tracks or plugins are not recorded in the undo history;
 * renames and tempo changes are, either one entry each or folded into the open
 * transaction. Aborting a transaction discards its record but keeps its changes.
 */
export class MemorySessionHost implements SessionHost {
  readonly name: string;
  readonly transactions: HostTransactions;
  readonly controls: HostControls;
  readonly entities: HostEntities;
  readonly history: HostHistory;

  private tempoBpm: number;
  private readonly availablePlugins: string[];
  private readonly tracks = new Map<string, TrackRecord>();
  private readonly plugins = new Map<string, PluginRecord>();
  private readonly controlRecords = new Map<string, ControlRecord>();
  private readonly undoStack: UndoEntry[] = [];
  private readonly listeners = new Set<HistoryListener>();
  private openTransaction?: OpenTransaction;
  private nextId = 1;

  constructor(options: MemorySessionOptions = {}) {
    this.name = options.name ?? 'Untitled Session';
    this.tempoBpm = options.tempo ?? 120;
    this.availablePlugins = [...(options.availablePlugins ?? DEFAULT_PLUGINS)];
    (options.tracks ?? []).forEach((seed) => {
      const track = this.createTrack(seed.name, seed.group);
      if (seed.gain !== undefined) this.writeControl(track.controls.gain, seed.gain);
      if (seed.mute !== undefined) this.writeControl(track.controls.mute, seed.mute ? 1 : 0);
      if (seed.solo !== undefined) this.writeControl(track.controls.solo, seed.solo ? 1 : 0);
      if (seed.pan !== undefined) this.writeControl(track.controls.pan, seed.pan);
    });

    this.transactions = {
      begin: (name) => {
        if (this.openTransaction !== undefined) {
          throw new HostError(`transaction '${this.openTransaction.name}' is already open`);
        }
        this.openTransaction = { name, reverts: [] };
      },
      commit: () => {
        const tx = this.openTransaction;
        if (tx === undefined) throw new HostError('no open transaction to commit');
        this.openTransaction = undefined;
        if (tx.reverts.length === 0) return;
        const reverts = [...tx.reverts].reverse();
        this.pushUndo({
          name: tx.name,
          revert: () => {
            reverts.forEach((revert) => {
              revert();
            });
          },
        });
      },
      abort: () => {
        this.openTransaction = undefined;
      },
      isOpen: () => this.openTransaction !== undefined,
    };

    this.controls = {
      list: () => Array.from(this.controlRecords.values()).map((record) => this.controlView(record)),
      byId: (id) => {
        const record = this.controlRecords.get(id);
        return record !== undefined ? this.controlView(record) : undefined;
      },
    };

    this.entities = {
      ids: () => [...this.tracks.keys(), ...this.plugins.keys()],
      remove: (ids) => {
        this.removeEntities(ids);
      },
    };

    this.history = {
      depth: () => this.undoStack.length,
      undo: (steps) => {
        // eslint-disable-next-line functional/no-loop-statements
        for (let i = 0; i < steps; i += 1) {
          const entry = this.undoStack.pop();
          if (entry === undefined) break;
          entry.revert();
          this.notifyHistory();
        }
      },
      onChanged: (listener) => {
        this.listeners.add(listener);
        return () => {
          this.listeners.delete(listener);
        };
      },
    };
  }

  get tempo(): number {
    return this.tempoBpm;
  }

  /** Names of the undo entries, oldest first. */
  undoNames(): string[] {
    return this.undoStack.map((entry) => entry.name);
  }

  trackNames(): string[] {
    return Array.from(this.tracks.values()).map((track) => track.name);
  }

  /** Current value of a track control by track name, for inspection outside scripts. */
  trackControl(trackName: string, kind: Exclude<ControlKind, 'amount'>): number | undefined {
    const track = this.findTrack(trackName);
    const id = track?.controls[kind];
    return id !== undefined ? this.controlRecords.get(id)?.value : undefined;
  }

  scriptGlobals(): Record<string, unknown> {
    return { session: this.scriptApi() };
  }

  describeState(): string {
    const lines: string[] = [];
    lines.push(`Session: ${this.name}`);
    lines.push(`Tempo: ${this.tempoBpm.toFixed(1)} BPM`);
    lines.push(`Tracks (${String(this.tracks.size)}):`);
    this.tracks.forEach((track) => {
      const value = (kind: ControlKind): number => {
        const id = track.controls[kind];
        return id !== undefined ? (this.controlRecords.get(id)?.value ?? 0) : 0;
      };
      const group = track.group !== undefined ? ` [group: ${track.group}]` : '';
      const plugins = track.plugins
        .map((id) => this.plugins.get(id))
        .filter((plugin): plugin is PluginRecord => plugin !== undefined)
        .map((plugin) => `${plugin.name}(amount=${(this.controlRecords.get(plugin.amountId)?.value ?? 0).toFixed(2)})`);
      const pluginText = plugins.length > 0 ? ` plugins: ${plugins.join(', ')}` : '';
      lines.push(
        `  - ${track.name}${group} gain=${value('gain').toFixed(2)} mute=${onOff(value('mute'))} solo=${onOff(value('solo'))} pan=${value('pan').toFixed(2)}${pluginText}`
      );
    });
    return lines.join('\n');
  }

  capabilityCatalog(): string {
    return ['Available plugins:', ...this.availablePlugins.map((name) => `  - ${name}`)].join('\n');
  }

  private controlView(record: ControlRecord): HostControl {
    return {
      id: record.id,
      hidden: record.hidden,
      getValue: () => this.controlRecords.get(record.id)?.value ?? record.value,
      setValue: (value: number, disposition: GroupDisposition) => {
        this.setControl(record.id, value, disposition);
      },
    };
  }

  private allocateId(prefix: string): string {
    const id = `${prefix}-${String(this.nextId)}`;
    this.nextId += 1;
    return id;
  }

  private addControl(ownerId: string, kind: ControlKind, initial: number): string {
    const range = CONTROL_RANGES[kind];
    const id = `${ownerId}/${kind}`;
    this.controlRecords.set(id, { id, kind, ownerId, hidden: range.hidden, value: initial, min: range.min, max: range.max });
    return id;
  }

  private writeControl(id: string | undefined, value: number): void {
    if (id === undefined) return;
    const record = this.controlRecords.get(id);
    if (record === undefined) return;
    record.value = Math.min(record.max, Math.max(record.min, value));
  }

  private setControl(id: string, value: number, disposition: GroupDisposition): void {
    const record = this.controlRecords.get(id);
    if (record === undefined) throw new HostError(`control '${id}' no longer exists`);
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new HostError(`invalid value for ${record.kind}: ${String(value)}`);
    }
    const owner = this.tracks.get(record.ownerId);
    if (disposition === 'use-group' && owner?.group !== undefined && GROUP_SHARED_KINDS.has(record.kind)) {
      const group = owner.group;
      this.tracks.forEach((track) => {
        if (track.group === group) this.writeControl(track.controls[record.kind], value);
      });
      return;
    }
    this.writeControl(id, value);
  }

  private recordUndoable(name: string, revert: () => void): void {
    if (this.openTransaction !== undefined) {
      this.openTransaction.reverts.push(revert);
      return;
    }
    this.pushUndo({ name, revert });
  }

  private pushUndo(entry: UndoEntry): void {
    this.undoStack.push(entry);
    this.notifyHistory();
  }

  private notifyHistory(): void {
    const depth = this.undoStack.length;
    Array.from(this.listeners).forEach((listener) => {
      listener(depth);
    });
  }

  private findTrack(name: string): TrackRecord | undefined {
    return Array.from(this.tracks.values()).find((track) => track.name === name);
  }

  private requireTrack(id: string): TrackRecord {
    const track = this.tracks.get(id);
    if (track === undefined) throw new HostError(`track '${id}' no longer exists`);
    return track;
  }

  private createTrack(name: string, group?: string): TrackRecord {
    const trimmed = name.trim();
    if (trimmed.length === 0) throw new HostError('track name must not be empty');
    if (this.findTrack(trimmed) !== undefined) throw new HostError(`a track named '${trimmed}' already exists`);
    const id = this.allocateId('track');
    const track: TrackRecord = {
      id,
      name: trimmed,
      group,
      controls: {
        gain: this.addControl(id, 'gain', 1),
        mute: this.addControl(id, 'mute', 0),
        solo: this.addControl(id, 'solo', 0),
        pan: this.addControl(id, 'pan', 0),
        monitor: this.addControl(id, 'monitor', 0),
      },
      plugins: [],
    };
    this.tracks.set(id, track);
    return track;
  }

  private renameTrack(id: string, name: string): void {
    const track = this.requireTrack(id);
    const trimmed = name.trim();
    if (trimmed.length === 0) throw new HostError('track name must not be empty');
    if (trimmed === track.name) return;
    if (this.findTrack(trimmed) !== undefined) throw new HostError(`a track named '${trimmed}' already exists`);
    const previous = track.name;
    track.name = trimmed;
    this.recordUndoable(`rename ${previous}`, () => {
      const current = this.tracks.get(id);
      if (current !== undefined) current.name = previous;
    });
  }

  private setTempo(bpm: number): void {
    if (typeof bpm !== 'number' || !Number.isFinite(bpm) || bpm < MIN_TEMPO || bpm > MAX_TEMPO) {
      throw new HostError(`tempo must be between ${String(MIN_TEMPO)} and ${String(MAX_TEMPO)} BPM`);
    }
    const previous = this.tempoBpm;
    if (previous === bpm) return;
    this.tempoBpm = bpm;
    this.recordUndoable('set tempo', () => {
      this.tempoBpm = previous;
    });
  }

  private addPlugin(trackId: string, name: string): PluginRecord {
    const track = this.requireTrack(trackId);
    const known = this.availablePlugins.find((candidate) => candidate.toLowerCase() === name.trim().toLowerCase());
    if (known === undefined) throw new HostError(`unknown plugin '${name}'`);
    const id = this.allocateId('plugin');
    const plugin: PluginRecord = { id, trackId, name: known, amountId: this.addControl(id, 'amount', 0.5) };
    this.plugins.set(id, plugin);
    track.plugins.push(id);
    return plugin;
  }

  private removeEntities(ids: readonly string[]): void {
    const wanted = new Set(ids);
    wanted.forEach((id) => {
      const plugin = this.plugins.get(id);
      if (plugin === undefined) return;
      this.dropPlugin(plugin);
    });
    wanted.forEach((id) => {
      const track = this.tracks.get(id);
      if (track === undefined) return;
      [...track.plugins].forEach((pluginId) => {
        const plugin = this.plugins.get(pluginId);
        if (plugin !== undefined) this.dropPlugin(plugin);
      });
      Object.values(track.controls).forEach((controlId) => {
        if (controlId !== undefined) this.controlRecords.delete(controlId);
      });
      this.tracks.delete(id);
    });
  }

  private dropPlugin(plugin: PluginRecord): void {
    this.controlRecords.delete(plugin.amountId);
    this.plugins.delete(plugin.id);
    const track = this.tracks.get(plugin.trackId);
    if (track !== undefined) track.plugins = track.plugins.filter((id) => id !== plugin.id);
  }

  private pluginHandle(id: string): PluginHandle {
    const requirePlugin = (): PluginRecord => {
      const plugin = this.plugins.get(id);
      if (plugin === undefined) throw new HostError(`plugin '${id}' no longer exists`);
      return plugin;
    };
    return {
      id: () => id,
      name: () => requirePlugin().name,
      amount: () => this.controlRecords.get(requirePlugin().amountId)?.value ?? 0,
      setAmount: (value) => {
        this.setControl(requirePlugin().amountId, value, 'use-group');
      },
    };
  }

  private trackHandle(id: string): TrackHandle {
    const control = (kind: ControlKind): string => {
      const controlId = this.requireTrack(id).controls[kind];
      if (controlId === undefined) throw new HostError(`track '${id}' has no ${kind} control`);
      return controlId;
    };
    const read = (kind: ControlKind): number => this.controlRecords.get(control(kind))?.value ?? 0;
    const write = (kind: ControlKind, value: number): void => {
      this.setControl(control(kind), value, 'use-group');
    };
    const writeSwitch = (kind: ControlKind, on: boolean): void => {
      if (typeof on !== 'boolean') throw new HostError(`${kind} expects true or false`);
      write(kind, on ? 1 : 0);
    };
    return {
      id: () => id,
      name: () => this.requireTrack(id).name,
      rename: (name) => {
        if (typeof name !== 'string') throw new HostError('track name must be a string');
        this.renameTrack(id, name);
      },
      group: () => this.requireTrack(id).group ?? null,
      gain: () => read('gain'),
      setGain: (value) => {
        write('gain', value);
      },
      mute: () => read('mute') >= 0.5,
      setMute: (on) => {
        writeSwitch('mute', on);
      },
      solo: () => read('solo') >= 0.5,
      setSolo: (on) => {
        writeSwitch('solo', on);
      },
      pan: () => read('pan'),
      setPan: (value) => {
        write('pan', value);
      },
      plugins: () => this.requireTrack(id).plugins.map((pluginId) => this.pluginHandle(pluginId)),
      addPlugin: (name) => {
        if (typeof name !== 'string') throw new HostError('plugin name must be a string');
        return this.pluginHandle(this.addPlugin(id, name).id);
      },
    };
  }

  /** The `session` object handed to commands; also usable directly from host code. */
  scriptApi(): SessionScriptApi {
    return Object.freeze({
      name: () => this.name,
      tempo: () => this.tempoBpm,
      setTempo: (bpm: number) => {
        this.setTempo(bpm);
      },
      tracks: () => Array.from(this.tracks.keys()).map((id) => this.trackHandle(id)),
      track: (name: string) => {
        const track = this.findTrack(name);
        return track !== undefined ? this.trackHandle(track.id) : null;
      },
      addTrack: (name: string) => {
        if (typeof name !== 'string') throw new HostError('track name must be a string');
        return this.trackHandle(this.createTrack(name).id);
      },
      availablePlugins: () => [...this.availablePlugins],
    });
  }
}

export function createDemoSession(): MemorySessionHost {
  return new MemorySessionHost({
    name: 'Demo Session',
    tempo: 120,
    tracks: [
      { name: 'Drums', group: 'Rhythm' },
      { name: 'Bass', group: 'Rhythm', gain: 0.8 },
      { name: 'Guitar', pan: -0.3 },
      { name: 'Vocals', gain: 1.2 },
    ],
  });
}
