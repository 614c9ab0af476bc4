import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { Configuration } from './types.js';

import { parseConfiguration } from './config.js';
import { ConfigError } from './errors.js';
import { isPlainObject } from './utils.js';

export type LayerOrigin = '--config' | 'cwd' | 'home';

export interface ResolvedConfigLayer {
  origin: LayerOrigin;
  jsonPath: string; // may not exist
  json?: Record<string, unknown>;
}

export interface ResolveOptions {
  configPath?: string;
  cwd?: string;
  home?: string;
  env?: Record<string, string | undefined>;
}

export const API_KEY_ENV = 'ANTHROPIC_API_KEY';
export const API_KEY_FILE = 'anthropic_api_key';
const HIDDEN_JSON = '.session-copilot.json';
const APP_DIR = 'session-copilot';

export function configDir(home: string = os.homedir()): string {
  return path.join(home, '.config', APP_DIR);
}

function readJSONIfExists(p: string, required: boolean): Record<string, unknown> | undefined {
  if (!fs.existsSync(p)) {
    if (required) throw new ConfigError(`Configuration file not found: ${p}`);
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(p, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Invalid JSON in configuration file ${p}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Configuration file ${p} must contain a JSON object`);
  }
  return parsed;
}

/** Configuration layers, highest priority first. */
export function discoverLayers(opts: ResolveOptions = {}): ResolvedConfigLayer[] {
  const cwd = opts.cwd ?? process.cwd();
  const home = opts.home ?? os.homedir();
  const list: { origin: LayerOrigin; json: string }[] = [];

  if (typeof opts.configPath === 'string' && opts.configPath.length > 0) {
    list.push({ origin: '--config', json: path.resolve(cwd, opts.configPath) });
  }
  list.push({ origin: 'cwd', json: path.join(cwd, HIDDEN_JSON) });
  if (home.length > 0) {
    list.push({ origin: 'home', json: path.join(configDir(home), 'config.json') });
  }

  return list.map((it) => ({
    origin: it.origin,
    jsonPath: it.json,
    json: readJSONIfExists(it.json, it.origin === '--config'),
  }));
}

function deepMerge(base: Record<string, unknown>, overlay: Record<string, unknown>): Record<string, unknown> {
  return Object.entries(overlay).reduce<Record<string, unknown>>((acc, [key, value]) => {
    const existing = acc[key];
    acc[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
    return acc;
  }, { ...base });
}

/** Merges layers so that, per key, the highest-priority layer that sets it wins. */
export function mergeLayers(layers: readonly ResolvedConfigLayer[]): Record<string, unknown> {
  return [...layers].reverse().reduce<Record<string, unknown>>(
    (acc, layer) => (layer.json !== undefined ? deepMerge(acc, layer.json) : acc),
    {}
  );
}

export function resolveConfiguration(opts: ResolveOptions = {}): { config: Configuration; layers: ResolvedConfigLayer[] } {
  const layers = discoverLayers(opts);
  const sources = layers.filter((layer) => layer.json !== undefined).map((layer) => layer.jsonPath);
  const source = sources.length > 0 ? sources.join(', ') : 'defaults';
  const config = parseConfiguration(mergeLayers(layers), source, opts.env ?? process.env);
  return { config, layers };
}

function readKeyFile(filePath: string): string | undefined {
  if (!fs.existsSync(filePath)) return undefined;
  const firstLine = fs.readFileSync(filePath, 'utf-8').split(/\r?\n/)[0] ?? '';
  const key = firstLine.trim();
  return key.length > 0 ? key : undefined;
}

/**
 * API key lookup: environment, then the configuration, then the first line of
 * `<configDir>/anthropic_api_key`.
 */
export function resolveApiKey(
  config: Configuration,
  opts: { env?: Record<string, string | undefined>; home?: string } = {}
): string | undefined {
  const env = opts.env ?? process.env;
  const fromEnv = env[API_KEY_ENV]?.trim();
  if (fromEnv !== undefined && fromEnv.length > 0) return fromEnv;
  if (config.provider.apiKey !== undefined && config.provider.apiKey.length > 0) return config.provider.apiKey;
  return readKeyFile(path.join(configDir(opts.home), API_KEY_FILE));
}
