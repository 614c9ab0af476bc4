import type { LogEntry } from '../types.js';

// Registry of stable MESSAGE_IDs (UUIDs) for well-known log events.
// Each ID should remain stable across releases.
const MESSAGE_ID_REGISTRY: Partial<Record<string, string>> = {
  'session:start': '3f0b8a52-5d7e-4c61-9a53-1e2f4b6c7d80',
  'session:finish': '9c4e2d17-8b3a-4f05-a6d1-7e5b3c2a1f94',
  'session:undo': 'b7a1c3e9-2d4f-4e68-8a0b-5c6d7e8f9a1b',
  'ledger:rollback': 'e2d4f6a8-1b3c-4d5e-9f70-8a9b0c1d2e3f',
  'executor:fault': '5a6b7c8d-9e0f-4a1b-8c2d-3e4f5a6b7c8d',
};

export function resolveMessageId(entry: LogEntry): string | undefined {
  const key = `${entry.remoteIdentifier}:${entry.details?.event ?? ''}`;
  return MESSAGE_ID_REGISTRY[key];
}

export function getRegisteredMessageIds(): Record<string, string | undefined> {
  return { ...MESSAGE_ID_REGISTRY };
}
