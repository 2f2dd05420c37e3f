/**
 * @fileoverview Session store factory.
 *
 * Returns the configured session store (memory or sqlite).
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config from '../../config.js';
import type { SessionStore } from './types.js';
import { MemorySessionStore } from './memory.js';
import { SqliteSessionStore } from './sqlite.js';

export type { SessionStore, Exchange } from './types.js';
export { formatHistory } from './types.js';
export { MemorySessionStore } from './memory.js';
export { SqliteSessionStore } from './sqlite.js';

let instance: MemorySessionStore | SqliteSessionStore | null = null;

export function getSessionStore(): SessionStore {
  if (instance) {
    return instance;
  }

  instance = config.sessions.provider === 'sqlite'
    ? new SqliteSessionStore(config.sessions.sqlitePath, config.sessions.maxHistory)
    : new MemorySessionStore(config.sessions.maxHistory);
  return instance;
}

/**
 * Close the session store.
 * Call this during graceful shutdown.
 */
export function closeSessionStore(): void {
  if (instance instanceof SqliteSessionStore) {
    instance.close();
  }
  instance = null;
}

/**
 * Reset the session store instance.
 * Useful for tests.
 */
export function resetSessionStore(): void {
  instance = null;
}
