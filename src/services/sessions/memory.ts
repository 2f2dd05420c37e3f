/**
 * @fileoverview In-memory session store.
 *
 * Default provider. Data is lost on process restart.
 */

import type { Exchange, SessionStore } from './types.js';
import { formatHistory } from './types.js';

export class MemorySessionStore implements SessionStore {
  private sessions = new Map<string, Exchange[]>();
  private counter = 0;

  constructor(private readonly maxHistory: number) {}

  async createSession(): Promise<string> {
    this.counter += 1;
    const id = `session_${this.counter}`;
    this.sessions.set(id, []);
    return id;
  }

  async historyFor(sessionId: string): Promise<string | undefined> {
    return formatHistory(this.sessions.get(sessionId) ?? []);
  }

  async append(sessionId: string, query: string, answer: string): Promise<void> {
    const exchanges = this.sessions.get(sessionId) ?? [];
    exchanges.push({ query, answer });
    this.sessions.set(sessionId, this.maxHistory > 0 ? exchanges.slice(-this.maxHistory) : []);
  }

  async clearSession(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  /** Clear all sessions. Useful for test cleanup. */
  clear(): void {
    this.sessions.clear();
  }
}
