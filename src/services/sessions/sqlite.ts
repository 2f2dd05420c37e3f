/**
 * @fileoverview SQLite session store.
 *
 * Persists exchanges so sessions survive restarts. Retention is enforced on
 * write: after each append, rows older than the newest `maxHistory` are
 * deleted.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { randomUUID } from 'crypto';
import type { Exchange, SessionStore } from './types.js';
import { formatHistory } from './types.js';

export class SqliteSessionStore implements SessionStore {
  private db: Database.Database;

  constructor(
    dbPath: string,
    private readonly maxHistory: number
  ) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS session_exchanges (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        query TEXT NOT NULL,
        answer TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_exchanges_session
        ON session_exchanges(session_id, id);
    `);
  }

  async createSession(): Promise<string> {
    const id = `session_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
    this.db
      .prepare(`INSERT INTO sessions (id, created_at) VALUES (?, ?)`)
      .run(id, Date.now());
    return id;
  }

  async historyFor(sessionId: string): Promise<string | undefined> {
    if (this.maxHistory <= 0) return undefined;

    const rows = this.db
      .prepare(
        `SELECT query, answer FROM session_exchanges
         WHERE session_id = ?
         ORDER BY id DESC
         LIMIT ?`
      )
      .all(sessionId, this.maxHistory) as Exchange[];

    return formatHistory(rows.reverse());
  }

  async append(sessionId: string, query: string, answer: string): Promise<void> {
    const now = Date.now();
    const write = this.db.transaction(() => {
      this.db
        .prepare(`INSERT OR IGNORE INTO sessions (id, created_at) VALUES (?, ?)`)
        .run(sessionId, now);
      this.db
        .prepare(
          `INSERT INTO session_exchanges (session_id, query, answer, created_at)
           VALUES (?, ?, ?, ?)`
        )
        .run(sessionId, query, answer, now);
      this.db
        .prepare(
          `DELETE FROM session_exchanges
           WHERE session_id = ?
             AND id NOT IN (
               SELECT id FROM session_exchanges
               WHERE session_id = ?
               ORDER BY id DESC
               LIMIT ?
             )`
        )
        .run(sessionId, sessionId, Math.max(this.maxHistory, 0));
    });
    write();
  }

  async clearSession(sessionId: string): Promise<void> {
    const remove = this.db.transaction(() => {
      this.db.prepare(`DELETE FROM session_exchanges WHERE session_id = ?`).run(sessionId);
      this.db.prepare(`DELETE FROM sessions WHERE id = ?`).run(sessionId);
    });
    remove();
  }

  close(): void {
    this.db.close();
  }
}
