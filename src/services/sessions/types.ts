/**
 * Session Service Types
 *
 * Append-only exchange log per session, trimmed to the most recent
 * exchanges and rendered as plain text for the system prompt.
 */

/**
 * One question and the answer given to it.
 */
export interface Exchange {
  query: string;
  answer: string;
}

export interface SessionStore {
  /** Start an empty session and return its id. */
  createSession(): Promise<string>;

  /**
   * Retained exchanges as text, oldest first, or undefined when the session
   * is unknown or has nothing retained.
   */
  historyFor(sessionId: string): Promise<string | undefined>;

  /**
   * Record an exchange. Unknown ids start a new session. Exchanges beyond
   * the retention limit are dropped, oldest first.
   */
  append(sessionId: string, query: string, answer: string): Promise<void>;

  /** Drop a session and its history. */
  clearSession(sessionId: string): Promise<void>;
}

/**
 * Render exchanges the way the model sees them.
 */
export function formatHistory(exchanges: Exchange[]): string | undefined {
  if (exchanges.length === 0) return undefined;
  return exchanges
    .map(e => `User: ${e.query}\nAssistant: ${e.answer}`)
    .join('\n');
}
