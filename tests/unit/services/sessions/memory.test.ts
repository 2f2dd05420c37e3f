/**
 * Unit tests for the in-memory session store.
 */

import { describe, it, expect } from 'vitest';
import { MemorySessionStore } from '../../../../src/services/sessions/memory.js';
import { formatHistory } from '../../../../src/services/sessions/types.js';

describe('MemorySessionStore', () => {
  it('creates sequential session ids', async () => {
    const store = new MemorySessionStore(2);

    expect(await store.createSession()).toBe('session_1');
    expect(await store.createSession()).toBe('session_2');
  });

  it('has no history for a new or unknown session', async () => {
    const store = new MemorySessionStore(2);
    const id = await store.createSession();

    expect(await store.historyFor(id)).toBeUndefined();
    expect(await store.historyFor('session_missing')).toBeUndefined();
  });

  it('keeps only the most recent exchanges', async () => {
    const store = new MemorySessionStore(2);
    const id = await store.createSession();

    await store.append(id, 'q1', 'a1');
    await store.append(id, 'q2', 'a2');
    await store.append(id, 'q3', 'a3');

    expect(await store.historyFor(id)).toBe('User: q2\nAssistant: a2\nUser: q3\nAssistant: a3');
  });

  it('retains nothing when maxHistory is 0', async () => {
    const store = new MemorySessionStore(0);
    const id = await store.createSession();

    await store.append(id, 'q1', 'a1');

    expect(await store.historyFor(id)).toBeUndefined();
  });

  it('starts a session on append to an unknown id', async () => {
    const store = new MemorySessionStore(2);

    await store.append('client-chosen', 'q', 'a');

    expect(await store.historyFor('client-chosen')).toBe('User: q\nAssistant: a');
  });

  it('clears a single session or all of them', async () => {
    const store = new MemorySessionStore(2);
    await store.append('one', 'q', 'a');
    await store.append('two', 'q', 'a');

    await store.clearSession('one');
    expect(await store.historyFor('one')).toBeUndefined();
    expect(await store.historyFor('two')).toBeDefined();

    store.clear();
    expect(await store.historyFor('two')).toBeUndefined();
  });
});

describe('formatHistory', () => {
  it('is undefined for no exchanges', () => {
    expect(formatHistory([])).toBeUndefined();
  });
});
