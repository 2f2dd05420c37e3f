/**
 * Unit tests for the configured store singletons.
 */

import { afterEach, describe, expect, it } from 'vitest';
import {
  MemorySessionStore,
  getSessionStore,
  resetSessionStore,
} from '../../../src/services/sessions/index.js';
import {
  SqliteCourseStore,
  closeCourseStore,
  getCourseStore,
} from '../../../src/services/courses/index.js';

afterEach(() => {
  resetSessionStore();
  closeCourseStore();
});

describe('getSessionStore', () => {
  it('returns the configured memory store as a singleton', () => {
    const store = getSessionStore();

    expect(store).toBeInstanceOf(MemorySessionStore);
    expect(getSessionStore()).toBe(store);
  });

  it('builds a new instance after reset', () => {
    const first = getSessionStore();
    resetSessionStore();

    expect(getSessionStore()).not.toBe(first);
  });
});

describe('getCourseStore', () => {
  it('opens the configured SQLite store once', async () => {
    const store = getCourseStore();

    expect(store).toBeInstanceOf(SqliteCourseStore);
    expect(getCourseStore()).toBe(store);
    expect(await store.listCourseTitles()).toEqual([]);
  });

  it('opens a fresh store after close', () => {
    const first = getCourseStore();
    closeCourseStore();

    expect(getCourseStore()).not.toBe(first);
  });
});
