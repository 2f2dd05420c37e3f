/**
 * @fileoverview Course store factory.
 *
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config from '../../config.js';
import type { CourseStore } from './types.js';
import { SqliteCourseStore } from './sqlite.js';

export type {
  Course,
  CourseChunk,
  CourseOutline,
  CourseStore,
  Lesson,
  Passage,
  SearchResults,
} from './types.js';
export { SqliteCourseStore } from './sqlite.js';
export { parseCourseDocument, chunkText, splitSentences } from './parser.js';
export { loadCourseFolder, type LoadSummary } from './loader.js';

let instance: SqliteCourseStore | null = null;

export function getCourseStore(): CourseStore {
  if (instance) {
    return instance;
  }

  instance = new SqliteCourseStore(config.courses.sqlitePath, config.courses.maxResults);
  return instance;
}

/**
 * Close the course store.
 * Call this during graceful shutdown.
 */
export function closeCourseStore(): void {
  if (instance) {
    instance.close();
    instance = null;
  }
}
