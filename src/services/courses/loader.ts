/**
 * Loads course documents from a folder into the course store.
 */

import fs from 'fs/promises';
import path from 'path';
import type { CourseStore } from './types.js';
import { parseCourseDocument, type ChunkOptions } from './parser.js';
import { createLogger } from '../../utils/observability/index.js';
import { errorMessage } from '../../utils/errors.js';

const logger = createLogger({ domain: 'course-loader' });

const COURSE_FILE_PATTERN = /\.txt$/i;

export interface LoadSummary {
  /** Courses newly indexed */
  courses: number;
  /** Chunks written for those courses */
  chunks: number;
}

/**
 * Index every `.txt` course document in `dir`, skipping courses whose
 * title is already indexed. Files that fail to read or parse are logged
 * and skipped. A missing folder loads nothing.
 */
export async function loadCourseFolder(
  dir: string,
  store: CourseStore,
  options: ChunkOptions
): Promise<LoadSummary> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    logger.warn('course_folder_unavailable', { dir, error: errorMessage(error) });
    return { courses: 0, chunks: 0 };
  }

  const existing = new Set(await store.listCourseTitles());
  const summary: LoadSummary = { courses: 0, chunks: 0 };

  for (const file of entries.filter(f => COURSE_FILE_PATTERN.test(f)).sort()) {
    const filePath = path.join(dir, file);
    try {
      const text = await fs.readFile(filePath, 'utf-8');
      const { course, chunks } = parseCourseDocument(text, {
        ...options,
        fallbackTitle: path.basename(file, path.extname(file)),
      });

      if (existing.has(course.title)) {
        logger.debug('course_already_indexed', { file, courseTitle: course.title });
        continue;
      }

      await store.addCourse(course, chunks);
      existing.add(course.title);
      summary.courses += 1;
      summary.chunks += chunks.length;
    } catch (error) {
      logger.error('course_load_failed', { file, error: errorMessage(error) });
    }
  }

  logger.info('course_folder_loaded', { dir, ...summary });
  return summary;
}
