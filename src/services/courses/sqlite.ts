/**
 * @fileoverview SQLite course store.
 *
 * Keyword retrieval over lesson chunks with an FTS5 table ranked by bm25,
 * alongside plain tables for course and lesson metadata. Course names from
 * the model are resolved loosely: exact title, then substring, then the
 * title sharing the most words.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type {
  Course,
  CourseChunk,
  CourseOutline,
  CourseStore,
  Lesson,
  Passage,
  SearchResults,
} from './types.js';
import { createLogger } from '../../utils/observability/index.js';
import { errorMessage } from '../../utils/errors.js';

const logger = createLogger({ domain: 'course-store' });

type ChunkRow = {
  content: string;
  courseTitle: string | null;
  lessonNumber: number | string | null;
};

type LessonRow = {
  lessonNumber: number;
  title: string;
  link: string | null;
};

/**
 * Lower-cased word tokens, as FTS5's unicode61 tokenizer would see them.
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * FTS5 MATCH expression: any of the query's words, each quoted so user
 * text can never be read as query syntax.
 */
export function toMatchExpression(query: string): string | null {
  const tokens = [...new Set(tokenize(query))];
  if (tokens.length === 0) return null;
  return tokens.map(t => `"${t}"`).join(' OR ');
}

function toLesson(row: LessonRow): Lesson {
  return row.link
    ? { lessonNumber: row.lessonNumber, title: row.title, link: row.link }
    : { lessonNumber: row.lessonNumber, title: row.title };
}

function toPassage(row: ChunkRow): Passage {
  const passage: Passage = { text: row.content };
  if (row.courseTitle) passage.courseTitle = row.courseTitle;
  if (row.lessonNumber !== null && row.lessonNumber !== '') {
    passage.lessonNumber = Number(row.lessonNumber);
  }
  return passage;
}

export class SqliteCourseStore implements CourseStore {
  private db: Database.Database;

  constructor(
    dbPath: string,
    private readonly maxResults: number = 5
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
      CREATE TABLE IF NOT EXISTS courses (
        title TEXT PRIMARY KEY,
        link TEXT,
        instructor TEXT
      );

      CREATE TABLE IF NOT EXISTS lessons (
        course_title TEXT NOT NULL,
        lesson_number INTEGER NOT NULL,
        title TEXT NOT NULL,
        link TEXT,
        PRIMARY KEY (course_title, lesson_number)
      );

      CREATE VIRTUAL TABLE IF NOT EXISTS course_chunks USING fts5(
        content,
        course_title UNINDEXED,
        lesson_number UNINDEXED,
        chunk_index UNINDEXED,
        tokenize = 'porter unicode61'
      );
    `);
  }

  /**
   * Best matching course title for a loose name, or null.
   */
  resolveCourseTitle(name: string): string | null {
    const trimmed = name.trim();
    if (!trimmed) return null;

    const exact = this.db
      .prepare(`SELECT title FROM courses WHERE title = ? COLLATE NOCASE`)
      .get(trimmed) as { title: string } | undefined;
    if (exact) return exact.title;

    const partial = this.db
      .prepare(
        `SELECT title FROM courses
         WHERE instr(lower(title), lower(?)) > 0
         ORDER BY length(title), title
         LIMIT 1`
      )
      .get(trimmed) as { title: string } | undefined;
    if (partial) return partial.title;

    const wanted = new Set(tokenize(trimmed));
    let best: { title: string; score: number } | null = null;
    for (const title of this.titles()) {
      const score = tokenize(title).filter(t => wanted.has(t)).length;
      if (score > 0 && (!best || score > best.score)) {
        best = { title, score };
      }
    }
    return best?.title ?? null;
  }

  async search(query: string, courseName?: string, lessonNumber?: number): Promise<SearchResults> {
    try {
      let courseTitle: string | null = null;
      if (courseName) {
        courseTitle = this.resolveCourseTitle(courseName);
        if (!courseTitle) {
          return { passages: [], error: `No course found matching '${courseName}'` };
        }
      }

      const match = toMatchExpression(query);
      if (!match) {
        return { passages: [] };
      }

      const rows = this.db
        .prepare(
          `SELECT content, course_title AS courseTitle, lesson_number AS lessonNumber
           FROM course_chunks
           WHERE course_chunks MATCH @match
             AND (@course IS NULL OR course_title = @course)
             AND (@lesson IS NULL OR CAST(lesson_number AS INTEGER) = @lesson)
           ORDER BY rank
           LIMIT @limit`
        )
        .all({
          match,
          course: courseTitle,
          lesson: lessonNumber ?? null,
          limit: this.maxResults,
        }) as ChunkRow[];

      return { passages: rows.map(toPassage) };
    } catch (error) {
      logger.error('course_search_failed', { error: errorMessage(error) });
      return { passages: [], error: `Search error: ${errorMessage(error)}` };
    }
  }

  async lessonLink(courseTitle: string, lessonNumber: number): Promise<string | undefined> {
    const row = this.db
      .prepare(`SELECT link FROM lessons WHERE course_title = ? AND lesson_number = ?`)
      .get(courseTitle, lessonNumber) as { link: string | null } | undefined;
    return row?.link ?? undefined;
  }

  async courseOutline(courseName: string): Promise<CourseOutline | null> {
    const title = this.resolveCourseTitle(courseName);
    if (!title) return null;

    const course = this.db
      .prepare(`SELECT title, link FROM courses WHERE title = ?`)
      .get(title) as { title: string; link: string | null } | undefined;
    if (!course) return null;

    const lessons = this.db
      .prepare(
        `SELECT lesson_number AS lessonNumber, title, link
         FROM lessons WHERE course_title = ?
         ORDER BY lesson_number`
      )
      .all(title) as LessonRow[];

    const outline: CourseOutline = { title: course.title, lessons: lessons.map(toLesson) };
    if (course.link) outline.link = course.link;
    return outline;
  }

  async addCourse(course: Course, chunks: CourseChunk[]): Promise<void> {
    const replace = this.db.transaction(() => {
      this.db.prepare(`DELETE FROM course_chunks WHERE course_title = ?`).run(course.title);
      this.db.prepare(`DELETE FROM lessons WHERE course_title = ?`).run(course.title);
      this.db.prepare(`DELETE FROM courses WHERE title = ?`).run(course.title);

      this.db
        .prepare(`INSERT INTO courses (title, link, instructor) VALUES (?, ?, ?)`)
        .run(course.title, course.link ?? null, course.instructor ?? null);

      const insertLesson = this.db.prepare(
        `INSERT OR REPLACE INTO lessons (course_title, lesson_number, title, link)
         VALUES (?, ?, ?, ?)`
      );
      for (const lesson of course.lessons) {
        insertLesson.run(course.title, lesson.lessonNumber, lesson.title, lesson.link ?? null);
      }

      const insertChunk = this.db.prepare(
        `INSERT INTO course_chunks (content, course_title, lesson_number, chunk_index)
         VALUES (?, ?, ?, ?)`
      );
      for (const chunk of chunks) {
        insertChunk.run(chunk.content, chunk.courseTitle, chunk.lessonNumber ?? null, chunk.chunkIndex);
      }
    });
    replace();

    logger.info('course_indexed', {
      courseTitle: course.title,
      lessons: course.lessons.length,
      chunks: chunks.length,
    });
  }

  async listCourseTitles(): Promise<string[]> {
    return this.titles();
  }

  private titles(): string[] {
    const rows = this.db
      .prepare(`SELECT title FROM courses ORDER BY title`)
      .all() as Array<{ title: string }>;
    return rows.map(r => r.title);
  }

  close(): void {
    this.db.close();
  }
}
