/**
 * Course document parser.
 *
 * Expected layout (headers optional, lessons in order):
 *
 * ```
 * Course Title: Python Basics
 * Course Link: https://example.com/python
 * Course Instructor: Ada
 *
 * Lesson 1: Getting Started
 * Lesson Link: https://example.com/python/1
 * Lesson text...
 * ```
 */

import type { Course, CourseChunk, Lesson } from './types.js';

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface ParsedCourse {
  course: Course;
  chunks: CourseChunk[];
}

const HEADER_PATTERNS = {
  title: /^Course Title:\s*(.+)$/i,
  link: /^Course Link:\s*(.+)$/i,
  instructor: /^Course Instructor:\s*(.+)$/i,
};
const LESSON_PATTERN = /^Lesson\s+(\d+):\s*(.*)$/i;
const LESSON_LINK_PATTERN = /^Lesson Link:\s*(.+)$/i;

/**
 * Split prose into sentences on terminal punctuation.
 */
export function splitSentences(text: string): string[] {
  return text
    .replace(/\s+/g, ' ')
    .trim()
    .split(/(?<=[.!?])\s+/)
    .filter(s => s.length > 0);
}

/**
 * Pack sentences into chunks of at most `chunkSize` characters. Each chunk
 * after the first repeats trailing sentences of the previous one, up to
 * `chunkOverlap` characters. A sentence longer than `chunkSize` becomes a
 * chunk of its own.
 */
export function chunkText(text: string, options: ChunkOptions): string[] {
  const sentences = splitSentences(text);
  const chunks: string[] = [];

  let start = 0;
  while (start < sentences.length) {
    const current: string[] = [];
    let length = 0;
    let end = start;

    while (end < sentences.length) {
      const sentence = sentences[end];
      const next = length + (current.length > 0 ? 1 : 0) + sentence.length;
      if (next > options.chunkSize && current.length > 0) break;
      current.push(sentence);
      length = next;
      end++;
    }

    chunks.push(current.join(' '));
    if (end >= sentences.length) break;

    let overlapCount = 0;
    let overlapLength = 0;
    for (let k = current.length - 1; k >= 0; k--) {
      const added = current[k].length + (overlapCount > 0 ? 1 : 0);
      if (overlapLength + added > options.chunkOverlap) break;
      overlapLength += added;
      overlapCount++;
    }

    const nextStart = end - overlapCount;
    start = nextStart > start ? nextStart : end;
  }

  return chunks;
}

interface LessonDraft {
  lesson: Lesson;
  lines: string[];
}

/**
 * Parse a course document into metadata and indexable chunks.
 *
 * The first chunk of every lesson is prefixed with "Lesson <n> content: "
 * so lesson-level questions match it. Text before the first lesson marker
 * (after the headers) is indexed without a lesson number.
 */
export function parseCourseDocument(
  text: string,
  options: ChunkOptions & { fallbackTitle: string }
): ParsedCourse {
  const course: Course = { title: options.fallbackTitle, lessons: [] };
  const preamble: string[] = [];
  const drafts: LessonDraft[] = [];
  let current: LessonDraft | null = null;
  let expectLessonLink = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (!current) {
      const title = line.match(HEADER_PATTERNS.title);
      if (title) { course.title = title[1].trim(); continue; }
      const link = line.match(HEADER_PATTERNS.link);
      if (link) { course.link = link[1].trim(); continue; }
      const instructor = line.match(HEADER_PATTERNS.instructor);
      if (instructor) { course.instructor = instructor[1].trim(); continue; }
    }

    const lessonMatch = line.match(LESSON_PATTERN);
    if (lessonMatch) {
      current = {
        lesson: { lessonNumber: parseInt(lessonMatch[1], 10), title: lessonMatch[2].trim() },
        lines: [],
      };
      drafts.push(current);
      expectLessonLink = true;
      continue;
    }

    if (current && expectLessonLink && line) {
      expectLessonLink = false;
      const linkMatch = line.match(LESSON_LINK_PATTERN);
      if (linkMatch) {
        current.lesson.link = linkMatch[1].trim();
        continue;
      }
    }

    (current ? current.lines : preamble).push(line);
  }

  const chunks: CourseChunk[] = [];
  let chunkIndex = 0;

  for (const piece of chunkText(preamble.join('\n'), options)) {
    chunks.push({ content: piece, courseTitle: course.title, chunkIndex: chunkIndex++ });
  }

  for (const draft of drafts) {
    course.lessons.push(draft.lesson);
    const { lessonNumber } = draft.lesson;
    chunkText(draft.lines.join('\n'), options).forEach((piece, i) => {
      chunks.push({
        content: i === 0 ? `Lesson ${lessonNumber} content: ${piece}` : piece,
        courseTitle: course.title,
        lessonNumber,
        chunkIndex: chunkIndex++,
      });
    });
  }

  return { course, chunks };
}
