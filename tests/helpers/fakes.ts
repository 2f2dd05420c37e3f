/**
 * In-process stand-ins for the assistant's collaborators.
 */

import { vi } from 'vitest';
import type {
  ContentBlock,
  ModelProvider,
  ModelReply,
  ModelRequest,
} from '../../src/llm/types.js';
import type {
  Course,
  CourseChunk,
  CourseOutline,
  CourseStore,
  SearchResults,
} from '../../src/services/courses/types.js';

// ============================================================================
// Model replies
// ============================================================================

export function textReply(text: string): ModelReply {
  return { stopReason: 'end_turn', content: [{ type: 'text', text }] };
}

export function toolReply(
  name: string,
  input: Record<string, unknown>,
  id = 'toolu_1',
  text?: string
): ModelReply {
  const content: ContentBlock[] = text ? [{ type: 'text', text }] : [];
  content.push({ type: 'tool_use', id, name, input });
  return { stopReason: 'tool_use', content };
}

/**
 * Provider that returns queued replies in order and records every request.
 * Requests are copied on arrival so later transcript growth is not visible.
 */
export class ScriptedProvider implements ModelProvider {
  readonly requests: ModelRequest[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];
  private replies: Array<ModelReply | Error>;

  constructor(replies: Array<ModelReply | Error> = []) {
    this.replies = [...replies];
  }

  createMessage = vi.fn(async (request: ModelRequest, signal?: AbortSignal): Promise<ModelReply> => {
    this.requests.push({ ...request, transcript: [...request.transcript] });
    this.signals.push(signal);
    const next = this.replies.shift();
    if (next instanceof Error) throw next;
    return next ?? textReply('Scripted default');
  });
}

// ============================================================================
// Course store
// ============================================================================

/**
 * CourseStore with canned search outcomes. Outline and link lookups read
 * from the courses passed to `addCourse`.
 */
export class FakeCourseStore implements CourseStore {
  readonly searchCalls: Array<{ query: string; courseName?: string; lessonNumber?: number }> = [];
  searchResult: SearchResults | Error = { passages: [] };
  private courses = new Map<string, Course>();

  constructor(courses: Course[] = []) {
    for (const course of courses) this.courses.set(course.title, course);
  }

  async search(query: string, courseName?: string, lessonNumber?: number): Promise<SearchResults> {
    this.searchCalls.push({ query, courseName, lessonNumber });
    if (this.searchResult instanceof Error) throw this.searchResult;
    return this.searchResult;
  }

  async lessonLink(courseTitle: string, lessonNumber: number): Promise<string | undefined> {
    return this.courses
      .get(courseTitle)
      ?.lessons.find(l => l.lessonNumber === lessonNumber)?.link;
  }

  async courseOutline(courseName: string): Promise<CourseOutline | null> {
    const wanted = courseName.toLowerCase();
    const course = [...this.courses.values()].find(c => c.title.toLowerCase().includes(wanted));
    if (!course) return null;
    return course.link
      ? { title: course.title, link: course.link, lessons: course.lessons }
      : { title: course.title, lessons: course.lessons };
  }

  async addCourse(course: Course, _chunks: CourseChunk[]): Promise<void> {
    this.courses.set(course.title, course);
  }

  async listCourseTitles(): Promise<string[]> {
    return [...this.courses.keys()].sort();
  }
}

export const SAMPLE_COURSE: Course = {
  title: 'Building Retrieval Systems',
  link: 'https://courses.example.com/retrieval',
  instructor: 'Test Instructor',
  lessons: [
    { lessonNumber: 0, title: 'Introduction', link: 'https://courses.example.com/retrieval/0' },
    { lessonNumber: 1, title: 'Chunking Text', link: 'https://courses.example.com/retrieval/1' },
    { lessonNumber: 2, title: 'Ranking Results' },
  ],
};
