/**
 * Course content search tool.
 */

import type { Capability, EvidentiarySource, ToolSchema } from './types.js';
import type { CourseStore, Passage } from '../services/courses/types.js';
import { readInteger, readString } from './utils.js';

export const SEARCH_TOOL_NAME = 'search_course_content';

/** Label used when a passage carries no course metadata. */
const UNKNOWN_COURSE = 'unknown';

const schema: ToolSchema = {
  name: SEARCH_TOOL_NAME,
  description: 'Search course materials with smart course name matching and lesson filtering',
  input_schema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'What to search for in the course content',
      },
      course_name: {
        type: 'string',
        description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
      },
      lesson_number: {
        type: 'integer',
        description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
      },
    },
    required: ['query'],
  },
};

/**
 * Build the "nothing found" message, naming whichever filters were active.
 */
export function noResultsMessage(courseName?: string, lessonNumber?: number): string {
  let filters = '';
  if (courseName) filters += ` in course '${courseName}'`;
  if (lessonNumber !== undefined) filters += ` in lesson ${lessonNumber}`;
  return `No relevant content found${filters}.`;
}

function headerFor(passage: Passage): string {
  const course = passage.courseTitle || UNKNOWN_COURSE;
  return passage.lessonNumber !== undefined
    ? `${course} - Lesson ${passage.lessonNumber}`
    : course;
}

/**
 * Searches indexed passages and remembers their sources for citation.
 */
export class CourseSearchTool implements Capability {
  readonly schema = schema;
  lastSources: EvidentiarySource[] = [];

  constructor(private readonly store: CourseStore) {}

  async execute(input: Record<string, unknown>): Promise<string> {
    const query = readString(input, 'query') ?? '';
    const courseName = readString(input, 'course_name', { trim: true });
    const lessonNumber = readInteger(input, 'lesson_number');

    const results = await this.store.search(query, courseName, lessonNumber);

    if (results.error) {
      this.lastSources = [];
      return results.error;
    }

    if (results.passages.length === 0) {
      this.lastSources = [];
      return noResultsMessage(courseName, lessonNumber);
    }

    return this.formatResults(results.passages);
  }

  private async formatResults(passages: Passage[]): Promise<string> {
    const blocks: string[] = [];
    const sources: EvidentiarySource[] = [];

    for (const passage of passages) {
      const header = headerFor(passage);
      blocks.push(`[${header}]\n${passage.text}`);

      const url = passage.courseTitle && passage.lessonNumber !== undefined
        ? await this.store.lessonLink(passage.courseTitle, passage.lessonNumber)
        : undefined;
      sources.push(url ? { text: header, url } : { text: header });
    }

    this.lastSources = sources;
    return blocks.join('\n\n');
  }
}
