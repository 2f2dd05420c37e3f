/**
 * Course outline tool. Reports structure, not content, so it records no
 * sources.
 */

import type { Capability, ToolSchema } from './types.js';
import type { CourseOutline, CourseStore } from '../services/courses/types.js';
import { readString } from './utils.js';

export const OUTLINE_TOOL_NAME = 'get_course_outline';

const schema: ToolSchema = {
  name: OUTLINE_TOOL_NAME,
  description: 'Get the outline of a course: its title, link and the complete numbered lesson list',
  input_schema: {
    type: 'object',
    properties: {
      course_name: {
        type: 'string',
        description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
      },
    },
    required: ['course_name'],
  },
};

export function formatOutline(outline: CourseOutline): string {
  const lines = [`Course: ${outline.title}`];
  if (outline.link) lines.push(`Link: ${outline.link}`);
  lines.push('Lessons:');

  if (outline.lessons.length === 0) {
    lines.push('(no lessons listed)');
  }
  for (const lesson of outline.lessons) {
    const link = lesson.link ? ` (${lesson.link})` : '';
    lines.push(`- Lesson ${lesson.lessonNumber}: ${lesson.title}${link}`);
  }
  return lines.join('\n');
}

export class CourseOutlineTool implements Capability {
  readonly schema = schema;

  constructor(private readonly store: CourseStore) {}

  async execute(input: Record<string, unknown>): Promise<string> {
    const courseName = readString(input, 'course_name', { trim: true }) ?? '';
    const outline = courseName ? await this.store.courseOutline(courseName) : null;

    if (!outline) {
      return `No course found matching '${courseName}'.`;
    }
    return formatOutline(outline);
  }
}
