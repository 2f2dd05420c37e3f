/**
 * Unit tests for the course search tool.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CourseSearchTool, noResultsMessage } from '../../../src/tools/search.js';
import { FakeCourseStore, SAMPLE_COURSE } from '../../helpers/fakes.js';

describe('CourseSearchTool', () => {
  let store: FakeCourseStore;
  let tool: CourseSearchTool;

  beforeEach(() => {
    store = new FakeCourseStore([SAMPLE_COURSE]);
    tool = new CourseSearchTool(store);
  });

  it('declares the search schema', () => {
    expect(tool.schema.name).toBe('search_course_content');
    expect(tool.schema.input_schema.required).toEqual(['query']);
    expect(Object.keys(tool.schema.input_schema.properties)).toEqual(['query', 'course_name', 'lesson_number']);
  });

  it('passes filters through to the store', async () => {
    await tool.execute({ query: 'ranking', course_name: '  Retrieval ', lesson_number: 2 });

    expect(store.searchCalls).toEqual([{ query: 'ranking', courseName: 'Retrieval', lessonNumber: 2 }]);
  });

  it('accepts a quoted lesson number', async () => {
    await tool.execute({ query: 'ranking', lesson_number: '1' });

    expect(store.searchCalls[0].lessonNumber).toBe(1);
  });

  it('formats passages with headers and records sources', async () => {
    store.searchResult = {
      passages: [
        { text: 'Chunks are windows of text.', courseTitle: 'Building Retrieval Systems', lessonNumber: 1 },
        { text: 'BM25 scores terms.', courseTitle: 'Building Retrieval Systems', lessonNumber: 2 },
      ],
    };

    const output = await tool.execute({ query: 'chunks' });

    expect(output).toBe(
      '[Building Retrieval Systems - Lesson 1]\nChunks are windows of text.\n\n' +
      '[Building Retrieval Systems - Lesson 2]\nBM25 scores terms.'
    );
    expect(tool.lastSources).toEqual([
      { text: 'Building Retrieval Systems - Lesson 1', url: 'https://courses.example.com/retrieval/1' },
      { text: 'Building Retrieval Systems - Lesson 2' },
    ]);
  });

  it('labels passages without metadata as unknown', async () => {
    store.searchResult = { passages: [{ text: 'Orphan text.' }] };

    const output = await tool.execute({ query: 'orphan' });

    expect(output).toBe('[unknown]\nOrphan text.');
    expect(tool.lastSources).toEqual([{ text: 'unknown' }]);
  });

  it('omits the lesson when a passage has none', async () => {
    store.searchResult = { passages: [{ text: 'Preface.', courseTitle: 'Building Retrieval Systems' }] };

    expect(await tool.execute({ query: 'preface' })).toBe('[Building Retrieval Systems]\nPreface.');
    expect(tool.lastSources).toEqual([{ text: 'Building Retrieval Systems' }]);
  });

  it('returns the store error verbatim and records no sources', async () => {
    tool.lastSources = [{ text: 'stale' }];
    store.searchResult = { passages: [], error: "No course found matching 'Cooking'" };

    const output = await tool.execute({ query: 'x', course_name: 'Cooking' });

    expect(output).toBe("No course found matching 'Cooking'");
    expect(tool.lastSources).toEqual([]);
  });

  it('reports empty results with both filters', async () => {
    tool.lastSources = [{ text: 'stale' }];

    const output = await tool.execute({ query: 'x', course_name: 'MCP', lesson_number: 3 });

    expect(output).toBe("No relevant content found in course 'MCP' in lesson 3.");
    expect(tool.lastSources).toEqual([]);
  });

  it('lets store exceptions propagate', async () => {
    store.searchResult = new Error('connection lost');

    await expect(tool.execute({ query: 'x' })).rejects.toThrow('connection lost');
  });
});

describe('noResultsMessage', () => {
  it('has no suffix without filters', () => {
    expect(noResultsMessage()).toBe('No relevant content found.');
  });

  it('names the course only', () => {
    expect(noResultsMessage('Intro')).toBe("No relevant content found in course 'Intro'.");
  });

  it('names lesson 0', () => {
    expect(noResultsMessage(undefined, 0)).toBe('No relevant content found in lesson 0.');
  });
});
